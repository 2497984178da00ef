import { beforeAll, describe, expect, it } from 'vitest';
import type { PerfilNegocio } from '../src/lib/negocios';
import { escapeHtml, formatearFecha, renderConversacion, renderPanel } from '../src/lib/panel/render';
import { cargarRegistro, contacto } from './helpers/fakes';

let negocio: PerfilNegocio;

beforeAll(async () => {
  negocio = (await cargarRegistro()).porDefecto;
});

describe('escapeHtml', () => {
  it('escapa los cinco caracteres especiales', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
  });
});

describe('formatearFecha', () => {
  it('usa la zona del colegio', () => {
    expect(formatearFecha(new Date('2024-01-15T15:00:00Z'), 'America/Mexico_City')).toBe('15/01/2024 09:00');
  });
});

describe('renderPanel', () => {
  it('sin contactos muestra el aviso y una sola página', () => {
    const html = renderPanel({
      negocio,
      contactos: [],
      meta: { page: 1, limit: 20, total: 0, total_pages: 1, has_more: false },
    });
    expect(html).toContain('<p>Aún no hay contactos.</p>');
    expect(html).toContain('Página 1 de 1 (0 contactos)');
    expect(html).not.toContain('« Anterior');
  });

  it('marca a los contactos de la competencia', () => {
    const html = renderPanel({
      negocio,
      contactos: [{ contacto: contacto({ status: 'competencia', is_competitor: true }), mensajes: [] }],
      meta: { page: 1, limit: 20, total: 1, total_pages: 1, has_more: false },
    });
    expect(html).toContain('<span class="estado">Competencia</span> <span class="estado">⚠️ competencia</span>');
  });
});

describe('renderConversacion', () => {
  it('muestra fecha local y número de mensajes', () => {
    const html = renderConversacion({ negocio, contacto: contacto(), mensajes: [] });
    expect(html).toContain('Primer contacto: 15/01/2024 09:00 · 0 mensajes');
  });
});
