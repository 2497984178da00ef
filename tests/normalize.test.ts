import { describe, expect, it } from 'vitest';
import { truncar } from '../src/lib/normalizarTexto';
import { direccionWhatsApp, normalizarTelefono } from '../src/lib/whatsapp/normalize';

describe('normalizarTelefono', () => {
  it('quita el prefijo del gateway', () => {
    expect(normalizarTelefono('whatsapp:+5215512345678')).toBe('+5215512345678');
    expect(normalizarTelefono('WhatsApp:+5215512345678')).toBe('+5215512345678');
    expect(normalizarTelefono('tel:+5215512345678')).toBe('+5215512345678');
  });

  it('deja solo dígitos con +', () => {
    expect(normalizarTelefono(' 52 1 55-1234-5678 ')).toBe('+5215512345678');
  });

  it('sin dígitos devuelve vacío', () => {
    expect(normalizarTelefono('whatsapp:')).toBe('');
    expect(normalizarTelefono(undefined)).toBe('');
  });
});

describe('direccionWhatsApp', () => {
  it('antepone whatsapp:', () => {
    expect(direccionWhatsApp('+14155238886')).toBe('whatsapp:+14155238886');
    expect(direccionWhatsApp('whatsapp:+14155238886')).toBe('whatsapp:+14155238886');
    expect(direccionWhatsApp('')).toBe('');
  });
});

describe('truncar', () => {
  it('deja igual lo que cabe', () => {
    expect(truncar('  hola  ', 4)).toBe('hola');
  });

  it('el resultado con "…" mide exactamente max', () => {
    const r = truncar('abcdefgh', 5);
    expect(r).toBe('abcd…');
    expect(Array.from(r)).toHaveLength(5);
  });

  it('no parte emojis', () => {
    expect(truncar('😀😀😀😀', 3)).toBe('😀😀…');
  });
});
