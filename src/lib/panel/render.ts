// src/lib/panel/render.ts
import { DateTime } from 'luxon';
import type { Contacto, Mensaje } from '../contactos/tipos';
import type { PerfilNegocio } from '../negocios';
import type { MetaPaginacion } from '../paginacion';

export type ContactoConMensajes = {
  contacto: Contacto;
  /** Últimos mensajes, orden cronológico */
  mensajes: Mensaje[];
};

const ETIQUETAS_ESTADO: Record<Contacto['status'], string> = {
  prospecto_nuevo: 'Prospecto nuevo',
  prospecto_informado: 'Prospecto informado',
  visita_agendada: 'Visita agendada',
  inscripcion_pendiente: 'Inscripción pendiente',
  alumno_activo: 'Alumno activo',
  alumno_inactivo: 'Alumno inactivo',
  competencia: 'Competencia',
  exalumno: 'Exalumno',
};

export function escapeHtml(texto: string): string {
  return texto
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function formatearFecha(fecha: Date, zona: string): string {
  return DateTime.fromJSDate(fecha, { zone: zona }).toFormat('dd/MM/yyyy HH:mm');
}

function layout(titulo: string, cuerpo: string, script = ''): string {
  return `<!DOCTYPE html>
<html lang="es">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>${escapeHtml(titulo)}</title>
  <style>
    body { margin:0; padding:24px; font-family:Arial, sans-serif; background:#f4f4f4; color:#333; }
    .card { background:#fff; border-radius:8px; padding:16px; margin-bottom:16px; }
    .estado { display:inline-block; padding:2px 8px; border-radius:10px; background:#eef; font-size:12px; }
    .msg { padding:6px 10px; margin:4px 0; border-radius:6px; max-width:80%; white-space:pre-wrap; }
    .incoming { background:#e9f5ff; }
    .outgoing { background:#e7fbe7; margin-left:auto; }
    .hora { font-size:11px; color:#999; }
    .paginas a { margin-right:8px; }
    .error { color:#b00020; }
  </style>
</head>
<body>
${cuerpo}
${script}
</body>
</html>`;
}

function renderMensaje(m: Mensaje, zona: string): string {
  return `<div class="msg ${m.direction}" data-id="${m.id}">${escapeHtml(m.content)}<div class="hora">${escapeHtml(
    formatearFecha(m.timestamp, zona)
  )}</div></div>`;
}

function renderContacto({ contacto, mensajes }: ContactoConMensajes, zona: string): string {
  const phone = escapeHtml(contacto.phone);
  const href = `/panel/conversations/${encodeURIComponent(contacto.phone)}`;
  return `<div class="card" data-phone="${phone}">
  <h3><a href="${escapeHtml(href)}">${phone}</a> <span class="estado">${escapeHtml(ETIQUETAS_ESTADO[contacto.status])}</span>${
    contacto.is_competitor ? ' <span class="estado">⚠️ competencia</span>' : ''
  }</h3>
  <div class="hora">Último contacto: ${escapeHtml(formatearFecha(contacto.last_contact, zona))} · ${contacto.message_count} mensajes</div>
  ${contacto.notes ? `<p>${escapeHtml(contacto.notes)}</p>` : ''}
  <div class="mensajes">${mensajes.map((m) => renderMensaje(m, zona)).join('\n')}</div>
  <button type="button" class="cargar" data-phone="${phone}">Cargar conversación completa</button>
</div>`;
}

function renderPaginas(meta: MetaPaginacion): string {
  const link = (page: number, texto: string) =>
    `<a href="/panel?page=${page}&amp;limit=${meta.limit}">${texto}</a>`;
  const partes: string[] = [];
  if (meta.page > 1) partes.push(link(meta.page - 1, '« Anterior'));
  partes.push(`<span>Página ${meta.page} de ${meta.total_pages} (${meta.total} contactos)</span>`);
  if (meta.has_more) partes.push(link(meta.page + 1, 'Siguiente »'));
  return `<div class="paginas">${partes.join(' ')}</div>`;
}

// Carga la conversación por AJAX y escucha message:new por socket.io
const SCRIPT_PANEL = `<script src="/socket.io/socket.io.js"></script>
<script>
(function () {
  function pintar(contenedor, mensajes) {
    contenedor.innerHTML = '';
    mensajes.forEach(function (m) { agregar(contenedor, m); });
  }
  function agregar(contenedor, m) {
    var div = document.createElement('div');
    div.className = 'msg ' + m.direction;
    div.textContent = m.content;
    var hora = document.createElement('div');
    hora.className = 'hora';
    hora.textContent = new Date(m.timestamp).toLocaleString();
    div.appendChild(hora);
    contenedor.appendChild(div);
  }
  document.querySelectorAll('button.cargar').forEach(function (btn) {
    btn.addEventListener('click', function () {
      var phone = btn.getAttribute('data-phone');
      var card = btn.closest('.card');
      fetch('/panel/conversations/json/' + encodeURIComponent(phone))
        .then(function (r) { return r.json(); })
        .then(function (data) {
          if (!data.messages) throw new Error(data.error || 'Error al cargar');
          pintar(card.querySelector('.mensajes'), data.messages);
          btn.remove();
        })
        .catch(function (e) { btn.textContent = e.message; });
    });
  });
  if (window.io) {
    window.io().on('message:new', function (m) {
      var card = document.querySelector('.card[data-phone="' + m.phone + '"]');
      if (card) agregar(card.querySelector('.mensajes'), m);
    });
  }
})();
</script>`;

export function renderPanel(opts: {
  negocio: PerfilNegocio;
  contactos: ContactoConMensajes[];
  meta: MetaPaginacion;
}): string {
  const { negocio, contactos, meta } = opts;
  const lista = contactos.length
    ? contactos.map((c) => renderContacto(c, negocio.zonaHoraria)).join('\n')
    : '<p>Aún no hay contactos.</p>';

  return layout(
    `Panel ${negocio.nombre}`,
    `<h1>📋 Panel de conversaciones · ${escapeHtml(negocio.nombre)}</h1>
${renderPaginas(meta)}
${lista}
${renderPaginas(meta)}`,
    SCRIPT_PANEL
  );
}

export function renderConversacion(opts: {
  negocio: PerfilNegocio;
  contacto: Contacto;
  mensajes: Mensaje[];
}): string {
  const { negocio, contacto, mensajes } = opts;
  const zona = negocio.zonaHoraria;
  return layout(
    `Conversación ${contacto.phone}`,
    `<p><a href="/panel">← Volver al panel</a></p>
<div class="card" data-phone="${escapeHtml(contacto.phone)}">
  <h2>💬 ${escapeHtml(contacto.phone)} <span class="estado">${escapeHtml(ETIQUETAS_ESTADO[contacto.status])}</span></h2>
  <div class="hora">Primer contacto: ${escapeHtml(formatearFecha(contacto.first_contact, zona))} · ${mensajes.length} mensajes</div>
  <div class="mensajes">${mensajes.map((m) => renderMensaje(m, zona)).join('\n')}</div>
</div>`,
    SCRIPT_PANEL
  );
}

export function renderError(mensaje: string): string {
  return layout('Error', `<p><a href="/panel">← Volver al panel</a></p>\n<p class="error">❌ ${escapeHtml(mensaje)}</p>`);
}
