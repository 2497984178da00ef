// src/lib/conversacion/procesarMensajeWhatsApp.ts
import type { ContactStore } from '../contactos/tipos';
import { HttpError } from '../errors';
import { debug, mensajeDeError } from '../logger';
import type { RegistroNegocios } from '../negocios';
import { MAX_MENSAJES_CONTEXTO } from '../respuestas/llm';
import type { Responder } from '../respuestas/tipos';
import type { MessageGateway } from '../senders/whatsapp';
import { aEventoMensaje, type EventoMensajeNuevo } from '../socket';
import { normalizarTelefono } from '../whatsapp/normalize';

export type DependenciasWebhook = {
  store: ContactStore;
  responder: Responder;
  gateway: MessageGateway;
  negocios: RegistroNegocios;
  notificar?: (evento: EventoMensajeNuevo) => void;
};

/** Campos del form que manda Twilio (application/x-www-form-urlencoded) */
export type EntradaWhatsApp = {
  From?: unknown;
  Body?: unknown;
  To?: unknown;
  MessageSid?: unknown;
};

export type ResultadoWebhook =
  | { status: 'success'; contact_id: number; reply: string; delivered: boolean }
  | { status: 'error'; detail: string };

function campo(v: unknown): string {
  return typeof v === 'string' ? v : '';
}

/**
 * Flujo completo de un mensaje entrante: contacto → historial → guardar
 * entrante → responder → enviar → guardar saliente.
 * Nunca lanza; cualquier fallo vuelve como { status: 'error', detail }.
 */
export async function procesarMensajeWhatsApp(
  body: EntradaWhatsApp,
  deps: DependenciasWebhook
): Promise<ResultadoWebhook> {
  const { store, responder, gateway, negocios } = deps;
  const notificar = deps.notificar ?? (() => undefined);

  try {
    const from = campo(body.From);
    const texto = campo(body.Body).trim();
    const messageSid = campo(body.MessageSid) || null;

    console.log(`📨 Mensaje de ${from}: ${texto}`, messageSid ? `(${messageSid})` : '');

    const telefono = normalizarTelefono(from);
    if (!telefono) throw new HttpError(400, 'Falta el número del remitente (From)');

    const negocio = negocios.resolver(campo(body.To));

    const { contacto, creado } = await store.obtenerOCrearContacto(telefono);
    if (creado) console.log(`🆕 Contacto nuevo ${telefono} (id ${contacto.id})`);

    const historial = await store.historial(contacto.id, MAX_MENSAJES_CONTEXTO);
    debug(`🧠 Contexto de ${telefono}: estado=${contacto.status}, mensajes=${contacto.message_count}, historial=${historial.length}`);

    const entrante = await store.guardarMensaje({
      contactId: contacto.id,
      direction: 'incoming',
      content: texto,
    });
    notificar(aEventoMensaje(contacto, entrante));

    const respuesta = await responder.responder({ mensaje: texto, contacto, historial, negocio });
    console.log(`🤖 Respuesta (${respuesta.origen}, intención=${respuesta.intencion ?? 'ninguna'}):`, respuesta.texto);

    const envio = await gateway.enviar(telefono, respuesta.texto);
    if (!envio.ok) console.warn(`⚠️ Respuesta no entregada a ${telefono}: ${envio.error}`);

    const saliente = await store.guardarMensaje({
      contactId: contacto.id,
      direction: 'outgoing',
      content: respuesta.texto,
      messageSid: envio.sid ?? null,
    });
    notificar(aEventoMensaje(contacto, saliente));

    return { status: 'success', contact_id: contacto.id, reply: respuesta.texto, delivered: envio.ok };
  } catch (e) {
    console.error('❌ Error en webhook WhatsApp:', mensajeDeError(e));
    return { status: 'error', detail: mensajeDeError(e) };
  }
}
