// src/lib/respuestas/llm.ts
import type { ChatClient } from '../llm/chatClient';
import { debug, mensajeDeError } from '../logger';
import { truncar } from '../normalizarTexto';
import { clasificar, respuestaPorEstado, respuestaPorReglas } from './reglas';
import type { ContextoRespuesta, Respuesta, Responder } from './tipos';

export const MAX_MENSAJES_CONTEXTO = 5;
export const MAX_CHARS_POR_MENSAJE = 200;
export const MAX_TOKENS_RESPUESTA = 300;
export const TEMPERATURA = 0.7;

export function construirPrompt(ctx: ContextoRespuesta): { system: string; user: string } {
  const { negocio, contacto } = ctx;

  const system = [
    ...negocio.conocimiento,
    '',
    'Reglas:',
    '- Responde SIEMPRE en español, en tono cálido y breve (máximo 4 líneas).',
    '- Formato WhatsApp: sin Markdown, sin encabezados.',
    '- No inventes precios, fechas ni servicios que no estén arriba.',
  ].join('\n');

  const previos = ctx.historial.slice(-MAX_MENSAJES_CONTEXTO).map((m) => {
    const quien = m.direction === 'incoming' ? 'Usuario' : 'Asistente';
    return `${quien}: ${truncar(m.content, MAX_CHARS_POR_MENSAJE)}`;
  });

  const user = [
    `ESTADO_CONTACTO: ${contacto.status}`,
    `MENSAJES_PREVIOS: ${contacto.message_count}`,
    '',
    'HISTORIAL:',
    previos.length ? previos.join('\n') : '(sin mensajes previos)',
    '',
    'MENSAJE_USUARIO:',
    ctx.mensaje,
  ].join('\n');

  return { system, user };
}

/**
 * Genera el texto con el LLM. Ante cualquier fallo (timeout, HTTP, salida
 * vacía) responde con las reglas, así el usuario siempre recibe algo.
 */
export class ResponderLLM implements Responder {
  readonly nombre = 'llm';

  constructor(private readonly chat: ChatClient) {}

  async responder(ctx: ContextoRespuesta): Promise<Respuesta> {
    const porEstado = respuestaPorEstado(ctx);
    if (porEstado) return porEstado;

    const intencion = clasificar(ctx.mensaje, ctx.negocio);
    const { system, user } = construirPrompt(ctx);
    debug('📝 Prompt LLM:\n', user);

    try {
      const texto = await this.chat.completar({
        system,
        user,
        maxTokens: MAX_TOKENS_RESPUESTA,
        temperature: TEMPERATURA,
      });
      if (texto) return { texto, intencion, origen: 'llm' };
      console.warn('⚠️ LLM devolvió respuesta vacía; uso reglas');
    } catch (e) {
      console.warn('❌ Error LLM; uso reglas:', mensajeDeError(e));
    }

    return respuestaPorReglas(ctx.mensaje, ctx.negocio);
  }
}
