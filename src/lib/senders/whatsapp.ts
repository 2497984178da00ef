// src/lib/senders/whatsapp.ts
import twilio from 'twilio';
import type { TwilioConfig } from '../config';
import { mensajeDeError } from '../logger';
import { conTimeout } from '../reintentos';
import { direccionWhatsApp } from '../whatsapp/normalize';

export type ResultadoEnvio =
  | { ok: true; sid: string; partes: number }
  /** sid: primera parte, si alcanzó a salir antes del fallo */
  | { ok: false; error: string; sid?: string };

export interface MessageGateway {
  readonly configurado: boolean;
  /** Nunca lanza: los fallos vienen como { ok: false } */
  enviar(telefono: string, texto: string): Promise<ResultadoEnvio>;
}

/** Lo mínimo que usamos de client.messages de Twilio */
export interface TwilioMessagesApi {
  create(params: { from: string; to: string; body: string }): Promise<{ sid: string; status: string }>;
}

// ---------- Helpers ----------
export const MAX_WHATSAPP = 1600; // límite de Twilio para el body

export function chunkByLimit(text: string, limit = MAX_WHATSAPP): string[] {
  const blocks = (text ?? '').replace(/\r\n/g, '\n').split(/\n\n+/); // cortar por párrafos
  const chunks: string[] = [];
  let cur = '';

  const pushCur = () => {
    if (cur) {
      chunks.push(cur);
      cur = '';
    }
  };

  for (const b of blocks) {
    if ((cur ? cur.length + 2 : 0) + b.length <= limit) {
      cur = cur ? `${cur}\n\n${b}` : b;
      continue;
    }
    pushCur();

    if (b.length <= limit) {
      cur = b;
      continue;
    }

    // el párrafo no cabe: corta por líneas
    let acc = '';
    for (let line of b.split('\n')) {
      if ((acc ? acc.length + 1 : 0) + line.length <= limit) {
        acc = acc ? `${acc}\n${line}` : line;
      } else {
        if (acc) chunks.push(acc);
        // último recurso: rebanadas de la línea
        while (line.length > limit) {
          chunks.push(line.slice(0, limit));
          line = line.slice(limit);
        }
        acc = line;
      }
    }
    cur = acc;
  }
  pushCur();
  return chunks;
}

// ---------- Envío por Twilio ----------
export class TwilioGateway implements MessageGateway {
  readonly configurado = true;
  private readonly from: string;

  constructor(
    private readonly config: TwilioConfig,
    private readonly messages: TwilioMessagesApi = twilio(config.accountSid, config.authToken).messages
  ) {
    this.from = direccionWhatsApp(config.numeroWhatsApp);
  }

  async enviar(telefono: string, texto: string): Promise<ResultadoEnvio> {
    const to = direccionWhatsApp(telefono);
    if (!to) {
      console.warn('❌ Número de destino inválido:', telefono);
      return { ok: false, error: `Número de destino inválido: ${telefono}` };
    }

    const partes = chunkByLimit(texto);
    if (!partes.length) return { ok: false, error: 'Mensaje vacío' };

    let primerSid: string | null = null;
    try {
      for (const body of partes) {
        const message = await conTimeout(
          this.messages.create({ from: this.from, to, body }),
          this.config.timeoutMs,
          'Twilio'
        );
        primerSid = primerSid ?? message.sid;
        console.log(`✅ WhatsApp enviado a ${to}`, message.sid, message.status);
      }
    } catch (err) {
      const detalle = mensajeDeError(err);
      console.error(`❌ Error enviando por Twilio a ${to}:`, detalle);
      if (primerSid) {
        console.warn(`⚠️ Entrega parcial a ${to}: salió la primera parte (${primerSid})`);
        return { ok: false, error: detalle, sid: primerSid };
      }
      return { ok: false, error: detalle };
    }

    return primerSid ? { ok: true, sid: primerSid, partes: partes.length } : { ok: false, error: 'Sin SID' };
  }
}

/** Sin credenciales: no se envía nada y se informa el motivo. */
export class GatewayDeshabilitado implements MessageGateway {
  readonly configurado = false;

  async enviar(telefono: string): Promise<ResultadoEnvio> {
    console.warn('⚠️ Twilio no configurado; no se envía respuesta a', telefono);
    return { ok: false, error: 'Twilio no configurado' };
  }
}

export function crearGateway(config: TwilioConfig | null): MessageGateway {
  return config ? new TwilioGateway(config) : new GatewayDeshabilitado();
}
