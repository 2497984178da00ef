// src/lib/respuestas/tipos.ts
import type { Contacto, Mensaje } from '../contactos/tipos';
import type { PerfilNegocio } from '../negocios';

export const INTENCIONES = ['saludo', 'horario', 'ubicacion', 'costo', 'agendar', 'programas'] as const;
export type Intencion = (typeof INTENCIONES)[number];

export function esIntencion(v: unknown): v is Intencion {
  return INTENCIONES.some((i) => i === v);
}

export type OrigenRespuesta = 'reglas' | 'llm' | 'estado';

export type Respuesta = {
  texto: string;
  /** Siempre la clasificación por palabras clave, aunque el texto venga del LLM */
  intencion: Intencion | null;
  origen: OrigenRespuesta;
};

export type ContextoRespuesta = {
  mensaje: string;
  /** Contacto tal como estaba ANTES de guardar el mensaje entrante */
  contacto: Contacto;
  /** Mensajes previos, orden cronológico */
  historial: Mensaje[];
  negocio: PerfilNegocio;
};

export interface Responder {
  readonly nombre: 'reglas' | 'llm';
  responder(ctx: ContextoRespuesta): Promise<Respuesta>;
}
