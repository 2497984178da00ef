// src/lib/contactos/tipos.ts

export const ESTADOS_CONTACTO = [
  'prospecto_nuevo',
  'prospecto_informado',
  'visita_agendada',
  'inscripcion_pendiente',
  'alumno_activo',
  'alumno_inactivo',
  'competencia',
  'exalumno',
] as const;

export type EstadoContacto = (typeof ESTADOS_CONTACTO)[number];

export function esEstadoContacto(v: unknown): v is EstadoContacto {
  return ESTADOS_CONTACTO.some((estado) => estado === v);
}

export type Direccion = 'incoming' | 'outgoing';

export type Contacto = {
  id: number;
  phone: string;
  status: EstadoContacto;
  first_contact: Date;
  last_contact: Date;
  message_count: number;
  notes: string | null;
  is_competitor: boolean;
};

export type Mensaje = {
  id: number;
  contact_id: number;
  direction: Direccion;
  content: string;
  timestamp: Date;
  message_sid: string | null;
};

export type NuevoMensaje = {
  contactId: number;
  direction: Direccion;
  content: string;
  messageSid?: string | null;
};

export type CambiosContacto = {
  status?: EstadoContacto;
  notes?: string | null;
  is_competitor?: boolean;
};

export type FiltroContactos = {
  status?: EstadoContacto;
  limit: number;
  offset: number;
};

/**
 * Acceso a contactos y mensajes. PgContactStore es la implementación real;
 * los tests usan una en memoria.
 */
export interface ContactStore {
  /** Upsert por teléfono; `creado` es true solo en el primer mensaje. */
  obtenerOCrearContacto(phone: string): Promise<{ contacto: Contacto; creado: boolean }>;
  buscarContacto(phone: string): Promise<Contacto | null>;
  /** Inserta el mensaje y suma 1 a message_count en la misma sentencia. */
  guardarMensaje(nuevo: NuevoMensaje): Promise<Mensaje>;
  /** Últimos `limit` mensajes, en orden cronológico ascendente. */
  historial(contactId: number, limit: number): Promise<Mensaje[]>;
  listarContactos(filtro: FiltroContactos): Promise<Contacto[]>;
  contarContactos(status?: EstadoContacto): Promise<number>;
  actualizarContacto(id: number, cambios: CambiosContacto): Promise<Contacto>;
  ping(): Promise<boolean>;
}
