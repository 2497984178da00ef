// src/lib/contactos/cicloVida.ts
import { HttpError } from '../errors';
import type { CambiosContacto, Contacto, EstadoContacto } from './tipos';

/** Movimientos permitidos por estado. Cualquier otro cambio manual responde 409. */
export const TRANSICIONES: Readonly<Record<EstadoContacto, readonly EstadoContacto[]>> = {
  prospecto_nuevo: ['prospecto_informado', 'visita_agendada', 'competencia'],
  prospecto_informado: ['visita_agendada', 'inscripcion_pendiente', 'competencia'],
  visita_agendada: ['inscripcion_pendiente', 'prospecto_informado', 'competencia'],
  inscripcion_pendiente: ['alumno_activo', 'prospecto_informado'],
  alumno_activo: ['alumno_inactivo', 'exalumno'],
  alumno_inactivo: ['alumno_activo', 'exalumno'],
  competencia: ['prospecto_informado'],
  exalumno: ['alumno_activo'],
};

export function puedeTransicionar(desde: EstadoContacto, hacia: EstadoContacto): boolean {
  return desde === hacia || TRANSICIONES[desde].includes(hacia);
}

/**
 * Cambios a aplicar para mover el contacto a `hacia`.
 * Pasar a "competencia" marca también is_competitor.
 */
export function transicionar(contacto: Contacto, hacia: EstadoContacto): CambiosContacto {
  if (!puedeTransicionar(contacto.status, hacia)) {
    throw new HttpError(409, `Transición no permitida: ${contacto.status} → ${hacia}`);
  }
  const cambios: CambiosContacto = { status: hacia };
  if (hacia === 'competencia') cambios.is_competitor = true;
  return cambios;
}
