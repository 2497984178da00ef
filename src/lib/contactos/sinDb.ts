// src/lib/contactos/sinDb.ts
import { HttpError } from '../errors';
import type { ContactStore } from './tipos';

const NO_DISPONIBLE = 'Base de datos no disponible';

function noDisponible(): never {
  throw new HttpError(503, NO_DISPONIBLE);
}

/**
 * Store usado cuando no hay DATABASE_URL: el servicio arranca igual y cada
 * operación responde 503 (el webhook lo devuelve como { status: 'error' }).
 */
export const storeSinDb: ContactStore = {
  obtenerOCrearContacto: async () => noDisponible(),
  buscarContacto: async () => noDisponible(),
  guardarMensaje: async () => noDisponible(),
  historial: async () => noDisponible(),
  listarContactos: async () => noDisponible(),
  contarContactos: async () => noDisponible(),
  actualizarContacto: async () => noDisponible(),
  ping: async () => false,
};
