// src/routes/contacts.ts
import { Router, Request, Response, NextFunction } from 'express';
import { buscarContactoOError } from '../lib/contactos/buscar';
import { transicionar } from '../lib/contactos/cicloVida';
import { esEstadoContacto, type CambiosContacto, type EstadoContacto } from '../lib/contactos/tipos';
import type { DependenciasApp } from '../lib/dependencias';
import { HttpError } from '../lib/errors';
import { leerPaginacion } from '../lib/paginacion';

function leerFiltroEstado(raw: unknown): EstadoContacto | undefined {
  if (raw === undefined || raw === '') return undefined;
  if (!esEstadoContacto(raw)) throw new HttpError(400, `Estado desconocido: ${String(raw)}`);
  return raw;
}

/** Valida el body de PATCH; solo se aceptan status, notes e is_competitor. */
export function leerCambios(body: unknown): { status?: EstadoContacto; resto: CambiosContacto } {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new HttpError(400, 'Se esperaba un objeto JSON');
  }

  const resto: CambiosContacto = {};
  let status: EstadoContacto | undefined;

  if ('status' in body && body.status !== undefined) {
    const valor = body.status;
    if (!esEstadoContacto(valor)) throw new HttpError(400, `Estado desconocido: ${String(valor)}`);
    status = valor;
  }
  if ('notes' in body && body.notes !== undefined) {
    const notes = body.notes;
    if (notes === null) resto.notes = null;
    else if (typeof notes === 'string') resto.notes = notes.trim() || null;
    else throw new HttpError(400, 'notes debe ser texto o null');
  }
  if ('is_competitor' in body && body.is_competitor !== undefined) {
    const valor = body.is_competitor;
    if (typeof valor !== 'boolean') throw new HttpError(400, 'is_competitor debe ser booleano');
    resto.is_competitor = valor;
  }

  if (status === undefined && Object.keys(resto).length === 0) {
    throw new HttpError(400, 'Nada que actualizar (status, notes o is_competitor)');
  }
  return { status, resto };
}

export default function contactsRoutes({ store }: DependenciasApp): Router {
  const router = Router();

  /**
   * GET /contacts?status=&limit=
   * Contactos por último contacto, más recientes primero.
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const status = leerFiltroEstado(req.query.status);
      const { limit } = leerPaginacion(req.query, { limit: 50, max: 100 });
      const [contacts, total] = await Promise.all([
        store.listarContactos({ status, limit, offset: 0 }),
        store.contarContactos(status),
      ]);
      res.json({ contacts, total });
    } catch (e) {
      next(e);
    }
  });

  /**
   * PATCH /contacts/:phone  { status?, notes?, is_competitor? }
   * Cambio de estado manual, validado contra la tabla de transiciones.
   */
  router.patch('/:phone', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { status, resto } = leerCambios(req.body);
      const contacto = await buscarContactoOError(store, req.params.phone);

      const cambios: CambiosContacto = status ? { ...resto, ...transicionar(contacto, status) } : resto;
      const actualizado = await store.actualizarContacto(contacto.id, cambios);

      if (status && status !== contacto.status) {
        console.log(`🔁 Contacto ${contacto.phone}: ${contacto.status} → ${status}`);
      }
      res.json({ contact: actualizado });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
