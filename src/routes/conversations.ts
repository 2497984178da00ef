// src/routes/conversations.ts
import { Router, Request, Response, NextFunction } from 'express';
import { buscarContactoOError } from '../lib/contactos/buscar';
import type { DependenciasApp } from '../lib/dependencias';
import { leerPaginacion } from '../lib/paginacion';

/**
 * GET /conversations/:phone?limit=
 * Historial en orden cronológico; 404 si el contacto no existe.
 */
export default function conversationsRoutes({ store }: DependenciasApp): Router {
  const router = Router();

  router.get('/:phone', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const contact = await buscarContactoOError(store, req.params.phone);
      const { limit } = leerPaginacion(req.query, { limit: 50, max: 500 });
      const messages = await store.historial(contact.id, limit);
      res.json({ contact, messages });
    } catch (e) {
      next(e);
    }
  });

  return router;
}
