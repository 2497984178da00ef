// src/routes/panel.ts
import { Router, Request, Response } from 'express';
import { buscarContactoOError } from '../lib/contactos/buscar';
import type { DependenciasApp } from '../lib/dependencias';
import { statusDeError } from '../lib/errors';
import { mensajeDeError } from '../lib/logger';
import { leerPaginacion, metaPaginacion } from '../lib/paginacion';
import { renderConversacion, renderError, renderPanel } from '../lib/panel/render';

const MENSAJES_POR_TARJETA = 3;
const MAX_CONVERSACION = 1000;

export default function panelRoutes({ store, negocios }: DependenciasApp): Router {
  const router = Router();
  const negocio = negocios.porDefecto;

  // Los errores del panel se muestran en la misma página, no como JSON
  const enviarError = (res: Response, e: unknown) => {
    const status = statusDeError(e);
    if (status >= 500) console.error('❌ Error en panel:', e);
    res.status(status).type('html').send(renderError(mensajeDeError(e)));
  };

  /** GET /panel?page=&limit= */
  router.get('/', async (req: Request, res: Response) => {
    try {
      const paginacion = leerPaginacion(req.query, { limit: 20, max: 100 });
      const [total, contactos] = await Promise.all([
        store.contarContactos(),
        store.listarContactos({ limit: paginacion.limit, offset: paginacion.offset }),
      ]);

      const conMensajes = await Promise.all(
        contactos.map(async (contacto) => ({
          contacto,
          mensajes: await store.historial(contacto.id, MENSAJES_POR_TARJETA),
        }))
      );

      res.type('html').send(renderPanel({ negocio, contactos: conMensajes, meta: metaPaginacion(paginacion, total) }));
    } catch (e) {
      enviarError(res, e);
    }
  });

  /** GET /panel/conversations/json/:phone (AJAX del botón "cargar conversación completa") */
  router.get('/conversations/json/:phone', async (req: Request, res: Response) => {
    try {
      const contact = await buscarContactoOError(store, req.params.phone);
      const messages = await store.historial(contact.id, MAX_CONVERSACION);
      res.json({ contact, messages });
    } catch (e) {
      res.status(statusDeError(e)).json({ error: mensajeDeError(e) });
    }
  });

  /** GET /panel/conversations/:phone */
  router.get('/conversations/:phone', async (req: Request, res: Response) => {
    try {
      const contacto = await buscarContactoOError(store, req.params.phone);
      const mensajes = await store.historial(contacto.id, MAX_CONVERSACION);
      res.type('html').send(renderConversacion({ negocio, contacto, mensajes }));
    } catch (e) {
      enviarError(res, e);
    }
  });

  return router;
}
