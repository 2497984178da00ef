// src/app.ts

import express from 'express';
import cors, { CorsOptions } from 'cors';
import type { DependenciasApp } from './lib/dependencias';
import { statusDeError } from './lib/errors';
import { mensajeDeError } from './lib/logger';

import whatsappWebhook from './routes/webhook/whatsapp';
import contactsRoutes from './routes/contacts';
import conversationsRoutes from './routes/conversations';
import panelRoutes from './routes/panel';
import debugRoutes from './routes/debug';

export function createApp(deps: DependenciasApp): express.Express {
  const app = express();
  const whitelist = deps.panelOrigins ?? [];

  app.set('trust proxy', 1);

  // —— CORS (solo orígenes del panel externo, si los hay) ——
  const corsOptions: CorsOptions = {
    origin(origin, cb) {
      if (!origin || whitelist.includes(origin)) return cb(null, true);
      return cb(null, false);
    },
    methods: ['GET', 'HEAD', 'POST', 'PATCH', 'OPTIONS'],
    maxAge: 86400,
  };
  app.use(cors(corsOptions));

  // —— Parsers (Twilio manda form-urlencoded) ——
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: false }));

  // —— Ruta base ——
  app.get('/', (_req, res) => {
    res.json({
      status: 'WhatsApp bot activo 🟢',
      negocio: deps.negocios.porDefecto.nombre,
      responder: deps.responder.nombre,
      endpoints: {
        webhook: '/webhook/whatsapp',
        health: '/health',
        contacts: '/contacts',
        conversations: '/conversations/{phone}',
        panel: '/panel',
      },
    });
  });

  // —— Healthcheck ——
  app.get('/health', async (_req, res) => {
    const database = await deps.store.ping();
    res.status(200).json({
      ok: database,
      database,
      twilio: deps.gateway.configurado,
      llm: deps.chat !== null,
      at: new Date().toISOString(),
    });
  });

  // —— Rutas ——
  app.use('/webhook/whatsapp', whatsappWebhook(deps));
  app.use('/contacts', contactsRoutes(deps));
  app.use('/conversations', conversationsRoutes(deps));
  app.use('/panel', panelRoutes(deps));
  app.use(debugRoutes(deps));

  // —— 404 ——
  app.use((req, res) => {
    res.status(404).json({ ok: false, error: 'Ruta no encontrada', path: req.originalUrl });
  });

  // —— Handler de errores ——
  app.use(
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    (err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
      const status = statusDeError(err);
      const mensaje = mensajeDeError(err) || 'Internal Server Error';
      if (status >= 500) {
        console.error('❌ Error handler:', status, mensaje, '→', req.originalUrl);
      } else {
        console.warn('⚠️', status, mensaje, '→', req.originalUrl);
      }
      res.status(status).json({ ok: false, error: mensaje, path: req.originalUrl });
    }
  );

  return app;
}
