// src/routes/webhook/whatsapp.ts
import { Router, Request, Response } from 'express';
import { procesarMensajeWhatsApp } from '../../lib/conversacion/procesarMensajeWhatsApp';
import type { DependenciasApp } from '../../lib/dependencias';

/**
 * POST /webhook/whatsapp
 * Twilio manda From, Body, To (form-urlencoded). Siempre responde 200 con
 * { status: 'success', contact_id } o { status: 'error', detail }.
 */
export default function whatsappWebhook(deps: DependenciasApp): Router {
  const router = Router();

  router.post('/', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const resultado = await procesarMensajeWhatsApp(
      typeof body === 'object' && body !== null ? body : {},
      deps
    );
    res.status(200).json(resultado);
  });

  return router;
}
