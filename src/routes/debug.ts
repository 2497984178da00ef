// src/routes/debug.ts
import { Router } from 'express';
import { DateTime } from 'luxon';
import type { DependenciasApp } from '../lib/dependencias';
import { mensajeDeError } from '../lib/logger';

// Diagnóstico, no es superficie de producción
export default function debugRoutes({ negocios, chat }: DependenciasApp): Router {
  const router = Router();

  router.get('/debug/time', (_req, res) => {
    const zona = negocios.porDefecto.zonaHoraria;
    const ahora = DateTime.now();
    res.json({
      utc: ahora.toUTC().toISO(),
      local: ahora.setZone(zona).toISO(),
      zona,
    });
  });

  router.get('/test-gemini', async (_req, res) => {
    if (!chat) {
      res.status(503).json({ ok: false, error: 'LLM no configurado (LLM_API_KEY)' });
      return;
    }

    console.log('🧪 Probando conexión con el LLM…');
    try {
      const respuesta = await chat.completar({
        system: 'Eres un asistente útil. Responde en español.',
        user: 'Hola, ¿puedes saludarme?',
        maxTokens: 100,
        temperature: 0.7,
      });
      console.log('✅ Conexión exitosa:', respuesta);
      res.json({ ok: true, model: chat.modelo, respuesta });
    } catch (e) {
      console.error('❌ Error de conexión con el LLM:', mensajeDeError(e));
      res.status(502).json({ ok: false, model: chat.modelo, error: mensajeDeError(e) });
    }
  });

  return router;
}
