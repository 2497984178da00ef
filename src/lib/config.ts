// src/lib/config.ts
import dotenv from 'dotenv';
import * as path from 'path';

if (process.env.NODE_ENV !== 'production') {
  dotenv.config({ path: path.resolve(__dirname, '../../.env.local') });
}

export type TwilioConfig = {
  accountSid: string;
  authToken: string;
  numeroWhatsApp: string;
  timeoutMs: number;
};

export type LlmConfig = {
  apiKey: string;
  baseURL: string;
  model: string;
  timeoutMs: number;
};

export type AppConfig = {
  port: number;
  databaseUrl: string | null;
  databaseSsl: boolean;
  /** null → Twilio deshabilitado (no se envían respuestas) */
  twilio: TwilioConfig | null;
  /** null → se usa solo el responder por reglas */
  llm: LlmConfig | null;
  panelOrigins: string[];
  negociosPath: string;
};

type Env = Record<string, string | undefined>;

const DEFAULT_LLM_BASE_URL = 'https://openrouter.ai/api/v1';
const DEFAULT_LLM_MODEL = 'google/gemini-2.0-flash-exp:free';

function texto(env: Env, key: string): string {
  return (env[key] || '').trim();
}

function entero(env: Env, key: string, fallback: number): number {
  const n = parseInt(texto(env, key), 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export function cargarConfig(env: Env = process.env): AppConfig {
  const accountSid = texto(env, 'TWILIO_ACCOUNT_SID');
  const authToken = texto(env, 'TWILIO_AUTH_TOKEN');
  const numeroWhatsApp = texto(env, 'TWILIO_WHATSAPP_NUMBER');

  let twilio: TwilioConfig | null = null;
  if (accountSid && authToken && numeroWhatsApp) {
    twilio = {
      accountSid,
      authToken,
      numeroWhatsApp,
      timeoutMs: entero(env, 'TWILIO_TIMEOUT_MS', 10_000),
    };
  } else {
    console.warn('⚠️ Twilio sin configurar (TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN o TWILIO_WHATSAPP_NUMBER). No se enviarán respuestas.');
  }

  const apiKey = texto(env, 'LLM_API_KEY') || texto(env, 'OPENROUTER_API_KEY');
  const llm: LlmConfig | null = apiKey
    ? {
        apiKey,
        baseURL: texto(env, 'LLM_BASE_URL') || DEFAULT_LLM_BASE_URL,
        model: texto(env, 'LLM_MODEL') || DEFAULT_LLM_MODEL,
        timeoutMs: entero(env, 'LLM_TIMEOUT_MS', 10_000),
      }
    : null;

  if (!llm) {
    console.warn('⚠️ LLM_API_KEY no definida: se responderá solo con reglas.');
  }

  return {
    port: entero(env, 'PORT', 3001),
    databaseUrl: texto(env, 'DATABASE_URL') || null,
    databaseSsl: texto(env, 'DATABASE_SSL') === 'true',
    twilio,
    llm,
    panelOrigins: texto(env, 'PANEL_ORIGINS')
      .split(',')
      .map((o) => o.trim())
      .filter(Boolean),
    negociosPath:
      texto(env, 'NEGOCIOS_PATH') || path.resolve(__dirname, '../../config/negocios.json'),
  };
}
