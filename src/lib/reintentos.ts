// src/lib/reintentos.ts

export type OpcionesReintento = {
  intentos?: number;
  baseMs?: number;
  /** Si devuelve false el error se relanza sin reintentar */
  esTransitorio?: (e: unknown) => boolean;
  esperar?: (ms: number) => Promise<void>;
  onReintento?: (intento: number, esperaMs: number, e: unknown) => void;
};

const dormir = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const CODIGOS_RED = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'EHOSTUNREACH']);

function codigoDe(e: unknown): string {
  if (typeof e === 'object' && e !== null && 'code' in e) {
    return typeof e.code === 'string' ? e.code : '';
  }
  return '';
}

/**
 * Errores de arranque que vale la pena reintentar: red caída o Postgres
 * todavía levantando. SQLSTATE clase 08 = connection exception, 57P03 = cannot_connect_now.
 */
export function esErrorTransitorioDb(e: unknown): boolean {
  const code = codigoDe(e);
  if (CODIGOS_RED.has(code)) return true;
  if (code.startsWith('08') || code === '57P03') return true;
  if (!code && e instanceof Error) {
    return /timeout|terminated|connect/i.test(e.message);
  }
  return false;
}

/** Espera antes del intento `n` (1-based): base, 2·base, 4·base… */
export function esperaBackoff(intento: number, baseMs: number): number {
  return baseMs * 2 ** (intento - 1);
}

export async function conReintentos<T>(fn: () => Promise<T>, opts: OpcionesReintento = {}): Promise<T> {
  const intentos = opts.intentos ?? 5;
  const baseMs = opts.baseMs ?? 1_000;
  const esTransitorio = opts.esTransitorio ?? (() => true);
  const esperar = opts.esperar ?? dormir;

  let ultimo: unknown;
  for (let intento = 1; intento <= intentos; intento++) {
    try {
      return await fn();
    } catch (e) {
      ultimo = e;
      if (!esTransitorio(e) || intento === intentos) throw e;
      const espera = esperaBackoff(intento, baseMs);
      opts.onReintento?.(intento, espera, e);
      await esperar(espera);
    }
  }
  throw ultimo;
}

export class TimeoutError extends Error {
  constructor(ms: number, etiqueta: string) {
    super(`${etiqueta}: sin respuesta tras ${ms} ms`);
    this.name = 'TimeoutError';
  }
}

/** Rechaza con TimeoutError si `promesa` no resuelve en `ms`. */
export function conTimeout<T>(promesa: Promise<T>, ms: number, etiqueta = 'operación'): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const limite = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(ms, etiqueta)), ms);
  });
  return Promise.race([promesa, limite]).finally(() => clearTimeout(timer));
}
