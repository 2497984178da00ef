// Se lee en cada llamada: .env.local se carga después de importar este módulo
export function debugActivo(): boolean {
  return process.env.DEBUG_LOGS === 'true';
}

export function debug(...args: unknown[]) {
  if (debugActivo()) console.log(...args);
}

/** Extrae un mensaje legible de cualquier valor lanzado. */
export function mensajeDeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === 'string') return e;
  try {
    return JSON.stringify(e);
  } catch {
    return String(e);
  }
}
