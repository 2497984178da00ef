// src/lib/errors.ts

/**
 * Error con código HTTP. El handler global de app.ts responde con `status`.
 */
export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
  }
}

export class ContactoNoEncontradoError extends HttpError {
  constructor(telefono: string) {
    super(404, `Contacto no encontrado: ${telefono}`);
    this.name = 'ContactoNoEncontradoError';
  }
}

/** Status HTTP del error; también respeta `status` de los errores de body-parser. */
export function statusDeError(e: unknown): number {
  if (e instanceof HttpError) return e.status;
  if (typeof e === 'object' && e !== null && 'status' in e) {
    const status = e.status;
    if (typeof status === 'number' && status >= 400 && status < 600) return status;
  }
  return 500;
}
