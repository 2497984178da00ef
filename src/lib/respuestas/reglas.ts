// src/lib/respuestas/reglas.ts
import { normalizarTexto } from '../normalizarTexto';
import type { PerfilNegocio } from '../negocios';
import type { ContextoRespuesta, Intencion, Respuesta, Responder } from './tipos';

/** Primera regla cuya palabra clave aparece en el mensaje (sin tildes ni mayúsculas). */
export function clasificar(mensaje: string, negocio: PerfilNegocio): Intencion | null {
  const texto = normalizarTexto(mensaje || '');
  if (!texto) return null;

  for (const regla of negocio.reglas) {
    if (regla.palabras.some((p) => texto.includes(normalizarTexto(p)))) {
      return regla.intencion;
    }
  }
  return null;
}

export function respuestaPorReglas(mensaje: string, negocio: PerfilNegocio): Respuesta {
  const intencion = clasificar(mensaje, negocio);
  const regla = intencion ? negocio.reglas.find((r) => r.intencion === intencion) : undefined;
  return {
    texto: regla ? regla.respuesta : negocio.menu,
    intencion,
    origen: 'reglas',
  };
}

/**
 * Con más de un mensaje previo, "competencia" y "prospecto_informado" reciben
 * su mensaje propio antes de mirar palabras clave.
 */
export function respuestaPorEstado(ctx: ContextoRespuesta): Respuesta | null {
  const { contacto, negocio } = ctx;
  if (contacto.message_count <= 1) return null;
  if (contacto.status !== 'competencia' && contacto.status !== 'prospecto_informado') return null;

  const texto = negocio.mensajesPorEstado[contacto.status];
  if (!texto) return null;
  return { texto, intencion: clasificar(ctx.mensaje, negocio), origen: 'estado' };
}

export class ResponderReglas implements Responder {
  readonly nombre = 'reglas';

  async responder(ctx: ContextoRespuesta): Promise<Respuesta> {
    return respuestaPorEstado(ctx) ?? respuestaPorReglas(ctx.mensaje, ctx.negocio);
  }
}
