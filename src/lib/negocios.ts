// src/lib/negocios.ts
import { readFile } from 'fs/promises';
import { normalizarTelefono } from './whatsapp/normalize';
import { esIntencion, type Intencion } from './respuestas/tipos';

export type ReglaPalabras = {
  intencion: Intencion;
  palabras: readonly string[];
  respuesta: string;
};

export type EstadoConMensaje = 'competencia' | 'prospecto_informado';

export type PerfilNegocio = {
  id: string;
  nombre: string;
  /** Números del gateway (campo To) que atiende este negocio, normalizados */
  numeros: readonly string[];
  zonaHoraria: string;
  conocimiento: readonly string[];
  reglas: readonly ReglaPalabras[];
  menu: string;
  mensajesPorEstado: Readonly<Partial<Record<EstadoConMensaje, string>>>;
};

type Objeto = Record<string, unknown>;

function esObjeto(v: unknown): v is Objeto {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function textoRequerido(obj: Objeto, key: string, donde: string): string {
  const v = obj[key];
  if (typeof v !== 'string' || !v.trim()) {
    throw new Error(`negocios: "${donde}.${key}" debe ser un texto no vacío`);
  }
  return v;
}

function listaDeTextos(obj: Objeto, key: string, donde: string): string[] {
  const v = obj[key];
  if (v === undefined) return [];
  if (!Array.isArray(v) || !v.every((x): x is string => typeof x === 'string')) {
    throw new Error(`negocios: "${donde}.${key}" debe ser una lista de textos`);
  }
  return v;
}

function leerRegla(raw: unknown, donde: string): ReglaPalabras {
  if (!esObjeto(raw)) throw new Error(`negocios: "${donde}" debe ser un objeto`);
  const intencion = raw.intencion;
  if (!esIntencion(intencion)) {
    throw new Error(`negocios: "${donde}.intencion" desconocida: ${String(intencion)}`);
  }
  const palabras = listaDeTextos(raw, 'palabras', donde);
  if (!palabras.length) throw new Error(`negocios: "${donde}.palabras" está vacía`);
  return Object.freeze({
    intencion,
    palabras: Object.freeze(palabras),
    respuesta: textoRequerido(raw, 'respuesta', donde),
  });
}

export function leerPerfil(id: string, raw: unknown): PerfilNegocio {
  const donde = `negocios.${id}`;
  if (!esObjeto(raw)) throw new Error(`negocios: "${donde}" debe ser un objeto`);

  const reglasRaw = raw.reglas;
  if (!Array.isArray(reglasRaw) || !reglasRaw.length) {
    throw new Error(`negocios: "${donde}.reglas" debe ser una lista no vacía`);
  }

  const porEstado = esObjeto(raw.mensajesPorEstado) ? raw.mensajesPorEstado : {};
  const mensajesPorEstado: Partial<Record<EstadoConMensaje, string>> = {};
  for (const estado of ['competencia', 'prospecto_informado'] as const) {
    const m = porEstado[estado];
    if (typeof m === 'string' && m.trim()) mensajesPorEstado[estado] = m;
  }

  return Object.freeze({
    id,
    nombre: textoRequerido(raw, 'nombre', donde),
    numeros: Object.freeze(listaDeTextos(raw, 'numeros', donde).map(normalizarTelefono).filter(Boolean)),
    zonaHoraria: typeof raw.zonaHoraria === 'string' && raw.zonaHoraria ? raw.zonaHoraria : 'America/Mexico_City',
    conocimiento: Object.freeze(listaDeTextos(raw, 'conocimiento', donde)),
    reglas: Object.freeze(reglasRaw.map((r, i) => leerRegla(r, `${donde}.reglas[${i}]`))),
    menu: textoRequerido(raw, 'menu', donde),
    mensajesPorEstado: Object.freeze(mensajesPorEstado),
  });
}

/**
 * Perfiles de negocio cargados una sola vez al arrancar. Inmutable: se pasa
 * por referencia a los handlers en vez de vivir como estado global.
 */
export class RegistroNegocios {
  private readonly porNumero = new Map<string, PerfilNegocio>();

  constructor(
    private readonly perfiles: ReadonlyMap<string, PerfilNegocio>,
    private readonly idDefault: string
  ) {
    if (!perfiles.has(idDefault)) {
      throw new Error(`negocios: el negocio por defecto "${idDefault}" no existe`);
    }
    for (const perfil of perfiles.values()) {
      for (const numero of perfil.numeros) this.porNumero.set(numero, perfil);
    }
  }

  get porDefecto(): PerfilNegocio {
    const perfil = this.perfiles.get(this.idDefault);
    if (!perfil) throw new Error(`negocios: falta "${this.idDefault}"`);
    return perfil;
  }

  /** Perfil que atiende el número `to` (campo To del webhook); si no hay, el de por defecto. */
  resolver(to?: string | null): PerfilNegocio {
    const numero = normalizarTelefono(to);
    return (numero && this.porNumero.get(numero)) || this.porDefecto;
  }

  lista(): PerfilNegocio[] {
    return [...this.perfiles.values()];
  }

  static desdeJson(raw: unknown): RegistroNegocios {
    if (!esObjeto(raw) || !esObjeto(raw.negocios)) {
      throw new Error('negocios: se esperaba { "default": ..., "negocios": { ... } }');
    }
    const perfiles = new Map<string, PerfilNegocio>();
    for (const [id, perfil] of Object.entries(raw.negocios)) {
      perfiles.set(id, leerPerfil(id, perfil));
    }
    const idDefault = typeof raw.default === 'string' ? raw.default : perfiles.keys().next().value;
    if (!idDefault) throw new Error('negocios: no hay ningún negocio configurado');
    return new RegistroNegocios(perfiles, idDefault);
  }
}

export async function cargarNegocios(ruta: string): Promise<RegistroNegocios> {
  const contenido = await readFile(ruta, 'utf8');
  const registro = RegistroNegocios.desdeJson(JSON.parse(contenido));
  console.log(`🏫 Negocios cargados: ${registro.lista().map((n) => n.nombre).join(', ')}`);
  return registro;
}
