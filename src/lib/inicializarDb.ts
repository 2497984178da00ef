// src/lib/inicializarDb.ts
import { readFile } from 'fs/promises';
import * as path from 'path';
import { conReintentos, esErrorTransitorioDb, type OpcionesReintento } from './reintentos';
import { mensajeDeError } from './logger';

export const SCHEMA_PATH = path.resolve(__dirname, '../../db/schema.sql');

type Ejecutor = { query: (sql: string) => Promise<unknown> };

/**
 * Crea las tablas si no existen. Reintenta con backoff exponencial solo los
 * errores de conexión; un error de SQL se relanza de inmediato.
 * Devuelve false si se agotaron los reintentos (el servicio sigue degradado).
 */
export async function inicializarBaseDeDatos(
  db: Ejecutor,
  opts: OpcionesReintento & { schemaPath?: string } = {}
): Promise<boolean> {
  const sql = await readFile(opts.schemaPath ?? SCHEMA_PATH, 'utf8');

  try {
    await conReintentos(() => db.query(sql), {
      intentos: 5,
      baseMs: 1_000,
      esTransitorio: esErrorTransitorioDb,
      onReintento: (intento, espera, e) =>
        console.warn(`⏳ DB no disponible (intento ${intento}): ${mensajeDeError(e)}. Reintentando en ${espera} ms`),
      ...opts,
    });
    console.log('✅ Tablas contacts/messages listas');
    return true;
  } catch (e) {
    if (!esErrorTransitorioDb(e)) throw e;
    console.error('❌ No se pudo conectar a la base de datos; el servicio arranca degradado:', mensajeDeError(e));
    return false;
  }
}
