// src/lib/contactos/prepararStore.ts
import type { ClienteSql } from '../db';
import { inicializarBaseDeDatos } from '../inicializarDb';
import { PgContactStore } from './pgStore';
import { storeSinDb } from './sinDb';
import type { ContactStore } from './tipos';

/**
 * Store de Postgres solo si el schema quedó aplicado; si no hay pool o la base
 * no respondió tras los reintentos, el de 503 (hay que reiniciar para reconectar).
 */
export async function prepararStore(
  pool: ClienteSql | null,
  inicializar: (db: ClienteSql) => Promise<boolean> = inicializarBaseDeDatos
): Promise<ContactStore> {
  if (!pool) return storeSinDb;

  const lista = await inicializar(pool);
  if (!lista) {
    console.warn('⚠️ Base de datos sin inicializar: contactos y mensajes responderán 503');
    return storeSinDb;
  }
  return new PgContactStore(pool);
}
