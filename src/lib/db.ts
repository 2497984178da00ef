// src/lib/db.ts
import { Pool, type QueryResultRow } from 'pg';
import type { AppConfig } from './config';

/** Lo que usan los stores de Pool: solo query con parámetros. */
export interface ClienteSql {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<{ rows: R[] }>;
}

export function crearPool(config: Pick<AppConfig, 'databaseUrl' | 'databaseSsl'>): Pool | null {
  if (!config.databaseUrl) {
    console.warn('⚠️ DATABASE_URL no definida: el servicio arranca sin base de datos.');
    return null;
  }

  console.log('🔐 DATABASE_URL: cargada correctamente');

  const pool = new Pool({
    connectionString: config.databaseUrl,
    ssl: config.databaseSsl ? { rejectUnauthorized: false } : undefined,
    connectionTimeoutMillis: 5_000,
  });

  // Un cliente inactivo que pierde la conexión no debe tumbar el proceso
  pool.on('error', (err) => {
    console.error('❌ Error en cliente inactivo del pool:', err.message);
  });

  return pool;
}
