// src/lib/contactos/pgStore.ts
import type { ClienteSql } from '../db';
import {
  esEstadoContacto,
  type CambiosContacto,
  type Contacto,
  type ContactStore,
  type Direccion,
  type EstadoContacto,
  type FiltroContactos,
  type Mensaje,
  type NuevoMensaje,
} from './tipos';

type ContactoRow = {
  id: number;
  phone: string;
  status: string;
  first_contact: Date;
  last_contact: Date;
  message_count: number;
  notes: string | null;
  is_competitor: boolean;
};

type MensajeRow = {
  id: number;
  contact_id: number;
  direction: string;
  content: string;
  timestamp: Date;
  message_sid: string | null;
};

const COLUMNAS_CONTACTO = `id, phone, status, first_contact, last_contact, message_count, notes, is_competitor`;
const COLUMNAS_MENSAJE = `id, contact_id, direction, content, timestamp, message_sid`;

function aContacto(row: ContactoRow): Contacto {
  return {
    id: row.id,
    phone: row.phone,
    status: esEstadoContacto(row.status) ? row.status : 'prospecto_nuevo',
    first_contact: row.first_contact,
    last_contact: row.last_contact,
    message_count: Number(row.message_count) || 0,
    notes: row.notes,
    is_competitor: row.is_competitor === true,
  };
}

function aMensaje(row: MensajeRow): Mensaje {
  const direction: Direccion = row.direction === 'outgoing' ? 'outgoing' : 'incoming';
  return {
    id: row.id,
    contact_id: row.contact_id,
    direction,
    content: row.content ?? '',
    timestamp: row.timestamp,
    message_sid: row.message_sid,
  };
}

export class PgContactStore implements ContactStore {
  constructor(private readonly pool: ClienteSql) {}

  async obtenerOCrearContacto(phone: string): Promise<{ contacto: Contacto; creado: boolean }> {
    // DO UPDATE (no DO NOTHING) para que RETURNING devuelva la fila existente
    const { rows } = await this.pool.query<ContactoRow & { inserted: boolean }>(
      `INSERT INTO contacts (phone, status, first_contact, last_contact, message_count, is_competitor)
       VALUES ($1, 'prospecto_nuevo', NOW(), NOW(), 0, FALSE)
       ON CONFLICT (phone) DO UPDATE SET phone = EXCLUDED.phone
       RETURNING ${COLUMNAS_CONTACTO}, (xmax = 0) AS inserted`,
      [phone]
    );
    const row = rows[0];
    if (!row) throw new Error(`No se pudo registrar el contacto ${phone}`);
    return { contacto: aContacto(row), creado: row.inserted === true };
  }

  async buscarContacto(phone: string): Promise<Contacto | null> {
    const { rows } = await this.pool.query<ContactoRow>(
      `SELECT ${COLUMNAS_CONTACTO} FROM contacts WHERE phone = $1 LIMIT 1`,
      [phone]
    );
    return rows[0] ? aContacto(rows[0]) : null;
  }

  async guardarMensaje(nuevo: NuevoMensaje): Promise<Mensaje> {
    const { rows } = await this.pool.query<MensajeRow>(
      `WITH nuevo AS (
         INSERT INTO messages (contact_id, direction, content, timestamp, message_sid)
         VALUES ($1, $2, $3, NOW(), $4)
         RETURNING ${COLUMNAS_MENSAJE}
       ), contador AS (
         UPDATE contacts
            SET message_count = message_count + 1,
                last_contact = NOW()
          WHERE id = $1
       )
       SELECT ${COLUMNAS_MENSAJE} FROM nuevo`,
      [nuevo.contactId, nuevo.direction, nuevo.content, nuevo.messageSid ?? null]
    );
    const row = rows[0];
    if (!row) throw new Error(`No se pudo guardar el mensaje del contacto ${nuevo.contactId}`);
    return aMensaje(row);
  }

  async historial(contactId: number, limit: number): Promise<Mensaje[]> {
    const { rows } = await this.pool.query<MensajeRow>(
      `SELECT ${COLUMNAS_MENSAJE} FROM (
         SELECT ${COLUMNAS_MENSAJE}
           FROM messages
          WHERE contact_id = $1
          ORDER BY timestamp DESC, id DESC
          LIMIT $2
       ) ultimos
       ORDER BY timestamp ASC, id ASC`,
      [contactId, limit]
    );
    return rows.map(aMensaje);
  }

  async listarContactos(filtro: FiltroContactos): Promise<Contacto[]> {
    const params: Array<string | number> = [];
    let where = '';
    if (filtro.status) {
      params.push(filtro.status);
      where = `WHERE status = $1`;
    }
    params.push(filtro.limit, filtro.offset);

    const { rows } = await this.pool.query<ContactoRow>(
      `SELECT ${COLUMNAS_CONTACTO}
         FROM contacts
         ${where}
        ORDER BY last_contact DESC, id DESC
        LIMIT $${params.length - 1} OFFSET $${params.length}`,
      params
    );
    return rows.map(aContacto);
  }

  async contarContactos(status?: EstadoContacto): Promise<number> {
    const { rows } = status
      ? await this.pool.query<{ total: number }>(
          `SELECT COUNT(*)::int AS total FROM contacts WHERE status = $1`,
          [status]
        )
      : await this.pool.query<{ total: number }>(`SELECT COUNT(*)::int AS total FROM contacts`);
    return rows[0]?.total ?? 0;
  }

  async actualizarContacto(id: number, cambios: CambiosContacto): Promise<Contacto> {
    const sets: string[] = [];
    const params: Array<string | number | boolean | null> = [];

    if (cambios.status !== undefined) {
      params.push(cambios.status);
      sets.push(`status = $${params.length}`);
    }
    if (cambios.notes !== undefined) {
      params.push(cambios.notes);
      sets.push(`notes = $${params.length}`);
    }
    if (cambios.is_competitor !== undefined) {
      params.push(cambios.is_competitor);
      sets.push(`is_competitor = $${params.length}`);
    }

    params.push(id);
    const sql = sets.length
      ? `UPDATE contacts SET ${sets.join(', ')} WHERE id = $${params.length} RETURNING ${COLUMNAS_CONTACTO}`
      : `SELECT ${COLUMNAS_CONTACTO} FROM contacts WHERE id = $${params.length}`;

    const { rows } = await this.pool.query<ContactoRow>(sql, params);
    const row = rows[0];
    if (!row) throw new Error(`Contacto ${id} no existe`);
    return aContacto(row);
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (e) {
      console.warn('⚠️ Ping a la base de datos fallido:', e instanceof Error ? e.message : e);
      return false;
    }
  }
}
