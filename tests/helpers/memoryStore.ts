import type {
  CambiosContacto,
  Contacto,
  ContactStore,
  EstadoContacto,
  FiltroContactos,
  Mensaje,
  NuevoMensaje,
} from '../../src/lib/contactos/tipos';

/**
 * ContactStore en memoria con el mismo contrato que PgContactStore.
 * El reloj avanza 1 s por escritura para que el orden sea determinista.
 */
export class MemoryContactStore implements ContactStore {
  readonly contactos: Contacto[] = [];
  readonly mensajes: Mensaje[] = [];
  private reloj: number;

  constructor(inicio = Date.UTC(2024, 0, 15, 15, 0, 0)) {
    this.reloj = inicio;
  }

  private ahora(): Date {
    this.reloj += 1000;
    return new Date(this.reloj);
  }

  async obtenerOCrearContacto(phone: string) {
    const existente = this.contactos.find((c) => c.phone === phone);
    if (existente) return { contacto: { ...existente }, creado: false };

    const ahora = this.ahora();
    const contacto: Contacto = {
      id: this.contactos.length + 1,
      phone,
      status: 'prospecto_nuevo',
      first_contact: ahora,
      last_contact: ahora,
      message_count: 0,
      notes: null,
      is_competitor: false,
    };
    this.contactos.push(contacto);
    return { contacto: { ...contacto }, creado: true };
  }

  async buscarContacto(phone: string) {
    const c = this.contactos.find((x) => x.phone === phone);
    return c ? { ...c } : null;
  }

  async guardarMensaje(nuevo: NuevoMensaje): Promise<Mensaje> {
    const contacto = this.contactos.find((c) => c.id === nuevo.contactId);
    if (!contacto) throw new Error(`Contacto ${nuevo.contactId} no existe`);

    const ahora = this.ahora();
    const mensaje: Mensaje = {
      id: this.mensajes.length + 1,
      contact_id: nuevo.contactId,
      direction: nuevo.direction,
      content: nuevo.content,
      timestamp: ahora,
      message_sid: nuevo.messageSid ?? null,
    };
    this.mensajes.push(mensaje);
    contacto.message_count += 1;
    contacto.last_contact = ahora;
    return { ...mensaje };
  }

  async historial(contactId: number, limit: number) {
    return this.mensajes
      .filter((m) => m.contact_id === contactId)
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime() || a.id - b.id)
      .slice(-limit)
      .map((m) => ({ ...m }));
  }

  async listarContactos(filtro: FiltroContactos) {
    return this.contactos
      .filter((c) => !filtro.status || c.status === filtro.status)
      .sort((a, b) => b.last_contact.getTime() - a.last_contact.getTime() || b.id - a.id)
      .slice(filtro.offset, filtro.offset + filtro.limit)
      .map((c) => ({ ...c }));
  }

  async contarContactos(status?: EstadoContacto) {
    return this.contactos.filter((c) => !status || c.status === status).length;
  }

  async actualizarContacto(id: number, cambios: CambiosContacto) {
    const contacto = this.contactos.find((c) => c.id === id);
    if (!contacto) throw new Error(`Contacto ${id} no existe`);
    if (cambios.status !== undefined) contacto.status = cambios.status;
    if (cambios.notes !== undefined) contacto.notes = cambios.notes;
    if (cambios.is_competitor !== undefined) contacto.is_competitor = cambios.is_competitor;
    return { ...contacto };
  }

  async ping() {
    return true;
  }
}
