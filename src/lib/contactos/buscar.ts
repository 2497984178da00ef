// src/lib/contactos/buscar.ts
import { ContactoNoEncontradoError } from '../errors';
import { normalizarTelefono } from '../whatsapp/normalize';
import type { Contacto, ContactStore } from './tipos';

/** Busca por teléfono (con o sin prefijo "whatsapp:"); 404 si no existe. */
export async function buscarContactoOError(store: ContactStore, telefonoRaw: string): Promise<Contacto> {
  const telefono = normalizarTelefono(telefonoRaw);
  if (!telefono) throw new ContactoNoEncontradoError(telefonoRaw);

  const contacto = await store.buscarContacto(telefono);
  if (!contacto) throw new ContactoNoEncontradoError(telefono);
  return contacto;
}
