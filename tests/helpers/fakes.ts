import * as path from 'path';
import type { Contacto } from '../../src/lib/contactos/tipos';
import type { ChatClient, PeticionChat } from '../../src/lib/llm/chatClient';
import { cargarNegocios, type RegistroNegocios } from '../../src/lib/negocios';
import type { MessageGateway, ResultadoEnvio } from '../../src/lib/senders/whatsapp';

export const NEGOCIOS_PATH = path.resolve(__dirname, '../../config/negocios.json');

export function cargarRegistro(): Promise<RegistroNegocios> {
  return cargarNegocios(NEGOCIOS_PATH);
}

export function contacto(parcial: Partial<Contacto> = {}): Contacto {
  return {
    id: 1,
    phone: '+5215512345678',
    status: 'prospecto_nuevo',
    first_contact: new Date('2024-01-15T15:00:00Z'),
    last_contact: new Date('2024-01-15T15:00:00Z'),
    message_count: 0,
    notes: null,
    is_competitor: false,
    ...parcial,
  };
}

export class FakeGateway implements MessageGateway {
  readonly configurado = true;
  readonly enviados: Array<{ telefono: string; texto: string }> = [];
  private siguiente = 1;

  constructor(private readonly falla: string | null = null) {}

  async enviar(telefono: string, texto: string): Promise<ResultadoEnvio> {
    this.enviados.push({ telefono, texto });
    if (this.falla) return { ok: false, error: this.falla };
    return { ok: true, sid: `SM${String(this.siguiente++).padStart(4, '0')}`, partes: 1 };
  }
}

export class FakeChat implements ChatClient {
  readonly modelo = 'modelo-de-prueba';
  readonly peticiones: PeticionChat[] = [];

  constructor(private readonly responder: (p: PeticionChat) => Promise<string>) {}

  completar(peticion: PeticionChat): Promise<string> {
    this.peticiones.push(peticion);
    return this.responder(peticion);
  }
}
