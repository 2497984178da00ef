// src/lib/dependencias.ts
import type { ContactStore } from './contactos/tipos';
import type { ChatClient } from './llm/chatClient';
import type { RegistroNegocios } from './negocios';
import type { Responder } from './respuestas/tipos';
import type { MessageGateway } from './senders/whatsapp';
import type { EventoMensajeNuevo } from './socket';

/** Todo lo que los routers necesitan; se arma una vez en server.ts. */
export type DependenciasApp = {
  store: ContactStore;
  responder: Responder;
  gateway: MessageGateway;
  negocios: RegistroNegocios;
  /** null si no hay LLM configurado */
  chat: ChatClient | null;
  notificar?: (evento: EventoMensajeNuevo) => void;
  panelOrigins?: string[];
};
