// src/lib/respuestas/index.ts
import type { ChatClient } from '../llm/chatClient';
import { ResponderLLM } from './llm';
import { ResponderReglas } from './reglas';
import type { Responder } from './tipos';

/** LLM si hay cliente configurado; si no, reglas. */
export function crearResponder(chat: ChatClient | null): Responder {
  const responder = chat ? new ResponderLLM(chat) : new ResponderReglas();
  console.log(`🤖 Responder activo: ${responder.nombre}${chat ? ` (${chat.modelo})` : ''}`);
  return responder;
}
