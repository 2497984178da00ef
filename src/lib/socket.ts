// src/lib/socket.ts
import { Server as HttpServer } from 'http';
import { Server as IOServer, Socket } from 'socket.io';
import type { Contacto, Mensaje } from './contactos/tipos';

let io: IOServer | null = null;

/**
 * Inicializa Socket.IO sobre el servidor HTTP. Se llama una sola vez desde server.ts.
 * El panel se suscribe a "message:new" para refrescar conversaciones.
 */
export function initSocket(server: HttpServer, origins: string[]) {
  io = new IOServer(server, {
    cors: {
      origin: origins.length ? origins : false,
      methods: ['GET', 'POST'],
    },
  });

  io.on('connection', (socket: Socket) => {
    console.log('🟢 Socket conectado:', socket.id);
    socket.on('disconnect', () => {
      console.log('🔴 Socket desconectado:', socket.id);
    });
  });

  return io;
}

/** null si initSocket no se ha llamado (tests, scripts). */
export function getIO(): IOServer | null {
  return io;
}

export type EventoMensajeNuevo = {
  id: number;
  phone: string;
  contact_id: number;
  direction: Mensaje['direction'];
  content: string;
  timestamp: string;
  message_sid: string | null;
};

export function aEventoMensaje(contacto: Contacto, mensaje: Mensaje): EventoMensajeNuevo {
  return {
    id: mensaje.id,
    phone: contacto.phone,
    contact_id: contacto.id,
    direction: mensaje.direction,
    content: mensaje.content,
    timestamp: mensaje.timestamp.toISOString(),
    message_sid: mensaje.message_sid,
  };
}

export function emitirMensajeNuevo(evento: EventoMensajeNuevo): void {
  const socket = getIO();
  if (!socket) return;
  socket.emit('message:new', evento);
}
