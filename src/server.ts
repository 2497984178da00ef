// src/server.ts
import http from 'http';
import { createApp } from './app';
import { prepararStore } from './lib/contactos/prepararStore';
import { cargarConfig } from './lib/config';
import { crearPool } from './lib/db';
import { OpenAIChatClient } from './lib/llm/chatClient';
import { cargarNegocios } from './lib/negocios';
import { crearResponder } from './lib/respuestas';
import { crearGateway } from './lib/senders/whatsapp';
import { emitirMensajeNuevo, initSocket } from './lib/socket';

async function main() {
  const config = cargarConfig();
  const negocios = await cargarNegocios(config.negociosPath);

  const pool = crearPool(config);
  const store = await prepararStore(pool);

  const chat = config.llm ? new OpenAIChatClient(config.llm) : null;

  const app = createApp({
    store,
    responder: crearResponder(chat),
    gateway: crearGateway(config.twilio),
    negocios,
    chat,
    notificar: emitirMensajeNuevo,
    panelOrigins: config.panelOrigins,
  });

  const server = http.createServer(app);
  initSocket(server, config.panelOrigins);

  server.listen(config.port, () => {
    console.log(`🚀 Servidor corriendo en http://localhost:${config.port}`);
  });

  const cerrar = (signal: string) => {
    console.log(`👋 ${signal} recibido, cerrando…`);
    server.close(() => {
      if (!pool) return process.exit(0);
      pool.end().then(
        () => process.exit(0),
        (e: unknown) => {
          console.error('❌ Error cerrando el pool:', e);
          process.exit(1);
        }
      );
    });
  };
  process.on('SIGTERM', () => cerrar('SIGTERM'));
  process.on('SIGINT', () => cerrar('SIGINT'));
}

main().catch((e: unknown) => {
  console.error('💥 Error fatal al arrancar:', e);
  process.exit(1);
});
