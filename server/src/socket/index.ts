import type { Server as HTTPServer } from 'http';
import { Server } from 'socket.io';
import { SocketIoTransport } from '../transport/socketIoTransport';
import { createLogger, type Logger } from '../lib/logger';

export interface SocketServerOptions {
  corsOrigin: string;
  logger?: Logger;
}

export function createSocketServer(
  httpServer: HTTPServer,
  onConnection: (transport: SocketIoTransport) => void,
  options: SocketServerOptions,
) {
  const logger = options.logger ?? createLogger('socket');
  const io = new Server(httpServer, {
    cors: {
      origin: options.corsOrigin,
      methods: ['GET', 'POST'],
    },
  });

  io.on('connection', (socket) => {
    const sid = socket.id;
    logger.info(`connected: ${sid}`);

    socket.on('disconnect', (reason) => {
      logger.info(`disconnected: ${sid} reason=${reason}`);
    });

    try {
      onConnection(new SocketIoTransport(socket));
    } catch (err) {
      logger.error(`failed to set up ${sid}`, err);
      socket.disconnect(true);
    }
  });

  return io;
}
