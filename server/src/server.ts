import http from 'http';
import type { AddressInfo } from 'net';
import express from 'express';
import cors from 'cors';
import type { Server as SocketIOServer } from 'socket.io';
import type { Env } from './config/env';
import healthRouter from './routes/health';
import { createStatsRouter } from './routes/stats';
import { createSocketServer } from './socket/index';
import { ConnectionListener, type AcceptingServer } from './net/listener';
import { Matchmaker } from './services/matchmakingService';
import { Session } from './services/session';
import type { Transport } from './transport/types';
import { createLogger, type Logger } from './lib/logger';

export type ServerConfig = Pick<
  Env,
  | 'tcpHost'
  | 'tcpPort'
  | 'httpEnabled'
  | 'httpPort'
  | 'corsOrigin'
  | 'handshakeRequired'
  | 'gameId'
  | 'requeueAfterMatch'
  | 'keepAliveMs'
  | 'logLevel'
>;

export interface GameServerDeps {
  createTcpServer?: () => AcceptingServer;
}

export interface StartedAddresses {
  tcp: AddressInfo;
  http: AddressInfo | null;
}

/**
 * Wires the lobby to both ways in: raw TCP through the listener and browser
 * clients through socket.io on the HTTP side-channel.
 */
export function createGameServer(config: ServerConfig, deps: GameServerDeps = {}) {
  const log = (tag: string): Logger => createLogger(tag, config.logLevel);
  const logger = log('server');
  const sessions = new Set<Session>();
  const matchmaker = new Matchmaker({ requeueAfterMatch: config.requeueAfterMatch, logger: log('mm') });
  const sessionLogger = log('session');

  function openSession(transport: Transport): Session {
    const session = new Session(transport, matchmaker, {
      handshake: config.handshakeRequired ? { gameId: config.gameId } : null,
      logger: sessionLogger,
      onClosed: (closed) => sessions.delete(closed),
    });
    sessions.add(session);
    session.open();
    return session;
  }

  const listener = new ConnectionListener(openSession, {
    host: config.tcpHost,
    port: config.tcpPort,
    keepAliveMs: config.keepAliveMs,
    logger: log('listener'),
    createServer: deps.createTcpServer,
  });

  const app = express();
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json());
  app.use('/', healthRouter);
  app.use('/', createStatsRouter(() => ({ ...matchmaker.stats, sessions: sessions.size })));

  let httpServer: http.Server | null = null;
  let io: SocketIOServer | null = null;

  function listenHttp(server: http.Server): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(config.httpPort, () => {
        server.off('error', reject);
        const address = server.address();
        resolve(address && typeof address === 'object' ? address : { address: '::', family: 'IPv6', port: config.httpPort });
      });
    });
  }

  async function start(): Promise<StartedAddresses> {
    const tcp = await listener.listen();
    let httpAddress: AddressInfo | null = null;

    if (config.httpEnabled) {
      httpServer = http.createServer(app);
      io = createSocketServer(httpServer, openSession, { corsOrigin: config.corsOrigin, logger: log('socket') });
      httpAddress = await listenHttp(httpServer);
      logger.info(`listening on http://localhost:${httpAddress.port}`);
    }

    return { tcp, http: httpAddress };
  }

  async function stop(): Promise<void> {
    logger.info(`shutting down (${sessions.size} sessions)`);
    // the TCP server only reports closed once every connection has ended
    for (const session of Array.from(sessions)) session.close();
    await listener.close();
    if (io) {
      const closing = io;
      io = null;
      await new Promise<void>((resolve) => closing.close(() => resolve()));
    }
    httpServer = null;
  }

  return { app, matchmaker, sessions, start, stop };
}

export type GameServer = ReturnType<typeof createGameServer>;
