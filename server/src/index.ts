import { loadEnv } from './config/env';
import { createGameServer } from './server';

async function start() {
  const env = loadEnv();
  const server = createGameServer(env);

  const { tcp } = await server.start();
  console.log(`[server] tic tac toe ready, players can join on port ${tcp.port}`);

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received`);
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[server] shutdown failed', err);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

start().catch((err: unknown) => {
  console.error('[server] startup failed', err);
  process.exit(1);
});
