import dotenv from 'dotenv';
import { z } from 'zod';
import { StartupError } from '../lib/errors';

dotenv.config();

const port = z.coerce.number().int().min(0).max(65535);
const flag = z.enum(['true', 'false', '1', '0']);

const envSchema = z.object({
  TCP_HOST: z.string().min(1).default('0.0.0.0'),
  TCP_PORT: port.default(22222),
  HTTP_ENABLED: flag.default('true'),
  HTTP_PORT: port.default(4000),
  CORS_ORIGIN: z.string().default('*'),
  HANDSHAKE_REQUIRED: flag.default('false'),
  GAME_ID: z.string().min(1).default('tic-tac-toe'),
  REQUEUE_AFTER_MATCH: flag.default('true'),
  KEEP_ALIVE_MS: z.coerce.number().int().min(0).default(30000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

const isOn = (value: z.infer<typeof flag>) => value === 'true' || value === '1';

export function loadEnv(source: NodeJS.ProcessEnv = process.env) {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new StartupError(`Invalid configuration: ${problems}`);
  }
  const e = parsed.data;

  return {
    tcpHost: e.TCP_HOST,
    tcpPort: e.TCP_PORT,
    httpEnabled: isOn(e.HTTP_ENABLED),
    httpPort: e.HTTP_PORT,
    corsOrigin: e.CORS_ORIGIN,
    handshakeRequired: isOn(e.HANDSHAKE_REQUIRED),
    gameId: e.GAME_ID,
    requeueAfterMatch: isOn(e.REQUEUE_AFTER_MATCH),
    keepAliveMs: e.KEEP_ALIVE_MS,
    logLevel: e.LOG_LEVEL,
  };
}

export type Env = ReturnType<typeof loadEnv>;
