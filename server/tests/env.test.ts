import { describe, expect, it } from 'vitest';
import { loadEnv } from '../src/config/env';
import { StartupError } from '../src/lib/errors';

describe('loadEnv', () => {
  it('falls back to defaults', () => {
    expect(loadEnv({})).toEqual({
      tcpHost: '0.0.0.0',
      tcpPort: 22222,
      httpEnabled: true,
      httpPort: 4000,
      corsOrigin: '*',
      handshakeRequired: false,
      gameId: 'tic-tac-toe',
      requeueAfterMatch: true,
      keepAliveMs: 30000,
      logLevel: 'info',
    });
  });

  it('reads overrides from the environment', () => {
    const env = loadEnv({
      TCP_PORT: '7000',
      HTTP_ENABLED: '0',
      HANDSHAKE_REQUIRED: 'true',
      REQUEUE_AFTER_MATCH: 'false',
      LOG_LEVEL: 'silent',
    });
    expect(env.tcpPort).toBe(7000);
    expect(env.httpEnabled).toBe(false);
    expect(env.handshakeRequired).toBe(true);
    expect(env.requeueAfterMatch).toBe(false);
    expect(env.logLevel).toBe('silent');
  });

  it('rejects invalid values as a startup failure', () => {
    expect(() => loadEnv({ TCP_PORT: '70000' })).toThrow(StartupError);
    expect(() => loadEnv({ LOG_LEVEL: 'loud' })).toThrow('LOG_LEVEL');
  });
});
