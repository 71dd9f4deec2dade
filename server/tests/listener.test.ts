import { EventEmitter } from 'events';
import { Socket, type AddressInfo } from 'net';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConnectionListener } from '../src/net/listener';
import { StartupError } from '../src/lib/errors';
import { silentLogger } from '../src/lib/logger';
import { TcpTransport } from '../src/transport/tcpTransport';

/** Stands in for `net.Server`; the test decides whether binding works. */
class FakeServer extends EventEmitter {
  bindError: Error | null = null;
  listening = false;
  closed = false;
  private port = 0;

  listen(port: number, _host: string, callback: () => void) {
    process.nextTick(() => {
      if (this.bindError) {
        this.emit('error', this.bindError);
        return;
      }
      this.port = port === 0 ? 40123 : port;
      this.listening = true;
      callback();
    });
    return this;
  }

  address(): AddressInfo | null {
    return this.listening ? { address: '127.0.0.1', family: 'IPv4', port: this.port } : null;
  }

  close(callback?: (err?: Error) => void) {
    this.closed = true;
    this.listening = false;
    callback?.();
    return this;
  }
}

const sockets: Socket[] = [];

function newSocket(): Socket {
  const socket = new Socket();
  sockets.push(socket);
  return socket;
}

afterEach(() => {
  for (const socket of sockets.splice(0)) socket.destroy();
});

function setup(server = new FakeServer()) {
  const onConnection = vi.fn<[TcpTransport], void>();
  const logger = { ...silentLogger, error: vi.fn() };
  const listener = new ConnectionListener(onConnection, {
    host: '127.0.0.1',
    port: 0,
    keepAliveMs: 1000,
    logger,
    createServer: () => server,
  });
  return { server, listener, onConnection, logger };
}

describe('ConnectionListener', () => {
  it('resolves with the bound address', async () => {
    const { listener } = setup();
    await expect(listener.listen()).resolves.toEqual({ address: '127.0.0.1', family: 'IPv4', port: 40123 });
  });

  it('fails startup when the address cannot be bound', async () => {
    const server = new FakeServer();
    server.bindError = new Error('listen EADDRINUSE: address already in use 127.0.0.1:0');
    const { listener } = setup(server);

    const failure = listener.listen();
    await expect(failure).rejects.toBeInstanceOf(StartupError);
    await expect(failure).rejects.toThrow('Failed to bind 127.0.0.1:0');
  });

  it('wraps every accepted connection in a transport', async () => {
    const { server, listener, onConnection } = setup();
    await listener.listen();

    server.emit('connection', newSocket());
    server.emit('connection', newSocket());

    expect(onConnection).toHaveBeenCalledTimes(2);
    expect(onConnection.mock.calls[0][0]).toBeInstanceOf(TcpTransport);
    expect(onConnection.mock.calls[0][0].kind).toBe('tcp');
  });

  it('logs a failed accept and keeps accepting', async () => {
    const { server, listener, onConnection, logger } = setup();
    await listener.listen();

    server.emit('error', new Error('accept EMFILE'));
    server.emit('connection', newSocket());

    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(onConnection).toHaveBeenCalledTimes(1);
  });

  it('drops a connection whose setup throws without stopping', async () => {
    const { server, listener, onConnection, logger } = setup();
    onConnection.mockImplementationOnce(() => {
      throw new Error('boom');
    });
    await listener.listen();

    const first = newSocket();
    server.emit('connection', first);
    server.emit('connection', newSocket());

    expect(first.destroyed).toBe(true);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(onConnection).toHaveBeenCalledTimes(2);
  });

  it('closes the server', async () => {
    const { server, listener } = setup();
    await listener.listen();
    await listener.close();
    expect(server.closed).toBe(true);
  });
});
