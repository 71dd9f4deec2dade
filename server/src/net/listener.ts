import net, { type AddressInfo, type Socket } from 'net';
import { TcpTransport } from '../transport/tcpTransport';
import { StartupError, errorMessage } from '../lib/errors';
import { createLogger, type Logger } from '../lib/logger';

/** The slice of `net.Server` the listener relies on. */
export interface AcceptingServer {
  listen(port: number, host: string, callback: () => void): unknown;
  address(): AddressInfo | string | null;
  close(callback?: (err?: Error) => void): unknown;
  on(event: 'connection', listener: (socket: Socket) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export interface ListenerOptions {
  host: string;
  port: number;
  keepAliveMs: number;
  logger?: Logger;
  createServer?: () => AcceptingServer;
}

/**
 * Accepts TCP connections until closed and hands each one, wrapped in a
 * framed transport, to `onConnection`.
 */
export class ConnectionListener {
  private server: AcceptingServer | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly onConnection: (transport: TcpTransport) => void,
    private readonly options: ListenerOptions,
  ) {
    this.logger = options.logger ?? createLogger('listener');
  }

  /** Rejects with a StartupError when the address cannot be bound. */
  listen(): Promise<AddressInfo> {
    if (this.server) return Promise.reject(new Error('Listener already started'));
    const { host, port } = this.options;
    const server: AcceptingServer = this.options.createServer ? this.options.createServer() : net.createServer();
    this.server = server;

    return new Promise((resolve, reject) => {
      let bound = false;

      server.on('error', (err: Error) => {
        if (!bound) {
          this.server = null;
          reject(new StartupError(`Failed to bind ${host}:${port}: ${err.message}`, { cause: err }));
          return;
        }
        // one failed accept must not stop the others
        this.logger.error('accept failed', err);
      });

      server.on('connection', (socket: Socket) => this.accept(socket));

      server.listen(port, host, () => {
        bound = true;
        const address = server.address();
        const info: AddressInfo =
          address && typeof address === 'object' ? address : { address: host, family: 'IPv4', port };
        this.logger.info(`listening on tcp://${info.address}:${info.port}`);
        resolve(info);
      });
    });
  }

  close(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise((resolve) => {
      server.close((err?: Error) => {
        if (err) this.logger.warn(`close: ${err.message}`);
        resolve();
      });
    });
  }

  private accept(socket: Socket) {
    try {
      this.onConnection(TcpTransport.fromSocket(socket, this.options.keepAliveMs));
    } catch (err) {
      this.logger.error(`failed to set up connection: ${errorMessage(err)}`);
      socket.destroy();
    }
  }
}
