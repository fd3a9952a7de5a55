import net from 'net';
import { v4 as uuid } from 'uuid';
import type { GameContext } from '../context';
import { encodeMessage, LineSplitter } from '../lib/protocol';
import type { Connection, ServerMessage } from '../types/protocol';
import { ConnectionHandler } from './connectionHandler';

export interface TcpGatewayOptions {
  host: string;
  port: number;
  idleTimeoutMs: number;
}

export class TcpConnection implements Connection {
  readonly id = uuid();
  readonly transport = 'tcp' as const;
  readonly remoteAddress: string;

  constructor(private readonly socket: net.Socket) {
    this.remoteAddress = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
  }

  isOpen(): boolean {
    return !this.socket.destroyed && this.socket.writable;
  }

  send(message: ServerMessage): Promise<boolean> {
    if (!this.isOpen()) return Promise.resolve(false);
    return new Promise((resolve) => {
      this.socket.write(encodeMessage(message), (err) => {
        if (err) console.warn(`[tcp] write to ${this.remoteAddress} failed: ${err.message}`);
        resolve(!err);
      });
    });
  }

  close(): void {
    this.socket.end();
  }
}

/**
 * Newline-delimited JSON over plain TCP, one `ConnectionHandler` per socket.
 * End of stream, a socket error and the idle timeout all count as a disconnect.
 */
export class TcpGateway {
  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();

  constructor(
    private readonly ctx: GameContext,
    private readonly options: TcpGatewayOptions
  ) {
    this.server = net.createServer((socket) => this.accept(socket));
    this.server.on('error', (err) => {
      console.error('[tcp] server error', err);
    });
  }

  start(): Promise<net.AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      this.server.once('error', onError);
      this.server.listen(this.options.port, this.options.host, () => {
        this.server.off('error', onError);
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('TCP server has no network address'));
          return;
        }
        console.log(`[tcp] listening on ${address.address}:${address.port}`);
        resolve(address);
      });
    });
  }

  stop(): Promise<void> {
    for (const socket of this.sockets) socket.destroy();
    return new Promise((resolve) => {
      if (!this.server.listening) {
        resolve();
        return;
      }
      this.server.close(() => resolve());
    });
  }

  get connectionCount(): number {
    return this.sockets.size;
  }

  private accept(socket: net.Socket): void {
    const connection = new TcpConnection(socket);
    this.sockets.add(socket);
    socket.once('close', () => this.sockets.delete(socket));

    if (!this.ctx.capacity.tryAcquire()) {
      console.warn(`[tcp] refusing ${connection.remoteAddress}: ${this.ctx.capacity.limit} connections in use`);
      socket.on('error', (err) => {
        console.warn(`[tcp] refused socket ${connection.remoteAddress}: ${err.message}`);
      });
      // discard whatever the client already sent so its FIN is seen
      socket.resume();
      socket.end(
        encodeMessage({ type: 'error', data: { code: 'server_full', message: 'Server is full. Try again later.' } })
      );
      return;
    }

    console.log(`[tcp] connection established with ${connection.remoteAddress}`);
    const handler = new ConnectionHandler(connection, this.ctx);
    const splitter = new LineSplitter();

    socket.setNoDelay(true);
    if (this.options.idleTimeoutMs > 0) {
      socket.setTimeout(this.options.idleTimeoutMs, () => {
        console.warn(`[tcp] ${connection.remoteAddress} timed out`);
        socket.destroy();
      });
    }

    socket.on('data', (chunk: Buffer) => {
      for (const frame of splitter.push(chunk)) {
        const handled = frame.kind === 'line' ? handler.receiveLine(frame.text) : handler.rejectOversizedLine();
        handled.catch((err: unknown) => {
          console.error(`[tcp] ${connection.remoteAddress} handler failed`, err);
        });
      }
    });

    socket.on('error', (err) => {
      console.error(`[tcp] socket error with ${connection.remoteAddress}: ${err.message}`);
    });

    socket.on('close', () => {
      this.ctx.capacity.release();
      handler
        .close()
        .then(() => console.log(`[tcp] connection closed with ${connection.remoteAddress}`))
        .catch((err: unknown) => console.error(`[tcp] teardown for ${connection.remoteAddress} failed`, err));
    });
  }
}
