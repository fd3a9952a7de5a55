import type { Server as HTTPServer } from 'http';
import { Server, type Socket } from 'socket.io';
import type { GameContext } from '../context';
import type { Connection, ServerMessage } from '../types/protocol';
import { ConnectionHandler } from './connectionHandler';

export interface ClientToServerEvents {
  message: (payload: unknown) => void;
}

export interface ServerToClientEvents {
  message: (payload: ServerMessage) => void;
}

type GameSocket = Socket<ClientToServerEvents, ServerToClientEvents>;

export type GameSocketServer = Server<ClientToServerEvents, ServerToClientEvents>;

export class SocketIoConnection implements Connection {
  readonly transport = 'socket.io' as const;

  constructor(private readonly socket: GameSocket) {}

  get id(): string {
    return this.socket.id;
  }

  get remoteAddress(): string {
    return this.socket.handshake.address;
  }

  isOpen(): boolean {
    return this.socket.connected;
  }

  async send(message: ServerMessage): Promise<boolean> {
    if (!this.isOpen()) return false;
    this.socket.emit('message', message);
    return true;
  }

  close(): void {
    this.socket.disconnect(true);
  }
}

/**
 * Carries the same envelopes as the TCP protocol over socket.io: clients emit
 * `message` with an envelope (object or JSON text) and receive `message`.
 */
export function createSocketServer(httpServer: HTTPServer, ctx: GameContext, corsOrigin: string): GameSocketServer {
  const io: GameSocketServer = new Server(httpServer, {
    cors: {
      origin: corsOrigin,
      methods: ['GET', 'POST'],
    },
  });

  io.on('connection', (socket) => {
    const sid = socket.id;
    const connection = new SocketIoConnection(socket);

    if (!ctx.capacity.tryAcquire()) {
      console.warn(`[socket] refusing ${sid}: ${ctx.capacity.limit} connections in use`);
      socket.emit('message', {
        type: 'error',
        data: { code: 'server_full', message: 'Server is full. Try again later.' },
      });
      socket.disconnect(true);
      return;
    }

    console.log(`[socket] connected: ${sid}`);
    const handler = new ConnectionHandler(connection, ctx);

    socket.on('message', (payload) => {
      handler.receive(payload).catch((err: unknown) => {
        console.error(`[socket] ${sid} handler failed`, err);
      });
    });

    socket.on('disconnect', (reason) => {
      ctx.capacity.release();
      console.log(`[socket] disconnected: ${sid} reason=${reason}`);
      handler.close().catch((err: unknown) => {
        console.error(`[socket] teardown for ${sid} failed`, err);
      });
    });
  });

  return io;
}
