import http from 'http';
import type { AddressInfo } from 'net';
import { createApp } from './app';
import type { ServerConfig } from './config/env';
import { createGameContext, type GameContext } from './context';
import { createSocketServer, type GameSocketServer } from './socket/index';
import { TcpGateway } from './socket/tcp';

export interface GameServer {
  ctx: GameContext;
  tcp: TcpGateway;
  http: http.Server;
  io: GameSocketServer;
  start(): Promise<{ tcp: AddressInfo; http: AddressInfo }>;
  stop(): Promise<void>;
}

function listen(server: http.Server, port: number, host: string): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('HTTP server has no network address'));
        return;
      }
      resolve(address);
    });
  });
}

export function createGameServer(config: ServerConfig): GameServer {
  const ctx = createGameContext(config.maxWorkers);
  const app = createApp(ctx, config.corsOrigin);
  const httpServer = http.createServer(app);
  const io = createSocketServer(httpServer, ctx, config.corsOrigin);
  const tcp = new TcpGateway(ctx, {
    host: config.host,
    port: config.port,
    idleTimeoutMs: config.clientIdleTimeoutMs,
  });

  return {
    ctx,
    tcp,
    http: httpServer,
    io,
    async start() {
      const tcpAddress = await tcp.start();
      const httpAddress = await listen(httpServer, config.httpPort, config.host);
      console.log(`[server] http listening on http://${httpAddress.address}:${httpAddress.port}`);
      return { tcp: tcpAddress, http: httpAddress };
    },
    async stop() {
      await tcp.stop();
      // also closes the underlying HTTP server
      await new Promise<void>((resolve) => {
        io.close(() => resolve());
      });
      console.log('[server] stopped');
    },
  };
}
