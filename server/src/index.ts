#!/usr/bin/env node
import { ConfigError, loadConfig, type ServerConfig } from './config/env';
import { createGameServer } from './server';

function readConfig(): ServerConfig {
  try {
    return loadConfig(process.argv.slice(2));
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[server] ${err.message}`);
      process.exit(2);
    }
    throw err;
  }
}

async function main() {
  const server = createGameServer(readConfig());
  await server.start();

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    console.log(`[server] ${signal} received, shutting down...`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('[server] shutdown failed', err);
        process.exit(1);
      });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  console.error('[server] failed to start', err);
  process.exit(1);
});
