import { createServer } from 'node:http';
import type { Server } from 'node:http';
import type { Express } from 'express';
import { createApp } from './app.js';
import type { ServerConfig } from './config.js';

/** Binds the app to `config.serverName:config.port`; rejects with the listen error. */
export function startServer(config: ServerConfig, app: Express = createApp()): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);
    const onError = (err: Error): void => {
      reject(err);
    };
    server.once('error', onError);
    server.listen(config.port, config.serverName, () => {
      server.off('error', onError);
      resolve(server);
    });
  });
}

export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) {
        reject(err);
        return;
      }
      resolve();
    });
    server.closeIdleConnections();
  });
}

export function listeningPort(server: Server): number {
  const address = server.address();
  return typeof address === 'object' && address ? address.port : 0;
}

/** Signal handler that stops the server once, however many signals arrive, then calls `exit`. */
export function createShutdown(server: Server, exit: (code: number) => void): (signal: string) => void {
  let shuttingDown = false;
  return (signal) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`Received ${signal}, shutting down…`);
    stopServer(server)
      .then(() => exit(0))
      .catch((err: unknown) => {
        console.error(`Error during shutdown: ${err instanceof Error ? err.message : String(err)}`);
        exit(1);
      });
  };
}
