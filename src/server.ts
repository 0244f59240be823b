import { loadConfig } from './config.js';
import { createShutdown, listeningPort, startServer } from './lifecycle.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const server = await startServer(config);

  console.log(`EMI Calculator listening on http://${config.serverName}:${listeningPort(server)}`);

  const shutdown = createShutdown(server, (code) => process.exit(code));
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
