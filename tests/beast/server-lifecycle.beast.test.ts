/**
 * Beast Tests — Server lifecycle
 *
 * The listener appears once started, serves HTTP, and is gone after stop.
 */
import { describe, it, expect } from 'vitest';
import { listeningPort, startServer, stopServer } from '../../src/lifecycle.js';

describe('Server Lifecycle', () => {
  it('Beast 5.1 — should bind the configured address and serve HTTP', async () => {
    const server = await startServer({ serverName: '127.0.0.1', port: 0 });
    const port = listeningPort(server);

    try {
      expect(server.listening).toBe(true);
      expect(port).toBeGreaterThan(0);
      const res = await fetch(`http://127.0.0.1:${port}/api/health`);
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: 'operational' });
    } finally {
      await stopServer(server);
    }
  });

  it('Beast 5.2 — should release the port on stop', async () => {
    const server = await startServer({ serverName: '127.0.0.1', port: 0 });
    const port = listeningPort(server);
    await stopServer(server);

    expect(server.listening).toBe(false);
    await expect(fetch(`http://127.0.0.1:${port}/api/health`)).rejects.toThrow();

    // the same port can be bound again
    const again = await startServer({ serverName: '127.0.0.1', port });
    expect(listeningPort(again)).toBe(port);
    await stopServer(again);
  });

  it('Beast 5.3 — should reject when the port is already taken', async () => {
    const first = await startServer({ serverName: '127.0.0.1', port: 0 });
    try {
      await expect(
        startServer({ serverName: '127.0.0.1', port: listeningPort(first) }),
      ).rejects.toMatchObject({ code: 'EADDRINUSE' });
    } finally {
      await stopServer(first);
    }
  });
});
