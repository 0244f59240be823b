/**
 * Beast Test Helpers — shared utilities for all Beast test suites.
 */
import type { Express } from 'express';
import { createApp } from '../../src/app.js';
import { listeningPort, startServer, stopServer } from '../../src/lifecycle.js';

export interface TestResponse {
  status: number;
  contentType: string;
  body: Record<string, unknown>;
  text: string;
}

let cachedApp: Express | null = null;

export function getTestApp(): Express {
  if (!cachedApp) {
    cachedApp = createApp();
  }
  return cachedApp;
}

/**
 * Make a request to the test app on an ephemeral loopback port.
 * `form` bodies are sent url-encoded, objects as JSON, strings verbatim as JSON
 * (or as `contentType`, when given).
 */
export async function request(
  app: Express,
  method: 'GET' | 'POST',
  path: string,
  body?: Record<string, unknown> | string,
  options: { form?: boolean; contentType?: string } = {},
): Promise<TestResponse> {
  const server = await startServer({ serverName: '127.0.0.1', port: 0 }, app);
  try {
    const init: RequestInit = { method };
    if (body !== undefined && method === 'POST') {
      if (options.form && typeof body === 'object') {
        const params = new URLSearchParams();
        for (const [key, value] of Object.entries(body)) {
          params.set(key, String(value));
        }
        init.headers = { 'Content-Type': 'application/x-www-form-urlencoded' };
        init.body = params.toString();
      } else {
        init.headers = { 'Content-Type': options.contentType ?? 'application/json' };
        init.body = typeof body === 'string' ? body : JSON.stringify(body);
      }
    }

    const res = await fetch(`http://127.0.0.1:${listeningPort(server)}${path}`, init);
    const text = await res.text();
    const contentType = res.headers.get('content-type') ?? '';
    const parsed: unknown = contentType.includes('application/json') ? JSON.parse(text) : {};
    return {
      status: res.status,
      contentType,
      body: typeof parsed === 'object' && parsed !== null ? { ...parsed } : {},
      text,
    };
  } finally {
    await stopServer(server);
  }
}
