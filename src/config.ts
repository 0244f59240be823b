export interface ServerConfig {
  serverName: string;
  port: number;
}

export const DEFAULT_SERVER_NAME = '127.0.0.1';
export const DEFAULT_PORT = 7860;

function parsePort(value: string | undefined): number {
  if (!value?.trim()) {
    return DEFAULT_PORT;
  }
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || parsed > 65535) {
    throw new Error(`Invalid GRADIO_SERVER_PORT: '${value}'. Expected integer in range 0-65535.`);
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    serverName: env.GRADIO_SERVER_NAME?.trim() || DEFAULT_SERVER_NAME,
    port: parsePort(env.GRADIO_SERVER_PORT),
  };
}
