import { z } from 'zod';

export const DEFAULT_HTTP_ADDR = ':8080';
export const DEFAULT_LOG_LEVEL = 'info';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface ListenAddress {
  host: string;
  port: number;
}

export interface AppConfig {
  listen: ListenAddress;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Unset and empty variables both fall back to the default. */
function withDefault(fallback: string) {
  return z
    .string()
    .optional()
    .transform((value) => (value === undefined || value === '' ? fallback : value));
}

const envSchema = z.object({
  HTTP_ADDR: withDefault(DEFAULT_HTTP_ADDR),
  LOG_LEVEL: withDefault(DEFAULT_LOG_LEVEL).pipe(z.enum(LOG_LEVELS)),
});

/**
 * Parses a `host:port` listen address.
 *
 * ":8080"       → all interfaces on 8080
 * "[::1]:8080"  → IPv6 host, brackets stripped
 */
export function parseListenAddress(addr: string): ListenAddress {
  const colonIdx = addr.lastIndexOf(':');
  if (colonIdx === -1) {
    throw new ConfigError(`HTTP_ADDR "${addr}": missing port (expected host:port)`);
  }

  let host = addr.slice(0, colonIdx);
  const portText = addr.slice(colonIdx + 1);

  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  } else if (host.includes(':')) {
    throw new ConfigError(`HTTP_ADDR "${addr}": IPv6 host must be in brackets`);
  }

  if (!/^\d{1,5}$/.test(portText) || Number(portText) > 65535) {
    throw new ConfigError(`HTTP_ADDR "${addr}": invalid port "${portText}"`);
  }

  return {
    host: host === '' ? '0.0.0.0' : host,
    port: Number(portText),
  };
}

/**
 * Reads configuration from the environment once at startup.
 *
 * Throws `ConfigError` on invalid values; the caller treats that as a
 * fatal startup failure.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${detail}`);
  }

  return {
    listen: parseListenAddress(parsed.data.HTTP_ADDR),
    logLevel: parsed.data.LOG_LEVEL,
  };
}
