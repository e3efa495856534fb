// Server configuration from the environment.

import { defaultServerConfig, type ServerConfig } from "@strand/tcp";

/** A configuration variable with an unusable value. */
export class ConfigError extends Error {
  constructor(
    public variable: string,
    message: string,
  ) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

/**
 * Build a ServerConfig from environment variables, falling back to
 * {@link defaultServerConfig} for anything unset or empty.
 *
 * | Variable                   | Field               |
 * | -------------------------- | ------------------- |
 * | `HTTP_HOST`                | `host`              |
 * | `HTTP_PORT`                | `port`              |
 * | `HTTP_BACKLOG`             | `backlog`           |
 * | `HTTP_IDLE_TIMEOUT_MS`     | `idleTimeoutMs`     |
 * | `HTTP_DISPATCH_TIMEOUT_MS` | `dispatchTimeoutMs` |
 * | `HTTP_MAX_HEADER_SIZE`     | `maxHeaderSize`     |
 * | `HTTP_MAX_BODY_SIZE`       | `maxBodySize`       |
 * | `HTTP_SHUTDOWN_GRACE_MS`   | `shutdownGraceMs`   |
 *
 * @throws ConfigError when a numeric variable is not an integer in range
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  const defaults = defaultServerConfig();
  return {
    host: text(env, "HTTP_HOST") ?? defaults.host,
    port: integer(env, "HTTP_PORT", 0, 65_535) ?? defaults.port,
    backlog: integer(env, "HTTP_BACKLOG", 1),
    idleTimeoutMs: integer(env, "HTTP_IDLE_TIMEOUT_MS", 0) ?? defaults.idleTimeoutMs,
    dispatchTimeoutMs: integer(env, "HTTP_DISPATCH_TIMEOUT_MS", 1),
    maxHeaderSize: integer(env, "HTTP_MAX_HEADER_SIZE", 1) ?? defaults.maxHeaderSize,
    maxBodySize: integer(env, "HTTP_MAX_BODY_SIZE", 0) ?? defaults.maxBodySize,
    shutdownGraceMs: integer(env, "HTTP_SHUTDOWN_GRACE_MS", 0) ?? defaults.shutdownGraceMs,
  };
}

function text(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function integer(env: Env, name: string, min: number, max = Number.MAX_SAFE_INTEGER): number | undefined {
  const raw = text(env, name);
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(name, `expected an integer, got ${JSON.stringify(raw)}`);
  }
  const value = Number(raw);
  if (value < min || value > max) {
    throw new ConfigError(name, `${value} is outside ${min}..${max}`);
  }
  return value;
}
