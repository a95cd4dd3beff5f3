import type { EnvironmentConfig } from '@/config/environment';

/**
 * Runtime options for the HTTP gateway.
 */
export interface HttpServerConfig {
  port: number;
  host: string;
  /** Upper bound for JSON request bodies on the command API. */
  maxBodyBytes: number;
}

export const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

/**
 * Creates the HTTP gateway configuration from environment settings.
 */
export function buildHttpServerConfig(env: EnvironmentConfig): HttpServerConfig {
  return {
    port: env.httpPort,
    host: env.httpHost,
    maxBodyBytes: DEFAULT_MAX_BODY_BYTES,
  };
}
