import { isLogLevel, type LogLevel } from '@/types/logLevel';

/**
 * Process-level settings read once at startup. Everything tunable at runtime
 * lives in the JSON config document under `dataDir`.
 */
export interface EnvironmentConfig {
  nodeEnv: 'development' | 'production' | 'test';
  /** Level used until the config document is loaded. */
  logLevel: LogLevel;
  httpPort: number;
  httpHost: string;
  dataDir: string;
}

type Env = Record<string, string | undefined>;

function parseNodeEnv(value: string | undefined): EnvironmentConfig['nodeEnv'] {
  return value === 'production' || value === 'test' ? value : 'development';
}

function parsePort(value: string | undefined, fallback: number): number {
  const port = Number(value);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : fallback;
}

export function loadEnvironment(env: Env = process.env): EnvironmentConfig {
  const logLevel = env.LOG_LEVEL?.trim().toLowerCase();
  return {
    nodeEnv: parseNodeEnv(env.NODE_ENV),
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
    httpPort: parsePort(env.PORT, 7080),
    httpHost: env.HOST?.trim() || '0.0.0.0',
    dataDir: env.DATA_DIR?.trim() || 'data',
  };
}
