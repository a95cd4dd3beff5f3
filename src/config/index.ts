import path from 'node:path';
import { loadEnvironment } from '@/config/environment';
import { buildHttpServerConfig } from '@/config/http';

export interface PathConfig {
  dataDir: string;
  configFile: string;
}

export function buildPathConfig(dataDir: string, cwd: string = process.cwd()): PathConfig {
  const root = path.resolve(cwd, dataDir);
  return { dataDir: root, configFile: path.join(root, 'config.json') };
}

export function loadConfig(env = loadEnvironment()) {
  return {
    env,
    http: buildHttpServerConfig(env),
    paths: buildPathConfig(env.dataDir),
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;
