import type { RotationServerConfig } from '@/domain/config/types';

export interface ConfigPort {
  load(): Promise<RotationServerConfig>;
  getConfig(): RotationServerConfig;
  getSection<K extends ConfigSection>(section: K): RotationServerConfig[K];
  updateConfig(
    mutator: (config: RotationServerConfig) => void | Promise<void>,
  ): Promise<RotationServerConfig>;
}

export type ConfigSection = Exclude<keyof RotationServerConfig, 'updatedAt'>;

export type { RotationServerConfig };
