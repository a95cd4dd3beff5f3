import type { ConfigPort, ConfigSection, RotationServerConfig } from '@/ports/ConfigPort';
import type { ConfigRepository } from '@/application/config/configRepository';

export class ConfigAdapter implements ConfigPort {
  constructor(private readonly repository: ConfigRepository) {}

  public load(): Promise<RotationServerConfig> {
    return this.repository.load();
  }

  public getConfig(): RotationServerConfig {
    return this.repository.get();
  }

  public getSection<K extends ConfigSection>(section: K): RotationServerConfig[K] {
    return this.repository.get()[section];
  }

  public updateConfig(
    mutator: Parameters<ConfigPort['updateConfig']>[0],
  ): Promise<RotationServerConfig> {
    return this.repository.update(mutator);
  }
}
