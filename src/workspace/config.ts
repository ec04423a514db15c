import { existsSync } from 'node:fs';
import { ConfigError } from '../shared/errors.js';
import { WorkspaceConfigSchema, type WorkspaceConfig } from '../shared/schemas.js';
import { readYamlFile, writeYamlFile } from '../shared/yaml.js';

export function readWorkspaceConfig(configPath: string): WorkspaceConfig {
  if (!existsSync(configPath)) {
    throw new ConfigError('file not found', `workspace not initialized (${configPath})`, {
      filePath: configPath,
      hints: ['Run `tierforge init` first'],
    });
  }
  return readYamlFile(configPath, WorkspaceConfigSchema);
}

export function writeWorkspaceConfig(configPath: string, config: WorkspaceConfig): void {
  writeYamlFile(configPath, config);
}
