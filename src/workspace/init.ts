import { copyFileSync, existsSync, mkdirSync } from 'node:fs';
import { ConfigError } from '../shared/errors.js';
import { newWorkspaceId } from '../shared/ids.js';
import { logger } from '../shared/logger.js';
import type { WorkspaceConfig } from '../shared/schemas.js';
import { writeWorkspaceConfig } from './config.js';
import { getBundledPaths, getWorkspacePaths } from './paths.js';

export interface InitOptions {
  cwd?: string;
  force?: boolean;
  /** Defaults to the bundled templates. */
  templateRoot?: string;
  /** Defaults to the working directory. */
  outputRoot?: string;
}

export function initWorkspace(opts: InitOptions = {}): WorkspaceConfig {
  const paths = getWorkspacePaths(opts.cwd);
  const bundled = getBundledPaths();

  if (existsSync(paths.root) && !opts.force) {
    throw new ConfigError('invalid value', `workspace already exists at ${paths.root}`, {
      filePath: paths.root,
      hints: ['Use --force to reinitialize'],
    });
  }

  mkdirSync(paths.root, { recursive: true });

  const config: WorkspaceConfig = {
    workspace_id: newWorkspaceId(),
    template_root: opts.templateRoot ?? bundled.templates,
    output_root: opts.outputRoot ?? '.',
    created_at: new Date().toISOString(),
    version: '0.1.0',
  };
  writeWorkspaceConfig(paths.config, config);

  // Editable copies; the bundled files stay the fallback.
  copyFileSync(bundled.metadataConfig, paths.metadataConfig);
  copyFileSync(bundled.artifacts, paths.artifacts);

  logger.info('workspace initialized', { root: paths.root, workspace_id: config.workspace_id });
  return config;
}
