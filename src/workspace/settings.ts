import { existsSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { readWorkspaceConfig } from './config.js';
import { getBundledPaths, getWorkspacePaths } from './paths.js';

/** Everything a scaffolder needs to know about where files live. */
export interface ResolvedSettings {
  cwd: string;
  templateRoot: string;
  outputRoot: string;
  metadataConfigPath: string;
  artifactsPath: string;
  templateRegistryPath: string;
  initialized: boolean;
}

/**
 * Workspace files win over bundled defaults; TIERFORGE_TEMPLATE_ROOT wins over
 * both for the template root. Relative workspace paths resolve against `cwd`.
 */
export function resolveSettings(cwd: string = process.cwd()): ResolvedSettings {
  const paths = getWorkspacePaths(cwd);
  const bundled = getBundledPaths();
  const initialized = existsSync(paths.config);
  const config = initialized ? readWorkspaceConfig(paths.config) : null;

  const fromCwd = (p: string): string => (isAbsolute(p) ? p : resolve(cwd, p));
  const envRoot = process.env['TIERFORGE_TEMPLATE_ROOT'];

  return {
    cwd,
    templateRoot: fromCwd(envRoot ?? config?.template_root ?? bundled.templates),
    outputRoot: fromCwd(config?.output_root ?? '.'),
    metadataConfigPath: existsSync(paths.metadataConfig) ? paths.metadataConfig : bundled.metadataConfig,
    artifactsPath: existsSync(paths.artifacts) ? paths.artifacts : bundled.artifacts,
    templateRegistryPath: paths.templateRegistry,
    initialized,
  };
}
