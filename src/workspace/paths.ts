import { join } from 'node:path';

export interface WorkspacePaths {
  root: string;             // .tierforge/
  config: string;           // .tierforge/config.yaml
  metadataConfig: string;   // .tierforge/scaffold_metadata.yaml
  artifacts: string;        // .tierforge/artifacts.yaml
  templateRegistry: string; // .tierforge/template_registry.yaml
}

export interface BundledPaths {
  templates: string;
  metadataConfig: string;
  artifacts: string;
}

export const WORKSPACE_DIR = '.tierforge';

export function getWorkspacePaths(cwd: string = process.cwd()): WorkspacePaths {
  const root = join(cwd, WORKSPACE_DIR);
  return {
    root,
    config: join(root, 'config.yaml'),
    metadataConfig: join(root, 'scaffold_metadata.yaml'),
    artifacts: join(root, 'artifacts.yaml'),
    templateRegistry: join(root, 'template_registry.yaml'),
  };
}

/** Templates and configuration shipped with the package. */
export function getBundledPaths(): BundledPaths {
  const packageRoot = join(__dirname, '..', '..');
  return {
    templates: join(packageRoot, 'templates'),
    metadataConfig: join(packageRoot, 'config', 'scaffold_metadata.yaml'),
    artifacts: join(packageRoot, 'config', 'artifacts.yaml'),
  };
}
