import { mkdtempSync, rmSync, mkdirSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { ArtifactRegistry } from '../scaffolding/artifacts.js';
import type { Scaffolder } from '../scaffolding/factory.js';
import { createScaffolder } from '../scaffolding/factory.js';
import { getBundledPaths } from '../workspace/paths.js';

export interface TempDir {
  dir: string;
  cleanup: () => void;
}

export function createTempDir(prefix = 'tierforge-'): TempDir {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

/** Writes `{ "name.hbs": source }` entries under `root`, creating subdirectories. */
export function writeFiles(root: string, files: Record<string, string>): void {
  for (const [name, content] of Object.entries(files)) {
    const full = join(root, name);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, content, 'utf8');
  }
}

export function createTemplateRoot(files: Record<string, string>): TempDir {
  const tmp = createTempDir('tierforge-tpl-');
  writeFiles(tmp.dir, files);
  return tmp;
}

/**
 * Scaffolder over the bundled templates and config that writes into a temp
 * directory (artifacts and the template registry both land there).
 */
export function createBundledScaffolder(): { scaffolder: Scaffolder; outputRoot: string; cleanup: () => void } {
  const tmp = createTempDir('tierforge-out-');
  const bundled = getBundledPaths();
  const scaffolder = createScaffolder({
    cwd: tmp.dir,
    templateRoot: bundled.templates,
    outputRoot: tmp.dir,
    metadataConfigPath: bundled.metadataConfig,
    artifactsPath: bundled.artifacts,
    templateRegistryPath: join(tmp.dir, '.tierforge', 'template_registry.yaml'),
    initialized: false,
  });
  return { scaffolder, outputRoot: tmp.dir, cleanup: tmp.cleanup };
}

export function loadBundledArtifacts(): ArtifactRegistry {
  return ArtifactRegistry.load(getBundledPaths().artifacts);
}

export const FIXED_NOW = new Date(Date.UTC(2026, 0, 20, 14, 0, 0));
export const FIXED_TIMESTAMP = '2026-01-20T14:00:00Z';
