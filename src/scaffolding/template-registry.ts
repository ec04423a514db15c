import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import {
  TemplateRegistryDocumentSchema,
  type TemplateRegistryDocument,
  type TierVersion,
  type VersionEntry,
} from '../shared/schemas.js';
import { readYamlFile, writeYamlFile } from '../shared/yaml.js';

export interface SaveVersionInput {
  artifactType: string;
  tiers: TierVersion[];
  created: string;
}

function sameTiers(a: TierVersion[], b: TierVersion[]): boolean {
  return a.length === b.length && a.every((t, i) => t.template === b[i]?.template && t.version === b[i]?.version);
}

/**
 * Which template versions produced each version hash. Backed by a YAML file
 * that is created on first save.
 */
export class TemplateRegistry {
  constructor(readonly filePath: string) {}

  private read(): TemplateRegistryDocument {
    if (!existsSync(this.filePath)) {
      return TemplateRegistryDocumentSchema.parse({});
    }
    return readYamlFile(this.filePath, TemplateRegistryDocumentSchema);
  }

  saveVersion(versionHash: string, input: SaveVersionInput): void {
    const doc = this.read();
    const existing = doc.version_hashes[versionHash];

    if (existing) {
      if (existing.artifact_type !== input.artifactType || !sameTiers(existing.tiers, input.tiers)) {
        throw new ConfigError(
          'invalid value',
          `version hash collision: ${versionHash} already records ${existing.artifact_type}`,
          { filePath: this.filePath },
        );
      }
      if (doc.current_versions[input.artifactType] === versionHash) return;
    } else {
      doc.version_hashes[versionHash] = {
        artifact_type: input.artifactType,
        created: input.created,
        tiers: input.tiers,
      };
    }

    doc.current_versions[input.artifactType] = versionHash;
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeYamlFile(this.filePath, doc);
    logger.debug('template version recorded', { artifact_type: input.artifactType, version: versionHash });
  }

  lookupHash(versionHash: string): VersionEntry | null {
    return this.read().version_hashes[versionHash] ?? null;
  }

  getCurrentVersion(artifactType: string): string | null {
    return this.read().current_versions[artifactType] ?? null;
  }
}
