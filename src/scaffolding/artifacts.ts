import { resolve } from 'node:path';
import { ConfigError } from '../shared/errors.js';
import {
  ArtifactRegistryDocumentSchema,
  type ArtifactDefinition,
  type ArtifactKind,
  type ArtifactRegistryDocument,
} from '../shared/schemas.js';
import { parseYamlDocument, readYamlFile } from '../shared/yaml.js';

/** Artifact types and the templates that produce them. */
export class ArtifactRegistry {
  private readonly byId: ReadonlyMap<string, ArtifactDefinition>;

  private constructor(
    doc: ArtifactRegistryDocument,
    readonly sourcePath: string | null,
  ) {
    this.byId = new Map(doc.artifact_types.map((def): [string, ArtifactDefinition] => [def.type_id, def]));
  }

  static load(filePath: string): ArtifactRegistry {
    const path = resolve(filePath);
    return new ArtifactRegistry(readYamlFile(path, ArtifactRegistryDocumentSchema), path);
  }

  static fromYaml(raw: string): ArtifactRegistry {
    return new ArtifactRegistry(parseYamlDocument(raw, ArtifactRegistryDocumentSchema), null);
  }

  has(typeId: string): boolean {
    return this.byId.has(typeId);
  }

  get(typeId: string): ArtifactDefinition {
    const def = this.byId.get(typeId);
    if (!def) {
      throw new ConfigError('invalid value', `unknown artifact type: ${typeId}`, {
        filePath: this.sourcePath ?? undefined,
        hints: [`Available types: ${this.list().join(', ')}`],
      });
    }
    return def;
  }

  /** Sorted type ids, optionally restricted to one kind. */
  list(kind?: ArtifactKind): string[] {
    return [...this.byId.values()]
      .filter((def) => kind === undefined || def.kind === kind)
      .map((def) => def.type_id)
      .sort();
  }

  definitions(): ArtifactDefinition[] {
    return this.list().map((id) => this.get(id));
  }

  /**
   * `<output_dir>/<name><suffix><ext>` relative to the output root, with
   * forward slashes. Numeric names are used as written. Null for ephemeral
   * artifacts and when the name field holds no usable name.
   */
  resolveOutputPath(def: ArtifactDefinition, context: Record<string, unknown>): string | null {
    if (def.output_type === 'ephemeral') return null;
    const raw = context[def.name_field];
    const name = typeof raw === 'number' && Number.isFinite(raw) ? String(raw) : raw;
    if (typeof name !== 'string' || name.length === 0) return null;
    const dir = def.output_dir.replace(/\\/g, '/').replace(/\/+$/, '');
    const file = `${name}${def.name_suffix}${def.file_extension}`;
    return dir === '' || dir === '.' ? file : `${dir}/${file}`;
  }
}
