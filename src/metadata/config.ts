import { resolve } from 'node:path';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import {
  ScaffoldMetadataDocumentSchema,
  type CommentSyntax,
  type ScaffoldMetadataDocument,
} from '../shared/schemas.js';
import { parseYamlDocument, readYamlFile, type LoadResult } from '../shared/yaml.js';
import { getBundledPaths } from '../workspace/paths.js';
import { buildExtensionTable, syntaxForExtension, type ExtensionTable } from './extensions.js';

export const BUNDLED_METADATA_CONFIG = getBundledPaths().metadataConfig;

export interface CommentPattern {
  syntax: CommentSyntax;
  prefix: string;
  /** Closing delimiter for block comments, '' for line comments. */
  suffix: string;
  metadataLineRegex: RegExp;
  /** First line of a two-line header, carrying the output path. */
  filepathLineRegex: RegExp | null;
}

export interface MetadataField {
  name: string;
  formatRegex: RegExp;
  required: boolean;
  description?: string;
}

/**
 * Comment syntaxes and metadata fields, immutable once built. Construct with
 * `load`, `tryLoad` or `fromYaml`.
 */
export class ScaffoldMetadataConfig {
  readonly commentPatterns: readonly CommentPattern[];
  readonly metadataFields: readonly MetadataField[];
  readonly extensions: ExtensionTable;
  private readonly patternsBySyntax: ReadonlyMap<string, CommentPattern>;
  private readonly fieldsByName: ReadonlyMap<string, MetadataField>;

  private constructor(
    doc: ScaffoldMetadataDocument,
    readonly sourcePath: string | null,
  ) {
    this.commentPatterns = doc.comment_patterns.map((p) => ({
      syntax: p.syntax,
      prefix: p.prefix,
      suffix: p.suffix,
      metadataLineRegex: new RegExp(p.metadata_line_regex),
      filepathLineRegex: p.filepath_line_regex === undefined ? null : new RegExp(p.filepath_line_regex),
    }));
    this.metadataFields = doc.metadata_fields.map((f) => ({
      name: f.name,
      formatRegex: new RegExp(f.format_regex),
      required: f.required,
      description: f.description,
    }));
    this.patternsBySyntax = new Map(this.commentPatterns.map((p): [string, CommentPattern] => [p.syntax, p]));
    this.fieldsByName = new Map(this.metadataFields.map((f): [string, MetadataField] => [f.name, f]));
    this.extensions = buildExtensionTable(
      doc.comment_patterns.map((p): [CommentSyntax, string[]] => [p.syntax, p.extensions]),
    );
  }

  static load(filePath: string): ScaffoldMetadataConfig {
    const path = resolve(filePath);
    return new ScaffoldMetadataConfig(readYamlFile(path, ScaffoldMetadataDocumentSchema), path);
  }

  static tryLoad(filePath: string): LoadResult<ScaffoldMetadataConfig> {
    try {
      return { ok: true, value: ScaffoldMetadataConfig.load(filePath) };
    } catch (err) {
      if (err instanceof ConfigError) return { ok: false, error: err };
      throw err;
    }
  }

  /** Builds a config from YAML text; handy for tests and inline overrides. */
  static fromYaml(raw: string): ScaffoldMetadataConfig {
    return new ScaffoldMetadataConfig(parseYamlDocument(raw, ScaffoldMetadataDocumentSchema), null);
  }

  getPattern(syntax: string): CommentPattern | null {
    return this.patternsBySyntax.get(syntax) ?? null;
  }

  getField(name: string): MetadataField | null {
    return this.fieldsByName.get(name) ?? null;
  }

  patternForExtension(extension: string): CommentPattern | null {
    const syntax = syntaxForExtension(this.extensions, extension);
    return syntax === null ? null : this.getPattern(syntax);
  }

  requiredFields(): MetadataField[] {
    return this.metadataFields.filter((f) => f.required);
  }
}

// Process-wide instance. Single writer: only getScaffoldMetadataConfig and
// resetScaffoldMetadataConfig touch it. Two first loads of the same file build
// equal configs, so whichever lands last is fine.
let current: ScaffoldMetadataConfig | null = null;

export function getScaffoldMetadataConfig(filePath: string = BUNDLED_METADATA_CONFIG): ScaffoldMetadataConfig {
  const path = resolve(filePath);
  if (current && current.sourcePath === path) return current;
  const loaded = ScaffoldMetadataConfig.load(path);
  logger.debug('scaffold metadata config loaded', {
    path,
    patterns: loaded.commentPatterns.length,
    fields: loaded.metadataFields.length,
  });
  current = loaded;
  return loaded;
}

/** Drops the process-wide instance; the next get reloads from disk. */
export function resetScaffoldMetadataConfig(): void {
  current = null;
}
