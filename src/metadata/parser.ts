import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { MetadataParseError } from '../shared/errors.js';
import { getScaffoldMetadataConfig, type CommentPattern, type ScaffoldMetadataConfig } from './config.js';

/** Validated provenance fields, in configuration order. */
export type ParsedMetadata = Record<string, string>;

const KEY_VALUE = /(\w+)=(\S*)/g;

function metadataLine(lines: string[], pattern: CommentPattern): RegExpExecArray | null {
  const first = (lines[0] ?? '').trimEnd();
  const direct = pattern.metadataLineRegex.exec(first);
  if (direct) return direct;
  // Two-line header: the path comes first, the fields on the next line.
  const second = lines[1];
  if (second === undefined || !pattern.filepathLineRegex?.test(first)) return null;
  return pattern.metadataLineRegex.exec(second.trimEnd());
}

/**
 * Reads the provenance header of generated files.
 *
 * `parse` returns null for content that carries no header at all and throws
 * MetadataParseError for a header that is present but malformed.
 */
export class ScaffoldMetadataParser {
  constructor(private readonly config: ScaffoldMetadataConfig = getScaffoldMetadataConfig()) {}

  parse(content: string, extension: string): ParsedMetadata | null {
    if (content.length === 0) return null;
    const lines = content.split(/\r?\n/);
    if ((lines[0] ?? '').trim().length === 0) return null;

    const pattern = this.config.patternForExtension(extension);
    if (!pattern) return null;

    const match = metadataLine(lines, pattern);
    if (!match) return null;

    const pairs = new Map<string, string>();
    for (const [, key, value] of (match[1] ?? match[0]).matchAll(KEY_VALUE)) {
      if (key !== undefined) pairs.set(key, value ?? '');
    }
    if (pairs.size === 0) {
      throw new MetadataParseError('no valid key=value pairs', {
        expected: pattern.metadataLineRegex.source,
      });
    }

    for (const field of this.config.requiredFields()) {
      if (!pairs.has(field.name)) {
        throw new MetadataParseError(`missing required field: ${field.name}`, {
          field: field.name,
          expected: field.formatRegex.source,
        });
      }
    }

    const result: ParsedMetadata = {};
    for (const field of this.config.metadataFields) {
      const value = pairs.get(field.name);
      if (value === undefined) continue;
      if (!field.formatRegex.test(value)) {
        throw new MetadataParseError(`invalid value '${value}' for field '${field.name}'`, {
          field: field.name,
          expected: field.formatRegex.source,
        });
      }
      result[field.name] = value;
    }
    return result;
  }

  parseFile(filePath: string): ParsedMetadata | null {
    return this.parse(readFileSync(filePath, 'utf8'), extname(filePath));
  }
}
