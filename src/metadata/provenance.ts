import { ValueError } from '../shared/errors.js';
import type { CommentSyntax } from '../shared/schemas.js';
import { getScaffoldMetadataConfig, type ScaffoldMetadataConfig } from './config.js';

export interface ProvenanceInput {
  syntax: CommentSyntax;
  templateId: string;
  versionHash: string;
  created: string;
  updated?: string;
  /** Omitted for ephemeral artifacts, which get the compact one-line form. */
  filePath?: string;
}

/** `2026-01-20T14:00:00Z`: ISO-8601 in UTC without milliseconds. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function formatProvenanceHeader(
  input: ProvenanceInput,
  config: ScaffoldMetadataConfig = getScaffoldMetadataConfig(),
): string {
  const pattern = config.getPattern(input.syntax);
  if (!pattern) {
    throw new ValueError(`no comment pattern configured for syntax '${input.syntax}'`);
  }
  const comment = (body: string): string => `${pattern.prefix}${body}${pattern.suffix}`;
  const identity = `template=${input.templateId} version=${input.versionHash}`;

  if (input.filePath === undefined) return comment(identity);

  return [
    comment(input.filePath),
    comment(`${identity} created=${input.created} updated=${input.updated ?? ''}`),
  ].join('\n');
}

export function prependProvenanceHeader(content: string, header: string): string {
  return `${header}\n${content}`;
}
