import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { dump, load } from 'js-yaml';
import type { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { formatZodIssues } from './schemas.js';

export type LoadResult<T> = { ok: true; value: T } | { ok: false; error: ConfigError };

export function parseYamlDocument<S extends z.ZodTypeAny>(
  raw: string,
  schema: S,
  filePath?: string,
): z.output<S> {
  let doc: unknown;
  try {
    doc = load(raw);
  } catch (err) {
    throw new ConfigError('invalid syntax', `${filePath ?? 'document'}: ${errorMessage(err)}`, {
      filePath,
      cause: err,
    });
  }
  const result = schema.safeParse(doc ?? {});
  if (!result.success) {
    throw new ConfigError('validation failed', `${filePath ?? 'document'}: ${formatZodIssues(result.error)}`, {
      filePath,
    });
  }
  return result.data;
}

/** Reads and validates a YAML file; every failure is a ConfigError. */
export function readYamlFile<S extends z.ZodTypeAny>(filePath: string, schema: S): z.output<S> {
  if (!existsSync(filePath)) {
    throw new ConfigError('file not found', filePath, { filePath });
  }
  return parseYamlDocument(readFileSync(filePath, 'utf8'), schema, filePath);
}

export function writeYamlFile(filePath: string, value: unknown): void {
  writeFileSync(filePath, dump(value, { lineWidth: 120 }), 'utf8');
}
