import { COMMENT_SYNTAXES, type CommentSyntax } from '../shared/schemas.js';

const DEFAULT_EXTENSIONS: Record<CommentSyntax, readonly string[]> = {
  hash: ['.py', '.yaml', '.yml', '.sh', '.txt', '.toml'],
  double_slash: ['.ts', '.tsx', '.js', '.mjs', '.java', '.cs', '.go'],
  html_comment: ['.md', '.html', '.xml'],
  template_comment: ['.jinja2', '.j2', '.hbs', '.handlebars'],
};

/** Extension (with leading dot, lower-cased) to comment syntax. */
export type ExtensionTable = ReadonlyMap<string, CommentSyntax>;

export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

/**
 * The fixed table, extended with `extra` entries. An extra entry may not move
 * an extension that the fixed table already assigns.
 */
export function buildExtensionTable(
  extra: Iterable<[CommentSyntax, readonly string[]]> = [],
): ExtensionTable {
  const table = new Map<string, CommentSyntax>();
  for (const syntax of COMMENT_SYNTAXES) {
    for (const ext of DEFAULT_EXTENSIONS[syntax]) table.set(ext, syntax);
  }
  for (const [syntax, extensions] of extra) {
    for (const ext of extensions) {
      const key = normalizeExtension(ext);
      if (!table.has(key)) table.set(key, syntax);
    }
  }
  return table;
}

export function syntaxForExtension(table: ExtensionTable, extension: string): CommentSyntax | null {
  return table.get(normalizeExtension(extension)) ?? null;
}

