import { ValueError } from '../shared/errors.js';

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

function asText(value: unknown, filter: string): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  throw new ValueError(
    `${filter} expects a string, got ${value === null ? 'null' : typeof value}`,
  );
}

/**
 * "TestName" -> "test_name", "HTTPServer" -> "http_server", "my-var" -> "my_var".
 */
export function snakeCase(value: unknown): string {
  const text = asText(value, 'snakeCase');
  return text
    .replace(/([^_\-\s])([A-Z][a-z]+)/g, '$1_$2')
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[-\s]+/g, '_')
    .toLowerCase();
}

export function kebabCase(value: unknown): string {
  return snakeCase(value).replace(/_/g, '-');
}

/**
 * Splits on `_`, `-`, whitespace and case boundaries, then capitalises each
 * segment: "test_name" -> "TestName", "userId" -> "UserId".
 */
export function pascalCase(value: unknown): string {
  const text = asText(value, 'pascalCase');
  return snakeCase(text)
    .split('_')
    .filter((segment) => segment.length > 0)
    .map((segment) => segment.charAt(0).toUpperCase() + segment.slice(1))
    .join('');
}

export function upper(value: unknown): string {
  return asText(value, 'upper').toUpperCase();
}

export function lower(value: unknown): string {
  return asText(value, 'lower').toLowerCase();
}

/** `fallback` when `value` is undefined, null or the empty string. */
export function defaultValue(value: unknown, fallback: unknown): unknown {
  return value === undefined || value === null || value === '' ? fallback : value;
}

export function join(list: unknown, separator: unknown): string {
  if (!Array.isArray(list)) {
    throw new ValueError(`join expects a list, got ${list === null ? 'null' : typeof list}`);
  }
  return list.map((item) => asText(item, 'join')).join(typeof separator === 'string' ? separator : ', ');
}

export function isIdentifier(value: string): boolean {
  return IDENTIFIER_RE.test(value);
}

export function validateIdentifier(value: unknown): string {
  if (typeof value !== 'string' || !isIdentifier(value)) {
    throw new ValueError(
      `Invalid identifier: '${String(value)}'. Use letters, digits and underscores, not starting with a digit`,
    );
  }
  return value;
}

export const CASE_FILTERS = {
  pascalCase,
  snakeCase,
  kebabCase,
  validateIdentifier,
  upper,
  lower,
} as const;
