import { describe, it, expect } from '@jest/globals';
import { ValueError } from '../shared/errors.js';
import {
  defaultValue,
  isIdentifier,
  join,
  kebabCase,
  lower,
  pascalCase,
  snakeCase,
  upper,
  validateIdentifier,
} from '../templates/filters.js';

describe('case filters', () => {
  it('pascalCase joins snake, kebab and camel segments', () => {
    expect(pascalCase('test_name')).toBe('TestName');
    expect(pascalCase('userId')).toBe('UserId');
    expect(pascalCase('my-var')).toBe('MyVar');
  });

  it('snakeCase splits case boundaries and acronyms', () => {
    expect(snakeCase('TestName')).toBe('test_name');
    expect(snakeCase('HTTPServer')).toBe('http_server');
    expect(snakeCase('my-var')).toBe('my_var');
  });

  it('kebabCase follows snakeCase', () => {
    expect(kebabCase('TestName')).toBe('test-name');
  });

  it('upper and lower accept numbers', () => {
    expect(upper('abc')).toBe('ABC');
    expect(lower(42)).toBe('42');
  });

  it('rejects non-string input with a ValueError', () => {
    expect(() => pascalCase(undefined)).toThrow(ValueError);
    expect(() => pascalCase(undefined)).toThrow('pascalCase expects a string, got undefined');
    expect(() => snakeCase(null)).toThrow('snakeCase expects a string, got null');
  });
});

describe('validateIdentifier', () => {
  it('returns valid identifiers unchanged', () => {
    expect(validateIdentifier('ok_1')).toBe('ok_1');
    expect(isIdentifier('_private')).toBe(true);
  });

  it('rejects names starting with a digit', () => {
    expect(() => validateIdentifier('123bad')).toThrow(ValueError);
    expect(isIdentifier('with space')).toBe(false);
  });
});

describe('defaultValue', () => {
  it('falls back on undefined, null and empty string only', () => {
    expect(defaultValue(undefined, 'x')).toBe('x');
    expect(defaultValue(null, 'x')).toBe('x');
    expect(defaultValue('', 'x')).toBe('x');
    expect(defaultValue(0, 'x')).toBe(0);
    expect(defaultValue(false, 'x')).toBe(false);
  });
});

describe('join', () => {
  it('joins with the given separator', () => {
    expect(join(['a', 'b'], '-')).toBe('a-b');
  });

  it('uses ", " when the separator is not a string', () => {
    // Handlebars passes its options object when the separator is omitted.
    expect(join(['a', 'b'], {})).toBe('a, b');
  });

  it('rejects anything but a list', () => {
    expect(() => join('a,b', ',')).toThrow('join expects a list, got string');
  });
});
