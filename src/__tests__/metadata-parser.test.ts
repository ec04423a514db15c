import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { MetadataParseError } from '../shared/errors.js';
import { BUNDLED_METADATA_CONFIG, ScaffoldMetadataConfig } from '../metadata/config.js';
import { ScaffoldMetadataParser } from '../metadata/parser.js';
import { createTempDir, type TempDir } from './test-helpers.js';

const CREATED = '2026-01-20T14:00:00Z';

function parseError(parser: ScaffoldMetadataParser, content: string, ext: string): MetadataParseError {
  try {
    parser.parse(content, ext);
  } catch (err) {
    if (err instanceof MetadataParseError) return err;
    throw err;
  }
  throw new Error('expected a MetadataParseError');
}

describe('ScaffoldMetadataParser', () => {
  let parser: ScaffoldMetadataParser;

  beforeAll(() => {
    parser = new ScaffoldMetadataParser(ScaffoldMetadataConfig.load(BUNDLED_METADATA_CONFIG));
  });

  it('parses a single-line hash header', () => {
    const content = `# SCAFFOLD: template=dto version=abcd1234 created=${CREATED}\nclass User: pass\n`;
    expect(parser.parse(content, '.py')).toEqual({ template: 'dto', version: 'abcd1234', created: CREATED });
  });

  it('parses a two-line header', () => {
    const content = `# backend/dtos/user.py\n# template=dto version=abcd1234 created=${CREATED} updated=\nbody\n`;
    expect(parser.parse(content, '.py')).toEqual({
      template: 'dto',
      version: 'abcd1234',
      created: CREATED,
      updated: '',
    });
  });

  it('parses html comment headers', () => {
    const content =
      '<!-- docs/design/x.md -->\n<!-- template=design version=abcd1234 created=2026-01-20T14:00Z updated= -->\n# X\n';
    expect(parser.parse(content, '.md')).toEqual({
      template: 'design',
      version: 'abcd1234',
      created: '2026-01-20T14:00Z',
      updated: '',
    });
  });

  it('parses double-slash and template comment headers', () => {
    expect(parser.parse(`// template=service version=abcd1234 created=${CREATED}`, '.ts')).toMatchObject({
      template: 'service',
    });
    expect(parser.parse(`{# template=dto version=abcd1234 created=${CREATED} #}`, 'j2')).toMatchObject({
      template: 'dto',
    });
  });

  it('reads a two-line header whose path contains spaces', () => {
    const content = `<!-- docs/design/My design.md -->\n<!-- template=design version=abcd1234 created=${CREATED} updated= -->\n`;
    expect(parser.parse(content, '.md')).toEqual({
      template: 'design',
      version: 'abcd1234',
      created: CREATED,
      updated: '',
    });
  });

  it('rejects long near-miss header lines in linear time', () => {
    const chained = `# ${Array.from({ length: 60 }, () => 'a').join('=')} !`;
    const spaced = `# ${Array.from({ length: 60 }, () => 'a=a').join(' ')} !`;
    const html = `<!-- ${Array.from({ length: 60 }, () => 'a=a=').join('')} x`;

    const started = Date.now();
    expect(parser.parse(chained, '.py')).toBeNull();
    expect(parser.parse(spaced, '.py')).toBeNull();
    expect(parser.parse(html, '.md')).toBeNull();
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('returns null when there is no header', () => {
    expect(parser.parse('import os\nprint(1)\n', '.py')).toBeNull();
    expect(parser.parse('', '.py')).toBeNull();
    expect(parser.parse(`\n# template=dto version=abcd1234 created=${CREATED}`, '.py')).toBeNull();
    expect(parser.parse(`# template=dto version=abcd1234 created=${CREATED}`, '.xyz')).toBeNull();
  });

  it('reports a missing required field', () => {
    const err = parseError(parser, `# template=dto created=${CREATED}`, '.py');
    expect(err.message).toBe('missing required field: version');
    expect(err.field).toBe('version');
  });

  it('treats keys case-sensitively', () => {
    const err = parseError(parser, `# Template=dto version=abcd1234 created=${CREATED}`, '.py');
    expect(err.message).toBe('missing required field: template');
  });

  it('drops unknown keys', () => {
    const content = `# template=dto version=abcd1234 created=${CREATED} extra_field=ignored`;
    expect(parser.parse(content, '.py')).toEqual({ template: 'dto', version: 'abcd1234', created: CREATED });
  });

  it('keeps the last occurrence of a repeated key', () => {
    const content = `# template=dto template=worker version=1.0 created=${CREATED}`;
    expect(parser.parse(content, '.py')).toEqual({ template: 'worker', version: '1.0', created: CREATED });
  });

  it('validates field formats', () => {
    const err = parseError(parser, `# template=DTO version=abcd1234 created=${CREATED}`, '.py');
    expect(err.message).toBe("invalid value 'DTO' for field 'template'");
    expect(err.expected).toBe('^[a-z0-9_-]+$');
    expect(parseError(parser, '# template=dto version=abcd1234 created=2026-01-20', '.py').field).toBe('created');
  });

  it('reports a matching line without key=value pairs', () => {
    const config = ScaffoldMetadataConfig.fromYaml(`
comment_patterns:
  - syntax: hash
    prefix: "# "
    metadata_line_regex: '^#\\s*SCAFFOLD:(.*)$'
metadata_fields:
  - name: template
    format_regex: '^.+$'
`);
    const err = parseError(new ScaffoldMetadataParser(config), '# SCAFFOLD: nothing here', '.py');
    expect(err.message).toBe('no valid key=value pairs');
  });

  describe('parseFile', () => {
    let tmp: TempDir;

    beforeAll(() => {
      tmp = createTempDir();
    });

    afterAll(() => tmp.cleanup());

    it('uses the file extension to pick the syntax', () => {
      const path = join(tmp.dir, 'user.ts');
      writeFileSync(path, `// src/user.ts\n// template=service version=abcd1234 created=${CREATED} updated=\n`, 'utf8');
      expect(parser.parseFile(path)).toEqual({
        template: 'service',
        version: 'abcd1234',
        created: CREATED,
        updated: '',
      });
    });
  });
});
