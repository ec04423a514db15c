import { describe, it, expect, beforeEach, afterEach, afterAll } from '@jest/globals';
import { join } from 'node:path';
import { TemplateSyntaxError, ValidationError } from '../shared/errors.js';
import type { Scaffolder } from '../scaffolding/factory.js';
import { RenderingEngine } from '../templates/engine.js';
import { checkRule, mergeTemplateRules } from '../validation/layered-validator.js';
import { FIXED_NOW, FIXED_TIMESTAMP, createBundledScaffolder, createTemplateRoot, type TempDir } from './test-helpers.js';

const DESIGN_CONTEXT = { name: 'cache', title: 'Cache', context: 'Reads are slow.', decision: 'Add a cache.' };

function validationError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error('expected a ValidationError');
}

describe('mergeTemplateRules', () => {
  it('lets a descendant replace an inherited rule by id', () => {
    const rules = mergeTemplateRules([
      {
        template: 'base',
        validates: {
          strict: [{ rule: 'heading', pattern: '^# ', forbid: false }],
          guidelines: [{ rule: 'short', pattern: '.{200}', forbid: true }],
        },
      },
      { template: 'middle' },
      {
        template: 'leaf',
        validates: {
          strict: [
            { rule: 'heading', pattern: '^## ', forbid: false },
            { rule: 'owner', description: 'Names an owner', pattern: '^Owner: ', forbid: false },
          ],
          guidelines: [],
        },
      },
    ]);

    expect(rules.map((r) => [r.id, r.layer, r.template, r.pattern.source])).toEqual([
      ['heading', 'architecture', 'leaf', '^## '],
      ['owner', 'architecture', 'leaf', '^Owner: '],
      ['short', 'guideline', 'base', '.{200}'],
    ]);
    expect(rules[2]?.description).toBe('Forbidden pattern found: .{200}');
  });

  it('treats strict rules declared by ancestors as format rules', () => {
    const rules = mergeTemplateRules([
      { template: 'base', validates: { strict: [{ rule: 'a', pattern: 'x', forbid: false }], guidelines: [] } },
      { template: 'leaf' },
    ]);
    expect(rules.map((r) => r.layer)).toEqual(['format']);
    expect(rules[0]?.description).toBe('Required pattern not found: x');
  });
});

describe('checkRule', () => {
  const [forbidTodo] = mergeTemplateRules([
    { template: 't', validates: { strict: [], guidelines: [{ rule: 'todo', pattern: 'TODO', forbid: true }] } },
  ]);

  it('reports the line of a forbidden match', () => {
    if (!forbidTodo) throw new Error('rule missing');
    expect(checkRule(forbidTodo, 'one\ntwo TODO\nthree\n')).toEqual({
      rule: 'todo',
      layer: 'guideline',
      severity: 'warning',
      template: 't',
      message: 'Forbidden pattern found: TODO',
      line: 2,
    });
    expect(checkRule(forbidTodo, 'clean\n')).toBeNull();
  });
});

describe('template header rules', () => {
  let tmp: TempDir;

  afterAll(() => tmp.cleanup());

  it('rejects a rule whose pattern does not compile', () => {
    tmp = createTemplateRoot({
      'broken.hbs': "{{!--\nvalidates:\n  strict:\n    - rule: broken\n      pattern: '('\n--}}\nx\n",
    });
    const engine = RenderingEngine.initialize(tmp.dir);
    expect(() => engine.load('broken')).toThrow(TemplateSyntaxError);
  });
});

describe('LayeredValidator', () => {
  let scaffolder: Scaffolder;
  let outputRoot: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ scaffolder, outputRoot, cleanup } = createBundledScaffolder());
  });

  afterEach(() => cleanup());

  function design(context: Record<string, unknown> = DESIGN_CONTEXT) {
    return scaffolder.pipeline.scaffold({ artifactType: 'design', context, now: FIXED_NOW });
  }

  it('merges the rules of the bundled design chain', () => {
    expect(scaffolder.validator.rulesFor('design').map((r) => [r.id, r.layer, r.template])).toEqual([
      ['title_heading', 'format', 'tier1/base_document'],
      ['decision_section', 'architecture', 'concrete/design'],
      ['status_line', 'guideline', 'tier2/markdown'],
      ['no_todo', 'guideline', 'concrete/design'],
    ]);
    expect(scaffolder.validator.rulesFor('dto').map((r) => r.id)).toEqual([
      'module_docstring',
      'base_model',
      'no_tabs',
      'no_print',
    ]);
  });

  it('passes freshly generated artifacts', () => {
    const generated = design();
    const result = scaffolder.validator.validate(generated.content, '.md');
    expect(result).toMatchObject({
      artifactType: 'design',
      templateName: 'concrete/design',
      passed: true,
      score: 10,
      issues: [],
      layersChecked: ['format', 'architecture', 'guideline'],
      currentVersion: generated.versionHash,
      recorded: null,
    });

    const dto = scaffolder.pipeline.scaffold({
      artifactType: 'dto',
      context: { name: 'user', fields: [{ name: 'id', type: 'int' }] },
    });
    expect(scaffolder.validator.validate(dto.content, '.py').score).toBe(10);
  });

  it('stops at the format layer', () => {
    const content = design().content.replace('# Cache\n', '');
    const result = scaffolder.validator.validate(content, '.md');
    expect(result.passed).toBe(false);
    expect(result.score).toBe(0);
    expect(result.layersChecked).toEqual(['format']);
    expect(result.issues).toEqual([
      {
        rule: 'title_heading',
        layer: 'format',
        severity: 'error',
        template: 'tier1/base_document',
        message: 'Documents open with a level-1 title',
      },
    ]);
  });

  it('reports architectural errors before guidelines', () => {
    const content = design().content.replace('## Decision\n', '');
    const result = scaffolder.validator.validate(content, '.md');
    expect(result.layersChecked).toEqual(['format', 'architecture']);
    expect(result.issues).toEqual([
      {
        rule: 'decision_section',
        layer: 'architecture',
        severity: 'error',
        template: 'concrete/design',
        message: 'Design records state a decision',
      },
    ]);
  });

  it('passes with warnings when only guidelines fail', () => {
    const { content } = design({ ...DESIGN_CONTEXT, decision: 'Add a cache. TODO size it' });
    const todoLine = content.split('\n').findIndex((line) => line.includes('TODO')) + 1;
    const result = scaffolder.validator.validate(content, '.md');
    expect(result.passed).toBe(true);
    expect(result.score).toBe(8);
    expect(result.issues).toEqual([
      {
        rule: 'no_todo',
        layer: 'guideline',
        severity: 'warning',
        template: 'concrete/design',
        message: 'Resolve TODO markers before review',
        line: todoLine,
      },
    ]);
  });

  it('warns when the file predates the current template version', () => {
    const generated = design();
    const content = generated.content.replace(`version=${generated.versionHash}`, 'version=abcd1234');
    const result = scaffolder.validator.validate(content, '.md');
    expect(result.score).toBe(8);
    expect(result.issues).toEqual([
      {
        rule: 'template_version',
        layer: 'guideline',
        severity: 'warning',
        template: null,
        message: `Generated from template version abcd1234; the current version is ${generated.versionHash}`,
      },
    ]);
  });

  it('checks the header version against the template registry', () => {
    const dto = scaffolder.pipeline.scaffold({
      artifactType: 'dto',
      context: { name: 'user', fields: [] },
      write: true,
      now: FIXED_NOW,
    });
    const generated = design();
    const content = generated.content.replace(`version=${generated.versionHash}`, `version=${dto.versionHash}`);

    const result = scaffolder.validator.validate(content, '.md');
    expect(result.recorded?.artifact_type).toBe('dto');
    expect(result.layersChecked).toEqual(['format']);
    expect(result.issues).toEqual([
      {
        rule: 'provenance_record',
        layer: 'format',
        severity: 'error',
        template: null,
        message: `Version ${dto.versionHash} is recorded for dto, not design`,
      },
    ]);
  });

  it('validates written files and returns their registry record', () => {
    const written = scaffolder.pipeline.scaffold({
      artifactType: 'design',
      context: DESIGN_CONTEXT,
      write: true,
      now: FIXED_NOW,
    });
    const result = scaffolder.validator.validateFile(join(outputRoot, 'docs/design/cache.md'));
    expect(written.outputPath).toBe('docs/design/cache.md');
    expect(result.passed).toBe(true);
    expect(result.recorded).toMatchObject({ artifact_type: 'design', created: FIXED_TIMESTAMP });
  });

  it('refuses content without a provenance header', () => {
    const err = validationError(() => scaffolder.validator.validate('# Notes\n', '.md'));
    expect(err.message).toBe('No provenance header found; the producing template is unknown');
  });

  it('refuses headers naming an unknown artifact type', () => {
    const err = validationError(() =>
      scaffolder.validator.validate('<!-- template=widget version=abcd1234 created=2026-01-20T14:00:00Z -->\n', '.md'),
    );
    expect(err.message).toBe('Unknown artifact type in provenance header: widget');
    expect(err.hints).toEqual(['Available types: commit_message, design, dto, service, worker']);
  });
});
