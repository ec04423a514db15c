import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { InheritanceCycleError, TemplateNotFoundError, ValueError } from '../shared/errors.js';
import { classify, parseConflictPolicy } from '../introspection/classifier.js';
import { TemplateIntrospector } from '../introspection/introspector.js';
import { resolveChain } from '../introspection/resolver.js';
import type { ParsedTemplate, TemplateAst, TemplateSource } from '../introspection/types.js';
import { RenderingEngine } from '../templates/engine.js';
import { createTemplateRoot, type TempDir } from './test-helpers.js';

const TEMPLATES: Record<string, string> = {
  'tier0.hbs': '{{#block "content"}}{{/block}}{{#if show_footer}}footer{{/if}}',
  'tier1.hbs': '{{#extends "tier0"}}{{#override "content"}}{{title}} {{#block "body"}}{{/block}}{{/override}}{{/extends}}',
  'tier2.hbs':
    '{{#extends "tier1"}}{{#override "body"}}{{default subtitle "none"}} {{#block "main"}}{{/block}}{{/override}}{{/extends}}',
  'concrete.hbs':
    '{{#extends "tier2"}}{{#override "main"}}{{name.first}} {{timestamp}} {{#each items as |it|}}{{it}}{{/each}}{{/override}}{{/extends}}',
  'conflict_base.hbs': '{{#block "b"}}{{/block}}{{#if flag}}on{{/if}}',
  'conflict_child.hbs': '{{#extends "conflict_base"}}{{#override "b"}}{{flag}}{{/override}}{{/extends}}',
  'a.hbs': '{{#extends "b"}}{{/extends}}',
  'b.hbs': '{{#extends "a"}}{{/extends}}',
  'orphan.hbs': '{{#extends "ghost"}}{{/extends}}',
};

describe('template introspection', () => {
  let tmp: TempDir;
  let engine: RenderingEngine;

  beforeAll(() => {
    tmp = createTemplateRoot(TEMPLATES);
    engine = new RenderingEngine(tmp.dir);
  });

  afterAll(() => tmp.cleanup());

  describe('resolveChain', () => {
    it('walks a four-tier chain root first', () => {
      const resolved = resolveChain(engine, 'concrete');
      expect(resolved.chain).toEqual(['tier0', 'tier1', 'tier2', 'concrete']);
      expect([...resolved.allVariableRefs].sort()).toEqual([
        'items',
        'name',
        'show_footer',
        'subtitle',
        'timestamp',
        'title',
      ]);
      expect(resolved.asts.map((t) => t.name)).toEqual(resolved.chain);
    });

    it('reports cycles with the full loop', () => {
      let caught: unknown;
      try {
        resolveChain(engine, 'a');
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(InheritanceCycleError);
      if (!(caught instanceof InheritanceCycleError)) return;
      expect(caught.cycle).toEqual(['a', 'b', 'a']);
    });

    it('surfaces a missing parent', () => {
      expect(() => resolveChain(engine, 'orphan')).toThrow(TemplateNotFoundError);
    });
  });

  describe('classify', () => {
    it('splits required and optional names and drops system fields', () => {
      const { allVariableRefs, asts } = resolveChain(engine, 'concrete');
      expect(classify(allVariableRefs, asts)).toEqual({
        required: ['items', 'name', 'title'],
        optional: ['show_footer', 'subtitle'],
        inheritanceChain: ['tier0', 'tier1', 'tier2', 'concrete'],
      });
    });

    it('resolves ancestor disagreements by policy', () => {
      const { allVariableRefs, asts } = resolveChain(engine, 'conflict_child');
      expect(classify(allVariableRefs, asts, { conflictPolicy: 'permissive' })).toMatchObject({
        required: [],
        optional: ['flag'],
      });
      expect(classify(allVariableRefs, asts, { conflictPolicy: 'strict' })).toMatchObject({
        required: ['flag'],
        optional: [],
      });
    });

    it('works against any TemplateAst implementation', () => {
      const ast: TemplateAst = {
        findExtendsTarget: () => null,
        findImports: () => [],
        findFilterApplications: (filter) => (filter === 'default' ? ['tone'] : []),
        findConditionalTestVariables: () => ['verbose'],
        findVariableReads: () => ['tone', 'topic', 'format'],
        findFreeVariableNames: () => new Set(['tone', 'topic', 'verbose', 'format']),
        findInlineDefinitions: () => [],
      };
      const parsed: ParsedTemplate = { name: 'fake', ast };
      const source: TemplateSource = { parse: () => parsed };
      const { allVariableRefs, asts } = resolveChain(source, 'fake');
      expect(classify(allVariableRefs, asts)).toEqual({
        required: ['topic'],
        optional: ['tone', 'verbose'],
        inheritanceChain: ['fake'],
      });
    });
  });

  describe('parseConflictPolicy', () => {
    it('accepts the two policies', () => {
      expect(parseConflictPolicy('strict')).toBe('strict');
      expect(parseConflictPolicy('permissive')).toBe('permissive');
    });

    it('rejects anything else', () => {
      expect(() => parseConflictPolicy('lenient')).toThrow(ValueError);
    });
  });

  describe('TemplateIntrospector', () => {
    it('caches per template and policy', () => {
      const introspector = new TemplateIntrospector(engine);
      const first = introspector.introspect('conflict_child');
      expect(introspector.introspect('conflict_child')).toBe(first);
      expect(introspector.introspect('conflict_child', 'strict')).not.toBe(first);
      expect(introspector.introspect('conflict_child', 'strict').required).toEqual(['flag']);
    });

    it('recomputes after invalidate', () => {
      const introspector = new TemplateIntrospector(engine, 'strict');
      const first = introspector.introspect('concrete');
      introspector.invalidate('concrete');
      const second = introspector.introspect('concrete');
      expect(second).not.toBe(first);
      expect(second).toEqual(first);
    });
  });
});
