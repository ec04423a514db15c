import { logger } from '../shared/logger.js';
import { classify } from './classifier.js';
import { resolveChain } from './resolver.js';
import type { ConflictPolicy, TemplateSchema, TemplateSource } from './types.js';

const log = logger.child({ component: 'introspector' });

/**
 * Resolver and classifier behind one call, with schemas cached per template
 * and policy. Templates are assumed immutable for the introspector's
 * lifetime; call `invalidate` after editing one.
 */
export class TemplateIntrospector {
  private readonly cache = new Map<string, TemplateSchema>();

  constructor(
    private readonly source: TemplateSource,
    private readonly conflictPolicy: ConflictPolicy = 'permissive',
  ) {}

  introspect(templateName: string, policy: ConflictPolicy = this.conflictPolicy): TemplateSchema {
    const key = `${templateName}::${policy}`;
    const cached = this.cache.get(key);
    if (cached) return cached;

    const { allVariableRefs, asts } = resolveChain(this.source, templateName);
    const schema = classify(allVariableRefs, asts, { conflictPolicy: policy });
    log.debug('template introspected', {
      template: templateName,
      chain: schema.inheritanceChain,
      required: schema.required.length,
      optional: schema.optional.length,
    });
    this.cache.set(key, schema);
    return schema;
  }

  invalidate(templateName?: string): void {
    if (templateName === undefined) {
      this.cache.clear();
      return;
    }
    for (const key of [...this.cache.keys()]) {
      if (key.startsWith(`${templateName}::`)) this.cache.delete(key);
    }
  }
}
