import { InheritanceCycleError } from '../shared/errors.js';
import type { ParsedTemplate, ResolvedChain, TemplateSource } from './types.js';

/**
 * Walks `extends` declarations upward from `templateName` without rendering
 * anything. Missing parents surface as the source's TemplateNotFoundError.
 */
export function resolveChain(source: TemplateSource, templateName: string): ResolvedChain {
  const visited: ParsedTemplate[] = [];
  let parsed: ParsedTemplate = source.parse(templateName);

  for (;;) {
    const names = visited.map((t) => t.name);
    const seenAt = names.indexOf(parsed.name);
    if (seenAt !== -1) {
      throw new InheritanceCycleError([...names.slice(seenAt), parsed.name]);
    }
    visited.push(parsed);

    const parent = parsed.ast.findExtendsTarget();
    if (parent === null) break;
    parsed = source.parse(parent);
  }

  const asts = visited.reverse();
  const allVariableRefs = new Set<string>();
  for (const template of asts) {
    for (const name of template.ast.findFreeVariableNames()) allVariableRefs.add(name);
  }

  return { chain: asts.map((t) => t.name), allVariableRefs, asts };
}
