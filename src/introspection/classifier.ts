import { ValueError } from '../shared/errors.js';
import { isSystemField } from './system-fields.js';
import type { ConflictPolicy, ParsedTemplate, TemplateAst, TemplateSchema } from './types.js';

export const DEFAULT_FILTER = 'default';

export interface ClassifyOptions {
  conflictPolicy?: ConflictPolicy;
}

export function parseConflictPolicy(value: string): ConflictPolicy {
  if (value === 'permissive' || value === 'strict') return value;
  throw new ValueError(`Invalid conflict policy: ${value}. Must be permissive or strict.`);
}

type Verdict = 'optional' | 'required' | 'absent';

function verdictIn(ast: TemplateAst, name: string): Verdict {
  if (ast.findFilterApplications(DEFAULT_FILTER).includes(name)) return 'optional';
  const reads = ast.findVariableReads().filter((v) => v === name).length;
  const tests = ast.findConditionalTestVariables().filter((v) => v === name).length;
  if (reads === 0 && tests === 0) return 'absent';
  return reads === 0 ? 'optional' : 'required';
}

/**
 * Splits `allVariableRefs` into required and optional names.
 *
 * A name is optional in one template when it is passed straight to `default`,
 * or when every occurrence sits in an `if`/`unless` test. When ancestors
 * disagree, `permissive` (the default) keeps it optional and `strict` makes it
 * required.
 */
export function classify(
  allVariableRefs: Iterable<string>,
  asts: ParsedTemplate[],
  options: ClassifyOptions = {},
): TemplateSchema {
  const policy = options.conflictPolicy ?? 'permissive';
  const required: string[] = [];
  const optional: string[] = [];

  for (const name of new Set(allVariableRefs)) {
    if (isSystemField(name)) continue;
    const verdicts = asts.map((t) => verdictIn(t.ast, name)).filter((v) => v !== 'absent');
    const anyOptional = verdicts.includes('optional');
    const anyRequired = verdicts.includes('required');

    const isOptional = policy === 'permissive' ? anyOptional : anyOptional && !anyRequired;
    (isOptional ? optional : required).push(name);
  }

  return {
    required: required.sort(),
    optional: optional.sort(),
    inheritanceChain: asts.map((t) => t.name),
  };
}
