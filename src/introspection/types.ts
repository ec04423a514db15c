/**
 * Engine-neutral view of a parsed template. The resolver and classifier only
 * see templates through this interface; `HandlebarsTemplateAst` is the one
 * implementation shipped.
 */
export interface TemplateAst {
  /** Parent template named by the single top-level `extends`, or null for a root. */
  findExtendsTarget(): string | null;
  /** Macro libraries pulled in with `import`. */
  findImports(): string[];
  /** One entry per application of `filterName` whose operand is a bare variable. */
  findFilterApplications(filterName: string): string[];
  /** One entry per variable occurrence inside a conditional test. */
  findConditionalTestVariables(): string[];
  /** One entry per variable occurrence outside conditional tests. */
  findVariableReads(): string[];
  findFreeVariableNames(): Set<string>;
  /** Names of the macros this template defines. */
  findInlineDefinitions(): string[];
}

export interface ParsedTemplate {
  name: string;
  ast: TemplateAst;
}

/** Anything that can hand out parsed templates by name (the rendering engine does). */
export interface TemplateSource {
  parse(name: string): ParsedTemplate;
}

export interface ResolvedChain {
  /** Root-most ancestor first, queried template last. */
  chain: string[];
  allVariableRefs: Set<string>;
  /** Parsed templates in chain order. */
  asts: ParsedTemplate[];
}

export interface TemplateSchema {
  required: string[];
  optional: string[];
  inheritanceChain: string[];
}

/**
 * How a variable that is optional in one ancestor and required in another is
 * classified. `permissive` lets optional win.
 */
export type ConflictPolicy = 'permissive' | 'strict';
