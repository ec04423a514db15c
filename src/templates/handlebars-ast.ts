import Handlebars from 'handlebars';
import { TemplateSyntaxError, errorMessage } from '../shared/errors.js';
import type { TemplateAst } from '../introspection/types.js';

type Node = hbs.AST.Node;
type Expression = hbs.AST.Expression;

interface Occurrence {
  name: string;
  inTest: boolean;
}

interface FilterApplication {
  filter: string;
  operand: string;
}

interface Scope {
  /** Context nesting depth; 0 is the caller's bindings. */
  level: number;
  blockParams: ReadonlySet<string>;
}

const ROOT_SCOPE: Scope = { level: 0, blockParams: new Set() };
const CONDITIONALS = new Set(['if', 'unless']);
const CONTEXT_SHIFTING = new Set(['each', 'with']);

export const EXTENDS_HELPER = 'extends';
export const IMPORT_HELPER = 'import';
export const INLINE_DECORATOR = 'inline';

function isPath(node: Node): node is hbs.AST.PathExpression {
  return node.type === 'PathExpression';
}

function isSubExpression(node: Node): node is hbs.AST.SubExpression {
  return node.type === 'SubExpression';
}

function isStringLiteral(node: Node): node is hbs.AST.StringLiteral {
  return node.type === 'StringLiteral';
}

function isMustache(node: Node): node is hbs.AST.MustacheStatement {
  return node.type === 'MustacheStatement';
}

function isBlock(node: Node): node is hbs.AST.BlockStatement {
  return node.type === 'BlockStatement';
}

function isDecoratorBlock(node: Node): node is hbs.AST.DecoratorBlock {
  return node.type === 'DecoratorBlock';
}

function isPartial(node: Node): node is hbs.AST.PartialStatement {
  return node.type === 'PartialStatement';
}

function isPartialBlock(node: Node): node is hbs.AST.PartialBlockStatement {
  return node.type === 'PartialBlockStatement';
}

function hashValues(hash: hbs.AST.Hash | undefined): Expression[] {
  return (hash?.pairs ?? []).map((pair) => pair.value);
}

function literalArgument(params: Expression[]): string | null {
  const first = params[0];
  return first !== undefined && isStringLiteral(first) ? first.value : null;
}

function enter(scope: Scope, program: hbs.AST.Program, shiftsContext: boolean): Scope {
  const params = program.blockParams ?? [];
  if (!shiftsContext && params.length === 0) return scope;
  return {
    level: shiftsContext ? scope.level + 1 : scope.level,
    blockParams: new Set([...scope.blockParams, ...params]),
  };
}

/**
 * Single pass over a Handlebars program that records every fact the
 * introspector asks about. Macro bodies (`{{#*inline}}`) are skipped: their
 * names are bound by the caller's hash arguments, not by the template context.
 */
class Collector {
  readonly occurrences: Occurrence[] = [];
  readonly filters: FilterApplication[] = [];
  readonly imports: string[] = [];
  readonly inlines: string[] = [];
  readonly extendsTargets: string[] = [];

  constructor(
    private readonly templateName: string,
    private readonly helpers: ReadonlySet<string>,
  ) {}

  program(program: hbs.AST.Program, scope: Scope, topLevel: boolean): void {
    for (const statement of program.body) {
      this.statement(statement, scope, topLevel);
    }
  }

  private statement(node: Node, scope: Scope, topLevel: boolean): void {
    if (isMustache(node)) {
      this.call(node.path, node.params, node.hash, scope, false);
    } else if (isDecoratorBlock(node)) {
      if (node.path.original === INLINE_DECORATOR) {
        const name = literalArgument(node.params);
        if (name === null) {
          throw new TemplateSyntaxError(this.templateName, '{{#*inline}} needs a quoted macro name');
        }
        this.inlines.push(name);
      }
    } else if (isBlock(node)) {
      this.block(node, scope, topLevel);
    } else if (isPartial(node) || isPartialBlock(node)) {
      if (isSubExpression(node.name)) this.expression(node.name, scope, false);
      for (const param of [...node.params, ...hashValues(node.hash)]) {
        this.expression(param, scope, false);
      }
      if (isPartialBlock(node)) this.program(node.program, scope, false);
    }
  }

  private block(node: hbs.AST.BlockStatement, scope: Scope, topLevel: boolean): void {
    const name = node.path.original;

    if (name === EXTENDS_HELPER) {
      if (!topLevel) {
        throw new TemplateSyntaxError(this.templateName, '{{#extends}} must be a top-level statement');
      }
      const target = literalArgument(node.params);
      if (target === null) {
        throw new TemplateSyntaxError(this.templateName, '{{#extends}} needs a quoted template name');
      }
      this.extendsTargets.push(target);
      this.program(node.program, scope, false);
      return;
    }

    const args = [...node.params, ...hashValues(node.hash)];
    if (CONDITIONALS.has(name)) {
      for (const arg of args) this.expression(arg, scope, true);
    } else if (this.isHelperCall(node.path, node.params, node.hash)) {
      for (const arg of args) this.expression(arg, scope, false);
    } else {
      // Mustache-style section: {{#items}}…{{/items}} iterates or scopes into `items`.
      this.reference(node.path, scope, false);
      this.program(node.program, enter(scope, node.program, true), false);
      if (node.inverse) this.program(node.inverse, scope, false);
      return;
    }

    this.program(node.program, enter(scope, node.program, CONTEXT_SHIFTING.has(name)), false);
    if (node.inverse) this.program(node.inverse, scope, false);
  }

  private call(
    path: hbs.AST.PathExpression | hbs.AST.Literal,
    params: Expression[],
    hash: hbs.AST.Hash | undefined,
    scope: Scope,
    inTest: boolean,
  ): void {
    if (!isPath(path)) return;
    if (!this.isHelperCall(path, params, hash)) {
      this.reference(path, scope, inTest);
      return;
    }

    const helper = path.original;
    if (helper === IMPORT_HELPER) {
      const target = literalArgument(params);
      if (target === null) {
        throw new TemplateSyntaxError(this.templateName, '{{import}} needs a quoted library name');
      }
      this.imports.push(target);
      return;
    }

    const first = params[0];
    if (first !== undefined && isPath(first)) {
      const operand = this.rootVariable(first, scope);
      if (operand !== null) this.filters.push({ filter: helper, operand });
    }

    // Inline form: (if test a b)
    const testsFirstArg = CONDITIONALS.has(helper);
    params.forEach((param, index) => {
      this.expression(param, scope, inTest || (testsFirstArg && index === 0));
    });
    for (const value of hashValues(hash)) this.expression(value, scope, inTest);
  }

  private expression(node: Expression, scope: Scope, inTest: boolean): void {
    if (isPath(node)) {
      this.reference(node, scope, inTest);
    } else if (isSubExpression(node)) {
      this.call(node.path, node.params, node.hash, scope, inTest);
    }
  }

  private reference(path: hbs.AST.PathExpression, scope: Scope, inTest: boolean): void {
    const name = this.rootVariable(path, scope);
    if (name !== null) this.occurrences.push({ name, inTest });
  }

  /** Name of the caller-supplied variable `path` reads, or null for template-internal names. */
  private rootVariable(path: hbs.AST.PathExpression, scope: Scope): string | null {
    if (path.data) {
      return path.parts[0] === 'root' && path.parts[1] !== undefined ? path.parts[1] : null;
    }
    const head = path.parts[0];
    if (head === undefined) return null;
    if (path.depth === 0 && scope.blockParams.has(head)) return null;
    if (scope.level - path.depth > 0) return null;
    return head;
  }

  private isHelperCall(
    path: hbs.AST.PathExpression,
    params: Expression[],
    hash: hbs.AST.Hash | undefined,
  ): boolean {
    if (params.length > 0 || hashValues(hash).length > 0) return true;
    return !path.data && path.depth === 0 && path.parts.length === 1 && this.helpers.has(path.original);
  }
}

export class HandlebarsTemplateAst implements TemplateAst {
  private readonly collected: Collector;

  constructor(
    readonly templateName: string,
    readonly program: hbs.AST.Program,
    helperNames: ReadonlySet<string>,
  ) {
    this.collected = new Collector(templateName, helperNames);
    this.collected.program(program, ROOT_SCOPE, true);
    if (this.collected.extendsTargets.length > 1) {
      throw new TemplateSyntaxError(
        templateName,
        `a template may extend at most one parent, found ${this.collected.extendsTargets.join(', ')}`,
      );
    }
  }

  static parse(
    templateName: string,
    source: string,
    helperNames: ReadonlySet<string>,
  ): HandlebarsTemplateAst {
    let program: hbs.AST.Program;
    try {
      program = Handlebars.parse(source);
    } catch (err) {
      throw new TemplateSyntaxError(templateName, errorMessage(err), { cause: err });
    }
    return new HandlebarsTemplateAst(templateName, program, helperNames);
  }

  findExtendsTarget(): string | null {
    return this.collected.extendsTargets[0] ?? null;
  }

  findImports(): string[] {
    return [...this.collected.imports];
  }

  findFilterApplications(filterName: string): string[] {
    return this.collected.filters.filter((f) => f.filter === filterName).map((f) => f.operand);
  }

  findConditionalTestVariables(): string[] {
    return this.collected.occurrences.filter((o) => o.inTest).map((o) => o.name);
  }

  findVariableReads(): string[] {
    return this.collected.occurrences.filter((o) => !o.inTest).map((o) => o.name);
  }

  findFreeVariableNames(): Set<string> {
    return new Set(this.collected.occurrences.map((o) => o.name));
  }

  findInlineDefinitions(): string[] {
    return [...this.collected.inlines];
  }

  /** The program bodies of every `{{#*inline}}` macro, keyed by macro name. */
  inlinePrograms(): Map<string, hbs.AST.Program> {
    const programs = new Map<string, hbs.AST.Program>();
    for (const node of this.program.body) {
      if (isDecoratorBlock(node) && node.path.original === INLINE_DECORATOR) {
        const name = literalArgument(node.params);
        if (name !== null) programs.set(name, node.program);
      }
    }
    return programs;
  }
}
