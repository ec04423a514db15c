import Handlebars from 'handlebars';
import { existsSync, readFileSync, readdirSync, statSync } from 'node:fs';
import { basename, isAbsolute, join, relative, resolve, sep } from 'node:path';
import {
  ConfigError,
  InheritanceCycleError,
  RenderError,
  ScaffoldError,
  TemplateNotFoundError,
  ValueError,
  errorMessage,
} from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { TemplateHeader } from '../shared/schemas.js';
import type { ParsedTemplate, TemplateSource } from '../introspection/types.js';
import { CASE_FILTERS, defaultValue, join as joinList } from './filters.js';
import { parseTemplateHeader } from './header.js';
import { EXTENDS_HELPER, HandlebarsTemplateAst, IMPORT_HELPER } from './handlebars-ast.js';

export const TEMPLATE_EXTENSION = '.hbs';

const COMPILE_OPTIONS: CompileOptions = { strict: true, noEscape: true };

const BUILTIN_HELPERS = ['if', 'unless', 'each', 'with', 'lookup', 'log'];
const INHERITANCE_HELPERS = [EXTENDS_HELPER, 'block', 'override', IMPORT_HELPER];
const HELPER_NAMES: ReadonlySet<string> = new Set([
  ...BUILTIN_HELPERS,
  ...INHERITANCE_HELPERS,
  ...Object.keys(CASE_FILTERS),
  'default',
  'join',
  'eq',
]);

export interface LoadedTemplate {
  name: string;
  path: string;
  source: string;
  header: TemplateHeader | null;
  ast: HandlebarsTemplateAst;
}

type Bindings = Record<string, unknown>;

const STATE_KEY = 'tierforgeInheritance';

/**
 * Per-render inheritance bookkeeping carried in a Handlebars data frame.
 * `chain` runs from the rendered template up to the one currently executing.
 */
class InheritanceState {
  constructor(
    readonly overrides: Map<string, () => string>,
    readonly chain: readonly string[],
    readonly collecting: boolean,
  ) {}

  get current(): string {
    return this.chain[this.chain.length - 1] ?? '';
  }
}

function stateOf(data: unknown): InheritanceState | null {
  if (typeof data !== 'object' || data === null) return null;
  const state: unknown = Reflect.get(data, STATE_KEY);
  return state instanceof InheritanceState ? state : null;
}

function frameWith(data: unknown, state: InheritanceState): object {
  const frame: unknown = Handlebars.createFrame(data ?? {});
  const target = typeof frame === 'object' && frame !== null ? frame : {};
  Reflect.set(target, STATE_KEY, state);
  return target;
}

/** Root-relative, forward-slash, extension-less form of a template name. */
export function normalizeTemplateName(name: string): string {
  let normalized = name.trim().replace(/\\/g, '/').replace(/^(\.\/)+/, '');
  if (normalized.endsWith(TEMPLATE_EXTENSION)) {
    normalized = normalized.slice(0, -TEMPLATE_EXTENSION.length);
  }
  return normalized;
}

function suggest(name: string, available: string[]): string[] {
  const wanted = basename(name);
  const sameBase = available.filter((candidate) => basename(candidate) === wanted);
  const similar = available.filter(
    (candidate) => !sameBase.includes(candidate) && (candidate.includes(wanted) || wanted.includes(basename(candidate))),
  );
  return [...sameBase, ...similar].slice(0, 3);
}

/**
 * Loads, parses and renders Handlebars templates under one fixed root.
 *
 * Parsed templates, compiled templates and registered macros are cached for
 * the lifetime of the engine; the Handlebars environment is isolated from the
 * global one and created on first use.
 */
export class RenderingEngine implements TemplateSource {
  readonly templateRoot: string;
  private env: typeof Handlebars | null = null;
  private readonly loaded = new Map<string, LoadedTemplate>();
  private readonly compiled = new Map<string, Handlebars.TemplateDelegate>();
  private readonly macroOwners = new Map<string, string>();
  private readonly log = logger.child({ component: 'engine' });

  constructor(templateRoot: string) {
    const root = resolve(templateRoot);
    if (!existsSync(root)) {
      throw new ConfigError('file not found', `template root does not exist: ${root}`, {
        filePath: root,
        hints: ['Set template_root in .tierforge/config.yaml or TIERFORGE_TEMPLATE_ROOT'],
      });
    }
    if (!statSync(root).isDirectory()) {
      throw new ConfigError('invalid value', `template root is not a directory: ${root}`, { filePath: root });
    }
    this.templateRoot = root;
  }

  static initialize(templateRoot: string): RenderingEngine {
    return new RenderingEngine(templateRoot);
  }

  helperNames(): ReadonlySet<string> {
    return HELPER_NAMES;
  }

  /** Sorted snapshot of every template name under the root. */
  listTemplates(): string[] {
    const names: string[] = [];
    const walk = (dir: string): void => {
      for (const entry of readdirSync(dir, { withFileTypes: true })) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
          walk(full);
        } else if (entry.isFile() && entry.name.endsWith(TEMPLATE_EXTENSION)) {
          names.push(normalizeTemplateName(relative(this.templateRoot, full)));
        }
      }
    };
    walk(this.templateRoot);
    return names.sort();
  }

  load(name: string): LoadedTemplate {
    const key = normalizeTemplateName(name);
    const cached = this.loaded.get(key);
    if (cached) return cached;

    const path = this.resolvePath(key);
    const source = readFileSync(path, 'utf8');
    const template: LoadedTemplate = {
      name: key,
      path,
      source,
      header: parseTemplateHeader(key, source),
      ast: HandlebarsTemplateAst.parse(key, source, HELPER_NAMES),
    };
    this.loaded.set(key, template);
    this.log.debug('template loaded', { template: key });
    return template;
  }

  parse(name: string): ParsedTemplate {
    const template = this.load(name);
    return { name: template.name, ast: template.ast };
  }

  /** Declared header version, `0.0.0` for templates without a header. */
  templateVersion(name: string): string {
    return this.load(name).header?.version ?? '0.0.0';
  }

  render(name: string, bindings: Bindings): string {
    const key = normalizeTemplateName(name);
    try {
      const ancestry = this.ancestry(key);
      this.registerMacros(ancestry);
      const template = this.compile(key);
      const output = template(bindings, {
        data: { [STATE_KEY]: new InheritanceState(new Map(), [key], false) },
      });
      this.log.debug('template rendered', { template: key, chain: ancestry.length });
      return output;
    } catch (err) {
      if (err instanceof ScaffoldError && !(err instanceof ValueError)) throw err;
      throw new RenderError(key, errorMessage(err), { cause: err });
    }
  }

  private resolvePath(key: string): string {
    const path = resolve(this.templateRoot, key + TEMPLATE_EXTENSION);
    const escapes = isAbsolute(key) || !path.startsWith(this.templateRoot + sep);
    if (escapes || !existsSync(path) || !statSync(path).isFile()) {
      throw this.notFound(key);
    }
    return path;
  }

  private notFound(key: string): TemplateNotFoundError {
    const suggestions = suggest(key, this.listTemplates());
    return new TemplateNotFoundError(key, {
      hints:
        suggestions.length > 0
          ? [`Did you mean: ${suggestions.join(', ')}?`]
          : [`Templates are looked up under ${this.templateRoot}`],
    });
  }

  /** Static `extends` walk, leaf first. */
  private ancestry(key: string): string[] {
    const seen: string[] = [];
    let current: string | null = key;
    while (current !== null) {
      if (seen.includes(current)) {
        throw new InheritanceCycleError([...seen.slice(seen.indexOf(current)), current]);
      }
      seen.push(current);
      const parent = this.load(current).ast.findExtendsTarget();
      current = parent === null ? null : normalizeTemplateName(parent);
    }
    return seen;
  }

  private registerMacros(ancestry: string[]): void {
    const libraries = new Set<string>();
    for (const name of ancestry) {
      for (const lib of this.load(name).ast.findImports()) libraries.add(normalizeTemplateName(lib));
    }
    const env = this.environment();
    for (const lib of libraries) {
      for (const [macro, program] of this.load(lib).ast.inlinePrograms()) {
        const owner = this.macroOwners.get(macro);
        if (owner === lib) continue;
        if (owner !== undefined) {
          throw new ConfigError('validation failed', `macro "${macro}" is defined by both ${owner} and ${lib}`, {
            hints: ['Rename one of the macros; macro names are shared by every template'],
          });
        }
        env.registerPartial(macro, env.compile(program, COMPILE_OPTIONS));
        this.macroOwners.set(macro, lib);
      }
    }
  }

  private compile(key: string): Handlebars.TemplateDelegate {
    const cached = this.compiled.get(key);
    if (cached) return cached;
    const template = this.environment().compile(this.load(key).ast.program, COMPILE_OPTIONS);
    this.compiled.set(key, template);
    return template;
  }

  private environment(): typeof Handlebars {
    if (this.env) return this.env;
    const env = Handlebars.create();

    for (const [helper, fn] of Object.entries(CASE_FILTERS)) {
      env.registerHelper(helper, (value: unknown) => fn(value));
    }
    env.registerHelper('default', (value: unknown, fallback: unknown) => defaultValue(value, fallback));
    env.registerHelper('join', (list: unknown, separator: unknown) => joinList(list, separator));
    env.registerHelper('eq', (a: unknown, b: unknown) => a === b);
    env.registerHelper(IMPORT_HELPER, () => '');

    const compileParent = (name: string): Handlebars.TemplateDelegate => this.compile(name);

    env.registerHelper(EXTENDS_HELPER, function (this: unknown, parent: unknown, options: Handlebars.HelperOptions) {
      const state = stateOf(options.data) ?? new InheritanceState(new Map(), [], false);
      const parentName = normalizeTemplateName(String(parent));
      if (state.chain.includes(parentName)) {
        throw new InheritanceCycleError([...state.chain.slice(state.chain.indexOf(parentName)), parentName]);
      }
      // Overrides inherited from more-derived templates are registered first and win.
      const overrides = new Map(state.overrides);
      options.fn(this, { data: frameWith(options.data, new InheritanceState(overrides, state.chain, true)) });
      const render = compileParent(parentName);
      return render(this, {
        data: frameWith(options.data, new InheritanceState(overrides, [...state.chain, parentName], false)),
      });
    });

    env.registerHelper('override', function (this: unknown, name: unknown, options: Handlebars.HelperOptions) {
      const state = stateOf(options.data);
      if (!state || !state.collecting) {
        throw new RenderError(state?.current ?? 'template', `{{#override "${String(name)}"}} used outside {{#extends}}`);
      }
      const blockName = String(name);
      if (!state.overrides.has(blockName)) {
        const data: unknown = options.data;
        state.overrides.set(blockName, () => options.fn(this, { data }));
      }
      return '';
    });

    env.registerHelper('block', function (this: unknown, name: unknown, options: Handlebars.HelperOptions) {
      const override = stateOf(options.data)?.overrides.get(String(name));
      return override ? override() : options.fn(this);
    });

    this.env = env;
    return env;
  }
}
