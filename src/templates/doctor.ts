import { errorMessage } from '../shared/errors.js';
import { resolveChain } from '../introspection/resolver.js';
import { ScaffoldMetadataConfig } from '../metadata/config.js';
import type { ArtifactRegistry } from '../scaffolding/artifacts.js';
import { normalizeTemplateName, type RenderingEngine } from './engine.js';

export type CheckStatus = 'pass' | 'fail' | 'warn';

export interface DoctorCheck {
  name: string;
  status: CheckStatus;
  message: string;
  fix?: string;
}

export interface DoctorReport {
  overall: CheckStatus;
  checks: DoctorCheck[];
  summary: string;
}

export interface DoctorOptions {
  engine: RenderingEngine;
  artifacts?: ArtifactRegistry;
  metadataConfigPath?: string;
}

type CheckResult = Omit<DoctorCheck, 'name'>;

function check(name: string, fn: () => CheckResult): DoctorCheck {
  try {
    return { name, ...fn() };
  } catch (err) {
    return { name, status: 'fail', message: errorMessage(err) };
  }
}

function sameMembers(a: string[], b: string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every((x) => right.has(x));
}

function templateChecks(engine: RenderingEngine, name: string): DoctorCheck[] {
  const checks: DoctorCheck[] = [];

  const parsed = check(`${name}: parses`, () => {
    const t = engine.load(name);
    return { status: 'pass', message: t.header ? `header version ${t.header.version}` : 'no header' };
  });
  checks.push(parsed);
  if (parsed.status === 'fail') return checks;

  const { header, ast } = engine.load(name);
  const actualParent = ast.findExtendsTarget();

  const declaredParent = header?.extends;
  if (declaredParent !== undefined) {
    checks.push(
      check(`${name}: header matches extends`, () => {
        const declared = declaredParent === null ? null : normalizeTemplateName(declaredParent);
        const actual = actualParent === null ? null : normalizeTemplateName(actualParent);
        return declared === actual
          ? { status: 'pass', message: actual === null ? 'root template' : `extends ${actual}` }
          : {
              status: 'warn',
              message: `header declares ${declared ?? 'no parent'} but template extends ${actual ?? 'nothing'}`,
              fix: 'Update the extends key in the template header',
            };
      }),
    );
  }

  if (actualParent !== null) {
    checks.push(
      check(`${name}: inheritance chain`, () => ({
        status: 'pass',
        message: resolveChain(engine, name).chain.join(' -> '),
      })),
    );
  }

  for (const lib of ast.findImports()) {
    checks.push(
      check(`${name}: import ${lib}`, () => {
        const macros = engine.load(lib).ast.findInlineDefinitions();
        return macros.length > 0
          ? { status: 'pass', message: `provides ${macros.join(', ')}` }
          : { status: 'fail', message: `${lib} defines no macros`, fix: 'Import a macro library instead' };
      }),
    );
  }

  const inlines = ast.findInlineDefinitions();
  const exported = header?.exports ?? [];
  if (inlines.length > 0 && exported.length > 0) {
    checks.push(
      check(`${name}: exports`, () =>
        sameMembers(exported, inlines)
          ? { status: 'pass', message: `exports ${inlines.join(', ')}` }
          : {
              status: 'warn',
              message: `header exports [${exported.join(', ')}] but defines [${inlines.join(', ')}]`,
              fix: 'Keep the exports list in the header in sync with the {{#*inline}} macros',
            },
      ),
    );
  }

  return checks;
}

function macroCollisionCheck(engine: RenderingEngine, names: string[]): DoctorCheck {
  return check('Macro names are unique', () => {
    const owners = new Map<string, string>();
    const clashes: string[] = [];
    for (const name of names) {
      let macros: string[];
      try {
        macros = engine.load(name).ast.findInlineDefinitions();
      } catch {
        continue; // reported by the template's own parse check
      }
      for (const macro of macros) {
        const owner = owners.get(macro);
        if (owner !== undefined) clashes.push(`${macro} (${owner}, ${name})`);
        else owners.set(macro, name);
      }
    }
    return clashes.length === 0
      ? { status: 'pass', message: `${owners.size} macros` }
      : { status: 'fail', message: `defined more than once: ${clashes.join('; ')}`, fix: 'Rename one of each pair' };
  });
}

/** Health report over every template under the engine's root. */
export function runTemplateDoctor(opts: DoctorOptions): DoctorReport {
  const { engine } = opts;
  const checks: DoctorCheck[] = [];

  const names = engine.listTemplates();
  checks.push({
    name: 'Template root',
    status: names.length > 0 ? 'pass' : 'warn',
    message: `${names.length} templates under ${engine.templateRoot}`,
    fix: names.length > 0 ? undefined : 'Point template_root at a directory of .hbs files',
  });

  for (const name of names) checks.push(...templateChecks(engine, name));
  checks.push(macroCollisionCheck(engine, names));

  if (opts.metadataConfigPath !== undefined) {
    const path = opts.metadataConfigPath;
    checks.push(
      check('Scaffold metadata config', () => {
        const result = ScaffoldMetadataConfig.tryLoad(path);
        return result.ok
          ? {
              status: 'pass',
              message: `${result.value.commentPatterns.length} comment patterns, ${result.value.metadataFields.length} fields`,
            }
          : { status: 'fail', message: result.error.message, fix: `Fix ${path}` };
      }),
    );
  }

  const artifacts = opts.artifacts;
  if (artifacts) {
    for (const def of artifacts.definitions()) {
      checks.push(
        check(`Artifact ${def.type_id}`, () => {
          engine.load(def.template);
          return { status: 'pass', message: `template ${normalizeTemplateName(def.template)}` };
        }),
      );
    }
  }

  const hasFailure = checks.some((c) => c.status === 'fail');
  const hasWarning = checks.some((c) => c.status === 'warn');
  const overall: CheckStatus = hasFailure ? 'fail' : hasWarning ? 'warn' : 'pass';

  const passCount = checks.filter((c) => c.status === 'pass').length;
  const summary =
    `${passCount}/${checks.length} checks passed` +
    (hasFailure ? ' – FAILURES detected' : '') +
    (hasWarning && !hasFailure ? ' – warnings present' : '');

  return { overall, checks, summary };
}
