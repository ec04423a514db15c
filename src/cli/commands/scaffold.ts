import { readFileSync } from 'node:fs';
import type { Command } from 'commander';
import { ValidationError } from '../../shared/errors.js';
import { requireScaffolder, runCommand } from '../cli-shared.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** `key=value` pairs; values that parse as JSON (numbers, lists, booleans) are kept typed. */
export function parseAssignments(pairs: string[]): Record<string, unknown> {
  const context: Record<string, unknown> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new ValidationError(`Invalid --set value: ${pair}`, [], ['Use --set key=value']);
    }
    const raw = pair.slice(eq + 1);
    let value: unknown = raw;
    try {
      value = JSON.parse(raw);
    } catch {
      value = raw; // plain string
    }
    context[pair.slice(0, eq)] = value;
  }
  return context;
}

function readInput(path: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ValidationError(`--input must hold a JSON object: ${path}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function registerScaffoldCommand(program: Command): void {
  program
    .command('scaffold <artifact-type>')
    .description('Render an artifact from its template and stamp it with a provenance header')
    .option('--set <key=value>', 'Context value (repeatable)', collect, [])
    .option('--input <file>', 'JSON file with context values')
    .option('--out <path>', 'Output path relative to the output root')
    .option('--dry-run', 'Print the artifact instead of writing it', false)
    .option('--overwrite', 'Replace an existing output file', false)
    .action(
      (
        artifactType: string,
        opts: { set: string[]; input?: string; out?: string; dryRun: boolean; overwrite: boolean },
      ) =>
        runCommand(() => {
          const { pipeline } = requireScaffolder();
          const context = {
            ...(opts.input ? readInput(opts.input) : {}),
            ...parseAssignments(opts.set),
          };
          const result = pipeline.scaffold({
            artifactType,
            context,
            outputPath: opts.out,
            write: !opts.dryRun,
            overwrite: opts.overwrite,
          });
          if (result.written) {
            console.log(`Wrote ${result.outputPath} (template ${result.templateName}, version ${result.versionHash})`);
          } else {
            process.stdout.write(result.content);
          }
        }),
    );
}
