import { isScaffoldError, errorMessage } from '../shared/errors.js';
import type { ConflictPolicy } from '../introspection/types.js';
import { createScaffolder, type Scaffolder } from '../scaffolding/factory.js';
import { resolveSettings } from '../workspace/settings.js';

/** Prints `Error: <message>` and any hints to stderr. */
export function printError(err: unknown): void {
  console.error(`Error: ${errorMessage(err)}`);
  if (isScaffoldError(err)) {
    for (const hint of err.hints) console.error(`  Hint: ${hint}`);
  }
}

/** Runs a command body, turning any thrown error into exit code 1. */
export function runCommand(fn: () => void | Promise<void>): Promise<void> {
  return Promise.resolve()
    .then(fn)
    .catch((err: unknown) => {
      printError(err);
      process.exit(1);
    });
}

/**
 * Wires engine, registries and pipeline for the current directory. Works
 * without `tierforge init`, falling back to the bundled templates and config.
 */
export function requireScaffolder(opts: { cwd?: string; policy?: ConflictPolicy } = {}): Scaffolder {
  return createScaffolder(resolveSettings(opts.cwd), { conflictPolicy: opts.policy });
}
