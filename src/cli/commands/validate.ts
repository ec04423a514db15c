import type { Command } from 'commander';
import { requireScaffolder, runCommand } from '../cli-shared.js';

export function registerValidateCommand(program: Command): void {
  program
    .command('validate <file>')
    .description('Check a generated file against the rules its templates declare')
    .option('--json', 'Print JSON', false)
    .action((file: string, opts: { json: boolean }) =>
      runCommand(() => {
        const { validator } = requireScaffolder();
        const result = validator.validateFile(file);

        if (opts.json) {
          console.log(JSON.stringify(result, null, 2));
        } else {
          const reset = '\x1b[0m';
          for (const issue of result.issues) {
            const color = issue.severity === 'error' ? '\x1b[31m' : '\x1b[33m';
            const icon = issue.severity === 'error' ? '✗' : '⚠';
            const where = issue.line === undefined ? '' : ` (line ${issue.line})`;
            console.log(`${color}${icon} [${issue.layer}] ${issue.rule}${reset}: ${issue.message}${where}`);
          }
          const color = !result.passed ? '\x1b[31m' : result.issues.length > 0 ? '\x1b[33m' : '\x1b[32m';
          console.log(
            `${color}${file}: ${result.passed ? 'PASS' : 'FAIL'} – score ${result.score}/10 (${result.artifactType}, ${result.templateName})${reset}`,
          );
        }

        if (!result.passed) process.exit(1);
      }),
    );
}
