import type { Command } from 'commander';
import { requireScaffolder, runCommand } from '../cli-shared.js';

export function registerTemplatesCommand(program: Command): void {
  program
    .command('templates')
    .description('List templates under the template root')
    .option('--json', 'Print JSON', false)
    .action((opts: { json: boolean }) =>
      runCommand(() => {
        const { engine } = requireScaffolder();
        const names = engine.listTemplates();
        if (opts.json) {
          console.log(JSON.stringify(names, null, 2));
          return;
        }
        console.log(`Templates under ${engine.templateRoot}:\n`);
        for (const name of names) {
          const header = engine.load(name).header;
          const tier = header?.tier ?? '-';
          console.log(`  ${name.padEnd(32)} ${tier.padEnd(9)} ${header?.description ?? ''}`);
        }
      }),
    );
}
