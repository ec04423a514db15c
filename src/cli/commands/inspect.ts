import type { Command } from 'commander';
import { requireScaffolder, runCommand } from '../cli-shared.js';

export function registerInspectCommand(program: Command): void {
  program
    .command('inspect <file>')
    .description('Parse and validate the provenance header of a generated file')
    .option('--json', 'Print JSON', false)
    .action((file: string, opts: { json: boolean }) =>
      runCommand(() => {
        const { parser, templateRegistry } = requireScaffolder();
        const metadata = parser.parseFile(file);
        if (metadata === null) {
          console.log(`${file}: no provenance header`);
          return;
        }
        const version = metadata['version'];
        const entry = version ? templateRegistry.lookupHash(version) : null;
        if (opts.json) {
          console.log(JSON.stringify({ metadata, registry: entry }, null, 2));
          return;
        }
        for (const [key, value] of Object.entries(metadata)) {
          console.log(`  ${key.padEnd(9)} ${value}`);
        }
        if (entry) {
          console.log(`  tiers     ${entry.tiers.map((t) => `${t.template}@${t.version}`).join(' -> ')}`);
        }
      }),
    );
}
