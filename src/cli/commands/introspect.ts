import type { Command } from 'commander';
import { parseConflictPolicy } from '../../introspection/classifier.js';
import { requireScaffolder, runCommand } from '../cli-shared.js';

export function registerIntrospectCommand(program: Command): void {
  program
    .command('introspect <template>')
    .description('Show the inheritance chain and the required/optional inputs of a template')
    .option('--policy <policy>', 'Ancestor conflict policy: permissive or strict', 'permissive')
    .option('--json', 'Print JSON', false)
    .action((template: string, opts: { policy: string; json: boolean }) =>
      runCommand(() => {
        const policy = parseConflictPolicy(opts.policy);
        const { introspector } = requireScaffolder({ policy });
        const schema = introspector.introspect(template, policy);
        if (opts.json) {
          console.log(JSON.stringify(schema, null, 2));
          return;
        }
        console.log(`Chain:    ${schema.inheritanceChain.join(' -> ')}`);
        console.log(`Required: ${schema.required.join(', ') || '(none)'}`);
        console.log(`Optional: ${schema.optional.join(', ') || '(none)'}`);
      }),
    );
}
