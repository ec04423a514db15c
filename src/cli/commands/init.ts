import type { Command } from 'commander';
import { initWorkspace } from '../../workspace/init.js';
import { getWorkspacePaths } from '../../workspace/paths.js';
import { runCommand } from '../cli-shared.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize a tierforge workspace in the current directory')
    .option('--templates <dir>', 'Template root (default: bundled templates)')
    .option('--output <dir>', 'Output root for generated files', '.')
    .option('--force', 'Reinitialize even if workspace already exists', false)
    .action((opts: { templates?: string; output: string; force: boolean }) =>
      runCommand(() => {
        const config = initWorkspace({
          force: opts.force,
          templateRoot: opts.templates,
          outputRoot: opts.output,
        });
        const paths = getWorkspacePaths();
        console.log(`\nWorkspace initialized!`);
        console.log(`  Workspace ID:  ${config.workspace_id}`);
        console.log(`  Templates:     ${config.template_root}`);
        console.log(`  Output root:   ${config.output_root}`);
        console.log(`  Metadata spec: ${paths.metadataConfig}`);
        console.log(`  Artifacts:     ${paths.artifacts}`);
        console.log(`\nNext steps:`);
        console.log(`  tierforge templates          – list available templates`);
        console.log(`  tierforge introspect <name>  – show a template's inputs`);
        console.log(`  tierforge scaffold <type>    – generate an artifact`);
        console.log(`  tierforge doctor             – check template health`);
      }),
    );
}
