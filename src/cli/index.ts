#!/usr/bin/env node
import { Command } from 'commander';
import { registerInitCommand } from './commands/init.js';
import { registerTemplatesCommand } from './commands/templates.js';
import { registerIntrospectCommand } from './commands/introspect.js';
import { registerScaffoldCommand } from './commands/scaffold.js';
import { registerInspectCommand } from './commands/inspect.js';
import { registerValidateCommand } from './commands/validate.js';
import { registerDoctorCommand } from './commands/doctor.js';
import { registerServeCommand } from './commands/serve.js';
import { printError } from './cli-shared.js';

const program = new Command();

program
  .name('tierforge')
  .description('tierforge – tiered template scaffolding with provenance headers')
  .version('0.1.0');

registerInitCommand(program);
registerTemplatesCommand(program);
registerIntrospectCommand(program);
registerScaffoldCommand(program);
registerInspectCommand(program);
registerValidateCommand(program);
registerDoctorCommand(program);
registerServeCommand(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  printError(err);
  process.exit(1);
});
