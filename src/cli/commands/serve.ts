import type { Command } from 'commander';
import { startServer } from '../../api/server.js';
import { runCommand } from '../cli-shared.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the tierforge HTTP API')
    .option('--host <host>', 'Bind host (default: TIERFORGE_API_HOST or 127.0.0.1)')
    .option('--port <port>', 'Port (default: TIERFORGE_API_PORT or 7810)')
    .action((opts: { host?: string; port?: string }) =>
      runCommand(async () => {
        const host = opts.host ?? process.env['TIERFORGE_API_HOST'] ?? '127.0.0.1';
        const port = parseInt(opts.port ?? process.env['TIERFORGE_API_PORT'] ?? '7810', 10);

        console.log(`Starting tierforge API...`);
        console.log(`  API: http://${host}:${port}/v1`);
        console.log('\nPress Ctrl+C to stop\n');

        await startServer({ host, port });
      }),
    );
}
