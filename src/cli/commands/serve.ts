import type { Command } from 'commander';
import { startServer } from '../../api/server.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the read-only build history API')
    .option('--host <host>', 'Bind host', '127.0.0.1')
    .option('--port <port>', 'Port', '7800')
    .action(async (opts: { host: string; port: string }) => {
      const port = parseInt(opts.port, 10);
      console.error(`Serving build history on http://${opts.host}:${port}/v1 (Ctrl+C to stop)`);
      await startServer({ host: opts.host, port });
    });
}
