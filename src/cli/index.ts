#!/usr/bin/env node
import { Command } from 'commander';
import { loadWorkspaceEnv } from '../workspace/env.js';
import { describeError } from '../shared/errors.js';
import { registerInitCommand } from './commands/init.js';
import { registerRunCommand } from './commands/run.js';
import { registerBuildsCommand } from './commands/builds.js';
import { registerServeCommand } from './commands/serve.js';

loadWorkspaceEnv();

const program = new Command();

program
  .name('stagegate')
  .description('Risk-gated build pipeline with AI review of every stage')
  .version('0.1.0');

registerInitCommand(program);
registerRunCommand(program);
registerBuildsCommand(program);
registerServeCommand(program);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error('Error:', describeError(err).message);
  process.exit(1);
});
