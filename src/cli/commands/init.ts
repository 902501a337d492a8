import type { Command } from 'commander';
import { initWorkspace } from '../../workspace/init.js';
import { describeError } from '../../shared/errors.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create a .stagegate workspace with a starter pipeline in the current directory')
    .option('--force', 'Overwrite an existing pipeline.yaml', false)
    .action((opts: { force: boolean }) => {
      try {
        const paths = initWorkspace({ force: opts.force });
        console.log(`Workspace initialized at ${paths.root}`);
        console.log(`  Pipeline: ${paths.pipeline}`);
        console.log(`  History:  ${paths.stateDb}`);
        console.log(`\nNext steps:`);
        console.log(`  edit .stagegate/pipeline.yaml to match your tools`);
        console.log(`  stagegate run <repository>`);
      } catch (err) {
        console.error(`Init failed: ${describeError(err).message}`);
        process.exitCode = 1;
      }
    });
}
