import type { Command } from 'commander';
import { openWorkspace, formatBuildReport } from '../cli-shared.js';

export function registerBuildsCommand(program: Command): void {
  const builds = program.command('builds').description('Inspect recorded builds');

  builds
    .command('list', { isDefault: true })
    .description('List recent builds, newest first')
    .option('-n, --limit <n>', 'Number of builds to show', '20')
    .option('--repository <ref>', 'Only builds of this repository')
    .action((opts: { limit: string; repository?: string }) => {
      const { store } = openWorkspace();
      const limit = parseInt(opts.limit, 10);
      const rows = store.list({ limit: Number.isNaN(limit) ? 20 : limit, repository: opts.repository });

      if (rows.length === 0) {
        console.log('No builds recorded.');
        return;
      }
      for (const row of rows) {
        const outcome = row.canceled ? 'CANCELED' : row.success ? 'PASSED' : 'FAILED';
        const gate = row.gate ? `${row.gate} (risk ${row.risk_level ?? '-'})` : 'not assessed';
        console.log(`  ${row.build_id}  ${outcome.padEnd(8)} ${gate.padEnd(20)} ${row.repository}${row.branch ? `@${row.branch}` : ''}`);
      }
    });

  builds
    .command('show <id>')
    .description('Print one build record')
    .option('--json', 'Print the raw record as JSON', false)
    .action((id: string, opts: { json: boolean }) => {
      const { store } = openWorkspace();
      const record = store.get(id);
      if (!record) {
        console.error(`Build not found: ${id}`);
        process.exitCode = 1;
        return;
      }
      if (opts.json) {
        console.log(JSON.stringify(record, null, 2));
        return;
      }
      formatBuildReport(record).forEach((line) => console.log(line));
    });
}
