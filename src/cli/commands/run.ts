import type { Command } from 'commander';
import { join } from 'node:path';
import { getStagegatePaths } from '../../workspace/paths.js';
import { openDb } from '../../workspace/db.js';
import { readPipelineFile, resolvePipelineConfig } from '../../workspace/config.js';
import { runPipeline } from '../../pipeline/orchestrator.js';
import { createJudge } from '../../judges/index.js';
import { GitCheckout } from '../../repository/git-checkout.js';
import { CommandDeployer } from '../../executors/command-deployer.js';
import { JsonFileSink } from '../../store/json-file-sink.js';
import { SqliteBuildStore } from '../../store/sqlite-store.js';
import { ConfigurationError, PersistenceError } from '../../shared/errors.js';
import { JudgeSpecSchema } from '../../shared/schemas.js';
import type { SpawnFn } from '../../executors/process.js';
import type { BuildRecord, BuildRecordSink, RepositoryProvider } from '../../pipeline/types.js';
import { EXIT_BLOCKED, EXIT_CONFIG, exitCodeFor, formatBuildReport } from '../cli-shared.js';

export interface RunCommandOptions {
  branch?: string;
  config?: string;
  output?: string;
  judge?: string;
  threshold?: string;
  history?: boolean;
}

/** Collaborators the command normally builds itself; tests swap them for fakes. */
export interface RunOverrides {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  repositories?: RepositoryProvider;
  spawn?: SpawnFn;
  clock?: () => Date;
  generateBuildId?: (now: Date) => string;
  signal?: AbortSignal;
  stdout?: NodeJS.WritableStream;
  report?: (line: string) => void;
}

export interface RunOutcome {
  record: BuildRecord | null;
  exitCode: number;
}

function parseThreshold(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`must be an integer between 0 and 5, got "${raw}"`, '--threshold');
  }
  return value;
}

export async function runBuild(
  repository: string,
  opts: RunCommandOptions,
  overrides: RunOverrides = {},
): Promise<RunOutcome> {
  const report = overrides.report ?? ((line: string) => console.error(line));
  const paths = getStagegatePaths(overrides.cwd);

  try {
    const file = readPipelineFile(opts.config ?? paths.pipeline);

    let judgeSpec = file.judge;
    if (opts.judge !== undefined) {
      const provider = JudgeSpecSchema.shape.provider.safeParse(opts.judge);
      if (!provider.success) {
        throw new ConfigurationError(`unknown judge provider "${opts.judge}"`, '--judge');
      }
      judgeSpec = { ...judgeSpec, provider: provider.data };
    }

    const config = resolvePipelineConfig(file, {
      riskThreshold: parseThreshold(opts.threshold),
      spawn: overrides.spawn,
    });
    const judge = createJudge(judgeSpec, overrides.env);

    const sinks: BuildRecordSink[] = [
      new JsonFileSink(opts.output ?? ((record) => join(paths.buildsDir, `${record.build_id}.json`)), overrides.stdout),
    ];
    if (opts.history !== false) sinks.push(new SqliteBuildStore(openDb(paths.stateDb)));

    const record = await runPipeline(
      repository,
      opts.branch,
      config,
      {
        repositories: overrides.repositories ?? new GitCheckout({ spawn: overrides.spawn }),
        judge,
        sinks,
        deployer: file.deploy ? new CommandDeployer(file.deploy, overrides.spawn) : undefined,
        clock: overrides.clock,
        generateBuildId: overrides.generateBuildId,
      },
      { signal: overrides.signal },
    );

    formatBuildReport(record).forEach((line) => report(line));
    return { record, exitCode: exitCodeFor(record) };
  } catch (err) {
    if (err instanceof ConfigurationError) {
      report(`Configuration error: ${err.message}`);
      return { record: null, exitCode: EXIT_CONFIG };
    }
    if (err instanceof PersistenceError) {
      formatBuildReport(err.record).forEach((line) => report(line));
      report(`Error: ${err.message}`);
      return { record: err.record, exitCode: EXIT_BLOCKED };
    }
    throw err;
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command('run <repository>')
    .description('Run the pipeline against a repository URL or local path')
    .option('-b, --branch <branch>', 'Branch to check out (default: the remote HEAD)')
    .option('-c, --config <path>', 'Pipeline file (default: .stagegate/pipeline.yaml)')
    .option('-o, --output <path>', 'Where to write the build record; "-" for stdout')
    .option('--judge <provider>', 'Override the judge: openai, heuristic or none')
    .option('--threshold <level>', 'Override the risk threshold (0-5)')
    .option('--no-history', 'Do not record the build in the workspace database')
    .action(async (repository: string, opts: RunCommandOptions) => {
      const controller = new AbortController();
      const onSigint = () => {
        console.error('Cancel requested; finishing the current stage...');
        controller.abort(new Error('canceled by user'));
      };
      process.once('SIGINT', onSigint);
      try {
        const { exitCode } = await runBuild(repository, opts, { signal: controller.signal });
        process.exitCode = exitCode;
      } finally {
        process.removeListener('SIGINT', onSigint);
      }
    });
}
