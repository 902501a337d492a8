import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { StageExecutionError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ExecutorSpec } from '../shared/schemas.js';
import type { PipelineContext, RawFindings, StageExecutor, StageType } from '../pipeline/types.js';
import { PARSERS } from './parsers.js';
import { runProcess, tail, type SpawnFn } from './process.js';

export interface CommandStageExecutorOptions {
  stage: string;
  stageType: StageType;
  spec: ExecutorSpec;
  spawn?: SpawnFn;
}

/**
 * Runs an analysis tool as a child process inside the repository snapshot and
 * turns its output into findings with the configured parser.
 */
export class CommandStageExecutor implements StageExecutor {
  constructor(private readonly opts: CommandStageExecutorOptions) {}

  async execute(snapshotPath: string, context: PipelineContext, signal: AbortSignal): Promise<RawFindings> {
    const { spec, stage, stageType } = this.opts;

    const required = spec.requires_paths;
    if (required && required.length > 0 && !required.some((p) => existsSync(join(snapshotPath, p)))) {
      logger.info('Stage has nothing to check', { stage, requires_paths: required });
      return {
        stage_type: stageType,
        issue_count: 0,
        issues: [],
        metrics: {},
        skip_reason: `none of ${required.join(', ')} present`,
      };
    }

    logger.debug('Running stage command', { stage, command: spec.command, args: spec.args, branch: context.branch });
    const result = await runProcess(spec.command, spec.args, {
      cwd: snapshotPath,
      env: spec.env,
      signal,
      spawn: this.opts.spawn,
    });

    const parser = PARSERS[spec.parser];
    if (!parser.acceptsExit(result.code)) {
      const detail = tail(result.stderr) || tail(result.stdout) || 'no output';
      throw new StageExecutionError(stage, `${spec.command} exited with code ${result.code}: ${detail}`, result.code);
    }

    return parser.parse(result, {
      stage,
      stageType,
      ...(spec.coverage_target !== undefined ? { coverageTarget: spec.coverage_target } : {}),
    });
  }
}
