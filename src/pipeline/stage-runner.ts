import { describeError, JudgeUnavailableError, StageExecutionError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { JudgmentSchema, RawFindingsSchema } from '../shared/schemas.js';
import { deepFreeze } from './build-record.js';
import { withTimeout } from './timeout.js';
import {
  SEVERITIES,
  type AIJudge,
  type Judgment,
  type PipelineContext,
  type PipelineTimeouts,
  type RawFindings,
  type Severity,
  type StageConfig,
  type StageResult,
  type StageStatus,
  type StageType,
} from './types.js';

export interface StageRunOptions {
  timeouts: PipelineTimeouts;
  clock?: () => Date;
}

function emptyFindings(stageType: StageType, error?: { type: string; message: string }): RawFindings {
  return { stage_type: stageType, issue_count: 0, issues: [], metrics: {}, ...(error ? { error } : {}) };
}

/** Result for a stage that never ran. */
export function skippedStageResult(stage: StageConfig, reason: string): StageResult {
  const result: StageResult = {
    name: stage.name,
    type: stage.type,
    required: stage.required,
    status: 'skipped',
    findings: emptyFindings(stage.type),
    judgment: null,
    judge_error: null,
    skip_reason: reason,
    duration_ms: 0,
  };
  return deepFreeze(result);
}

function atOrAbove(severity: Severity, threshold: Severity): boolean {
  return SEVERITIES.indexOf(severity) <= SEVERITIES.indexOf(threshold);
}

function normalizeFindings(stage: StageConfig, raw: unknown): RawFindings {
  const parsed = RawFindingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join('.') || 'findings';
    throw new StageExecutionError(stage.name, `Executor returned malformed findings at ${where}: ${issue?.message ?? 'invalid'}`);
  }
  const { issue_count, ...rest } = parsed.data;
  // Truncated reports may count more issues than they list, never fewer.
  return { ...rest, stage_type: stage.type, issue_count: Math.max(issue_count ?? 0, rest.issues.length) };
}

function normalizeJudgment(raw: unknown): Judgment {
  const parsed = JudgmentSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new JudgeUnavailableError(`Judge returned a malformed judgment: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim());
  }
  return parsed.data;
}

/** The tool's own verdict, or the configured severity floor, fails the stage. */
function verdictFailed(stage: StageConfig, findings: RawFindings): boolean {
  if (findings.passed === false) return true;
  const floor = stage.fail_on_severity;
  return floor !== undefined && findings.issues.some((issue) => atOrAbove(issue.severity, floor));
}

/**
 * Run one stage: executor first, then the judge on its findings.
 * Never rejects. Every failure is folded into the returned StageResult.
 */
export async function runStage(
  stage: StageConfig,
  judge: AIJudge,
  context: PipelineContext,
  options: StageRunOptions,
): Promise<StageResult> {
  const clock = options.clock ?? (() => new Date());
  const started = clock().getTime();

  const finish = (
    status: StageStatus,
    findings: RawFindings,
    extra: { judgment?: Judgment | null; judge_error?: string | null; skip_reason?: string | null } = {},
  ): StageResult => {
    const result: StageResult = {
      name: stage.name,
      type: stage.type,
      required: stage.required,
      status,
      findings,
      judgment: extra.judgment ?? null,
      judge_error: extra.judge_error ?? null,
      skip_reason: extra.skip_reason ?? null,
      duration_ms: Math.max(0, clock().getTime() - started),
    };
    logger.info('Stage finished', { stage: stage.name, status, duration_ms: result.duration_ms });
    return deepFreeze(result);
  };

  if (!stage.enabled) {
    return finish('skipped', emptyFindings(stage.type), { skip_reason: 'disabled' });
  }

  logger.info('Stage started', { stage: stage.name, type: stage.type });

  let findings: RawFindings;
  try {
    const raw = await withTimeout(
      `Stage ${stage.name} executor`,
      stage.timeout_ms ?? options.timeouts.executor_ms,
      (signal) => stage.executor.execute(context.snapshotPath, context, signal),
    );
    findings = normalizeFindings(stage, raw);
  } catch (err) {
    const error = describeError(err);
    logger.warn('Stage executor failed', { stage: stage.name, error: error.message });
    return finish('failed', emptyFindings(stage.type, error));
  }

  if (findings.skip_reason !== undefined) {
    return finish('skipped', findings, { skip_reason: findings.skip_reason });
  }

  let judgment: Judgment | null = null;
  let judgeError: string | null = null;
  try {
    const raw = await withTimeout(`Judge for stage ${stage.name}`, options.timeouts.judge_ms, (signal) =>
      judge.assess(stage.type, findings, context, signal),
    );
    judgment = normalizeJudgment(raw);
  } catch (err) {
    judgeError = describeError(err).message;
    logger.warn('Judge unavailable, continuing without assessment', { stage: stage.name, error: judgeError });
  }

  let status: StageStatus;
  if (verdictFailed(stage, findings)) {
    status = 'failed';
  } else if (judgment === null || findings.issue_count > 0) {
    status = 'succeeded_with_findings';
  } else {
    status = 'succeeded';
  }

  return finish(status, findings, { judgment, judge_error: judgeError });
}
