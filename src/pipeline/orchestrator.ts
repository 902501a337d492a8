import { generateBuildId } from '../shared/ids.js';
import { ConfigurationError, describeError, FatalSetupError, PersistenceError, TimeoutError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { BuildRecordBuilder } from './build-record.js';
import { planBatches, stageWeights, validatePipelineConfig } from './config.js';
import { computeRiskAssessment } from './risk.js';
import { runStage, skippedStageResult } from './stage-runner.js';
import { templateSummary } from './summary.js';
import { withTimeout } from './timeout.js';
import type {
  AIJudge,
  BuildRecord,
  BuildRecordSink,
  Deployer,
  DeploymentResult,
  PipelineConfig,
  PipelineContext,
  RepositoryProvider,
  RepositorySnapshot,
  RiskAssessment,
} from './types.js';

export interface OrchestratorDeps {
  repositories: RepositoryProvider;
  judge: AIJudge;
  /** Receive the finished record, in order. */
  sinks?: readonly BuildRecordSink[];
  /** Invoked only when the gate proceeds and every required stage passed. */
  deployer?: Deployer;
  clock?: () => Date;
  generateBuildId?: (now: Date) => string;
}

export interface RunOptions {
  /** Checked between stages; the stage in flight always finishes and is recorded. */
  signal?: AbortSignal;
}

async function persist(record: BuildRecord, sinks: readonly BuildRecordSink[]): Promise<BuildRecord> {
  for (const sink of sinks) {
    try {
      await sink.persist(record);
    } catch (err) {
      const message = `Failed to persist build ${record.build_id}: ${describeError(err).message}`;
      logger.error(message);
      throw new PersistenceError(message, record);
    }
  }
  return record;
}

async function releaseSnapshot(snapshot: RepositorySnapshot): Promise<void> {
  try {
    await snapshot.cleanup();
  } catch (err) {
    logger.warn('Snapshot cleanup failed', { path: snapshot.path, error: describeError(err).message });
  }
}

/** A checkout that outlives its timeout still owns a snapshot; remove it once it lands. */
function releaseLateSnapshot(buildId: string, pending: Promise<RepositorySnapshot>): void {
  void pending.then(
    (late) => {
      logger.warn('Checkout finished after its timeout, removing snapshot', { build_id: buildId, path: late.path });
      return releaseSnapshot(late);
    },
    (err: unknown) => logger.debug('Checkout failed after its timeout', { build_id: buildId, error: describeError(err).message }),
  );
}

async function deployIfAllowed(
  builder: BuildRecordBuilder,
  risk: RiskAssessment,
  snapshot: RepositorySnapshot,
  deployer: Deployer,
  timeoutMs: number,
): Promise<DeploymentResult> {
  if (!builder.success) {
    return { status: 'halted', environment: null, reason: 'a required stage failed', output: null };
  }
  if (risk.gate === 'block') {
    logger.warn('Deployment halted by risk gate', { level: risk.level, threshold: risk.threshold });
    return {
      status: 'halted',
      environment: null,
      reason: `risk level ${risk.level} exceeds threshold ${risk.threshold}`,
      output: null,
    };
  }

  const view = builder.view();
  try {
    logger.info('Deployment approved, executing', { build_id: builder.buildId });
    return await withTimeout('Deployment', timeoutMs, (signal) => deployer.deploy(snapshot.path, view, signal));
  } catch (err) {
    const error = describeError(err);
    logger.error('Deployment failed', { build_id: builder.buildId, error: error.message });
    return { status: 'failed', environment: null, reason: error.message, output: null };
  }
}

async function summarize(
  builder: BuildRecordBuilder,
  judge: AIJudge,
  risk: RiskAssessment,
  timeoutMs: number,
): Promise<void> {
  const results = builder.results();
  const fallback = () =>
    templateSummary({ results, risk, success: builder.success, canceled: builder.canceled });

  if (builder.canceled) {
    builder.setSummary(fallback(), 'template');
    return;
  }

  try {
    const summary = await withTimeout('Executive summary', timeoutMs, (signal) =>
      judge.summarize(Object.freeze([...results]), risk, signal),
    );
    if (typeof summary === 'string' && summary.trim().length > 0) {
      builder.setSummary(summary.trim(), 'judge');
      return;
    }
    logger.warn('Judge returned an empty summary, using template');
  } catch (err) {
    logger.warn('Summary unavailable, using template', { error: describeError(err).message });
  }
  builder.setSummary(fallback(), 'template');
}

/**
 * Run every configured stage against one snapshot of `repositoryRef` and return the finished build record.
 *
 * Throws ConfigurationError before doing any work when the configuration is invalid, and
 * PersistenceError when a sink rejects the finished record. Every other failure is
 * recorded inside the returned record.
 */
export async function runPipeline(
  repositoryRef: string,
  branch: string | undefined,
  config: PipelineConfig,
  deps: OrchestratorDeps,
  options: RunOptions = {},
): Promise<BuildRecord> {
  validatePipelineConfig(config);
  if (!repositoryRef.trim()) {
    throw new ConfigurationError('repository reference is required', 'repository');
  }

  const clock = deps.clock ?? (() => new Date());
  const sinks = deps.sinks ?? [];
  const startedAt = clock();
  const builder = new BuildRecordBuilder({
    buildId: (deps.generateBuildId ?? generateBuildId)(startedAt),
    repository: repositoryRef,
    branch: branch ?? null,
    startedAt: startedAt.toISOString(),
    stageNames: config.stages.map((s) => s.name),
  });

  logger.info('Pipeline started', {
    build_id: builder.buildId,
    repository: repositoryRef,
    branch: branch ?? '(default)',
    stages: config.stages.length,
  });

  let snapshot: RepositorySnapshot;
  const preparing: Promise<RepositorySnapshot>[] = [];
  try {
    snapshot = await withTimeout('Repository checkout', config.timeouts.checkout_ms, (signal) => {
      const pending = deps.repositories.prepare(repositoryRef, branch, signal);
      preparing.push(pending);
      return pending;
    });
  } catch (err) {
    if (err instanceof TimeoutError) {
      for (const pending of preparing) releaseLateSnapshot(builder.buildId, pending);
    }
    const fatal = err instanceof FatalSetupError ? err : new FatalSetupError(repositoryRef, describeError(err).message);
    logger.error('Checkout failed, aborting run', { build_id: builder.buildId, error: fatal.message });
    const error = { type: fatal.code, message: fatal.message };
    builder.setError(error);
    builder.setSummary(templateSummary({ results: [], risk: null, success: false, canceled: false, error }), 'template');
    return persist(builder.finalize(clock().toISOString()), sinks);
  }

  try {
    builder.setSnapshot(snapshot.branch, snapshot.commit);

    for (const batch of planBatches(config.stages)) {
      if (options.signal?.aborted) {
        logger.warn('Run canceled, skipping remaining stages', {
          build_id: builder.buildId,
          remaining: builder.remainingStages(),
        });
        builder.markCanceled();
        break;
      }

      const context: PipelineContext = Object.freeze({
        repository: repositoryRef,
        branch: snapshot.branch,
        commit: snapshot.commit,
        snapshotPath: snapshot.path,
        changedFiles: Object.freeze([...(snapshot.changedFiles ?? [])]),
        priorResults: Object.freeze(builder.results()),
      });

      // Results are appended after the whole batch settles, so record order follows configuration order.
      const results = await Promise.all(
        batch.map((stage) => runStage(stage, deps.judge, context, { timeouts: config.timeouts, clock })),
      );
      for (const result of results) {
        builder.appendStage(result);
        if (result.required && result.status === 'failed') {
          logger.warn('Required stage failed', { build_id: builder.buildId, stage: result.name });
        }
      }
    }

    if (builder.canceled) {
      for (const stage of config.stages) {
        if (builder.remainingStages().includes(stage.name)) {
          builder.appendStage(skippedStageResult(stage, 'canceled'));
        }
      }
    }

    const risk = computeRiskAssessment(builder.results(), {
      threshold: config.risk_threshold,
      policy: config.aggregation,
      weights: stageWeights(config),
      stages: config.stages.map((s) => s.name),
    });
    builder.setRiskAssessment(risk);
    logger.info('Risk assessed', {
      build_id: builder.buildId,
      level: risk.level,
      threshold: risk.threshold,
      gate: risk.gate,
      incomplete: risk.incomplete,
    });

    if (deps.deployer && !builder.canceled) {
      builder.setDeployment(
        await deployIfAllowed(builder, risk, snapshot, deps.deployer, config.timeouts.executor_ms),
      );
    }

    await summarize(builder, deps.judge, risk, config.timeouts.summary_ms);
  } finally {
    await releaseSnapshot(snapshot);
  }

  const record = builder.finalize(clock().toISOString());
  logger.info('Pipeline completed', {
    build_id: record.build_id,
    success: record.success,
    gate: record.risk_assessment?.gate ?? null,
  });
  return persist(record, sinks);
}
