import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { dump, load, YAMLException } from 'js-yaml';
import { ConfigurationError } from '../shared/errors.js';
import { PipelineFileSchema, type PipelineFile } from '../shared/schemas.js';
import { deepFreeze } from '../pipeline/build-record.js';
import { validatePipelineConfig } from '../pipeline/config.js';
import { CommandStageExecutor } from '../executors/command.js';
import type { SpawnFn } from '../executors/process.js';
import { DEFAULT_RISK_THRESHOLD, type PipelineConfig, type StageConfig } from '../pipeline/types.js';

export function parsePipelineFile(raw: string, source = 'pipeline.yaml'): PipelineFile {
  let parsed: unknown;
  try {
    parsed = load(raw);
  } catch (err) {
    const reason = err instanceof YAMLException ? err.reason : String(err);
    throw new ConfigurationError(`invalid YAML: ${reason}`, source);
  }

  const result = PipelineFileSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? `${source}:${issue.path.join('.')}` : source;
    throw new ConfigurationError(issue?.message ?? 'invalid pipeline configuration', path);
  }
  return result.data;
}

export function readPipelineFile(configPath: string): PipelineFile {
  if (!existsSync(configPath)) {
    throw new ConfigurationError('pipeline configuration not found. Run `stagegate init` first.', configPath);
  }
  return parsePipelineFile(readFileSync(configPath, 'utf8'), configPath);
}

export function writePipelineFile(configPath: string, file: PipelineFile): void {
  writeFileSync(configPath, dump(file, { lineWidth: 120 }), 'utf8');
}

export interface ResolveOptions {
  /** Overrides the file's `risk_threshold`. */
  riskThreshold?: number;
  spawn?: SpawnFn;
}

/**
 * Turn a parsed pipeline file into the immutable configuration the orchestrator runs,
 * with a command executor bound to each stage.
 */
export function resolvePipelineConfig(file: PipelineFile, opts: ResolveOptions = {}): PipelineConfig {
  const stages: StageConfig[] = file.stages.map((spec) => ({
    name: spec.name,
    type: spec.type,
    required: spec.required,
    enabled: spec.enabled,
    executor: new CommandStageExecutor({ stage: spec.name, stageType: spec.type, spec: spec.executor, spawn: opts.spawn }),
    ...(spec.timeout_ms !== undefined ? { timeout_ms: spec.timeout_ms } : {}),
    ...(spec.parallel_group !== undefined ? { parallel_group: spec.parallel_group } : {}),
    ...(spec.fail_on_severity !== undefined ? { fail_on_severity: spec.fail_on_severity } : {}),
    ...(spec.weight !== undefined ? { weight: spec.weight } : {}),
  }));

  const config: PipelineConfig = {
    risk_threshold: opts.riskThreshold ?? file.risk_threshold,
    aggregation: file.aggregation,
    timeouts: { ...file.timeouts },
    stages,
  };
  validatePipelineConfig(config);
  return deepFreeze(config);
}

export const DEFAULT_PIPELINE: PipelineFile = {
  version: '1',
  risk_threshold: DEFAULT_RISK_THRESHOLD,
  aggregation: 'max',
  timeouts: { checkout_ms: 300_000, executor_ms: 600_000, judge_ms: 60_000, summary_ms: 60_000 },
  judge: { provider: 'heuristic' },
  stages: [
    {
      name: 'code_analysis',
      type: 'code_analysis',
      required: false,
      enabled: true,
      parallel_group: 'static',
      executor: { command: 'npx', args: ['eslint', '.', '--format', 'json'], parser: 'eslint', requires_paths: ['package.json'] },
    },
    {
      name: 'security_scan',
      type: 'security_scan',
      required: true,
      enabled: true,
      parallel_group: 'static',
      fail_on_severity: 'critical',
      executor: { command: 'npm', args: ['audit', '--json'], parser: 'npm_audit', requires_paths: ['package-lock.json'] },
    },
    {
      name: 'testing',
      type: 'testing',
      required: true,
      enabled: true,
      executor: {
        command: 'npx',
        args: ['jest', '--json', '--coverage'],
        parser: 'jest',
        requires_paths: ['package.json'],
        coverage_target: 80,
      },
    },
    {
      name: 'infrastructure_validation',
      type: 'infrastructure_validation',
      required: false,
      enabled: true,
      executor: { command: 'terraform', args: ['validate', '-json'], parser: 'terraform', requires_paths: ['main.tf', 'terraform'] },
    },
  ],
};
