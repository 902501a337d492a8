import type { BuildRecord } from '../pipeline/types.js';

export type ErrorCode =
  | 'configuration'
  | 'checkout'
  | 'stage_execution'
  | 'judge_unavailable'
  | 'timeout'
  | 'persistence';

export abstract class StagegateError extends Error {
  abstract readonly code: ErrorCode;
}

/** Invalid stage list, threshold or timeout. Raised before a run starts. */
export class ConfigurationError extends StagegateError {
  readonly code = 'configuration';
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ConfigurationError';
    this.path = path;
  }
}

/** The repository snapshot could not be prepared. */
export class FatalSetupError extends StagegateError {
  readonly code = 'checkout';
  readonly repository: string;

  constructor(repository: string, message: string) {
    super(`Checkout of ${repository} failed: ${message}`);
    this.name = 'FatalSetupError';
    this.repository = repository;
  }
}

export class StageExecutionError extends StagegateError {
  readonly code = 'stage_execution';
  readonly stage: string;
  readonly exitCode: number | null;

  constructor(stage: string, message: string, exitCode: number | null = null) {
    super(message);
    this.name = 'StageExecutionError';
    this.stage = stage;
    this.exitCode = exitCode;
  }
}

export class JudgeUnavailableError extends StagegateError {
  readonly code = 'judge_unavailable';

  constructor(message: string) {
    super(message);
    this.name = 'JudgeUnavailableError';
  }
}

export class TimeoutError extends StagegateError {
  readonly code = 'timeout';
  readonly label: string;
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

/** A sink rejected the finished record. The record itself is complete. */
export class PersistenceError extends StagegateError {
  readonly code = 'persistence';
  readonly record: BuildRecord;

  constructor(message: string, record: BuildRecord) {
    super(message);
    this.name = 'PersistenceError';
    this.record = record;
  }
}

export interface ErrorDescription {
  type: string;
  message: string;
}

/**
 * Normalize anything thrown into the `{type, message}` shape stored in build records.
 */
export function describeError(err: unknown): ErrorDescription {
  if (err instanceof StagegateError) return { type: err.code, message: err.message };
  if (err instanceof Error) return { type: err.name || 'Error', message: err.message };
  return { type: 'unknown', message: String(err) };
}
