import {
  BUILD_RECORD_SCHEMA_VERSION,
  type BuildRecord,
  type DeploymentResult,
  type RiskAssessment,
  type StageResult,
} from './types.js';

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export interface BuildRecordInit {
  buildId: string;
  repository: string;
  branch: string | null;
  startedAt: string;
  /** Configured stage names, in order. Appends are checked against this list. */
  stageNames: readonly string[];
}

/**
 * Owns the mutable draft of one run's build record.
 * The record is only reachable as a frozen value once `finalize()` has been called.
 */
export class BuildRecordBuilder {
  private readonly draft: BuildRecord;
  private readonly stageNames: readonly string[];
  private finalized = false;

  constructor(init: BuildRecordInit) {
    this.stageNames = [...init.stageNames];
    this.draft = {
      schema_version: BUILD_RECORD_SCHEMA_VERSION,
      build_id: init.buildId,
      repository: init.repository,
      branch: init.branch,
      commit: null,
      started_at: init.startedAt,
      completed_at: null,
      success: true,
      canceled: false,
      error: null,
      stages: {},
      risk_assessment: null,
      ai_summary: null,
      ai_summary_source: null,
      deployment: null,
    };
  }

  get buildId(): string {
    return this.draft.build_id;
  }

  get success(): boolean {
    return this.draft.success;
  }

  get canceled(): boolean {
    return this.draft.canceled;
  }

  /** Stage results appended so far, in configuration order. */
  results(): StageResult[] {
    return Object.values(this.draft.stages);
  }

  /** A read-only view of the draft, for collaborators that want the whole record. */
  view(): Readonly<BuildRecord> {
    return deepFreeze(structuredClone(this.draft));
  }

  setSnapshot(branch: string, commit: string | null): void {
    this.assertOpen();
    this.draft.branch = branch;
    this.draft.commit = commit;
  }

  setError(error: { type: string; message: string }): void {
    this.assertOpen();
    this.draft.error = error;
    this.draft.success = false;
  }

  markCanceled(): void {
    this.assertOpen();
    this.draft.canceled = true;
    this.draft.success = false;
  }

  /**
   * Append the next stage result. Stages must arrive exactly once and in configuration order.
   */
  appendStage(result: StageResult): void {
    this.assertOpen();
    if (!this.stageNames.includes(result.name)) {
      throw new Error(`Stage ${result.name} is not part of this pipeline`);
    }
    if (Object.hasOwn(this.draft.stages, result.name)) {
      throw new Error(`Stage ${result.name} already recorded`);
    }
    const expected = this.stageNames[Object.keys(this.draft.stages).length];
    if (expected !== result.name) {
      throw new Error(`Stage ${result.name} recorded out of order (expected ${expected ?? 'none'})`);
    }
    this.draft.stages[result.name] = deepFreeze(result);
    if (result.required && result.status === 'failed') {
      this.draft.success = false;
    }
  }

  /** Names of configured stages that have not been recorded yet. */
  remainingStages(): string[] {
    return this.stageNames.filter((name) => !Object.hasOwn(this.draft.stages, name));
  }

  setRiskAssessment(risk: RiskAssessment): void {
    this.assertOpen();
    this.draft.risk_assessment = deepFreeze(risk);
  }

  setSummary(summary: string, source: 'judge' | 'template'): void {
    this.assertOpen();
    this.draft.ai_summary = summary;
    this.draft.ai_summary_source = source;
  }

  setDeployment(deployment: DeploymentResult): void {
    this.assertOpen();
    this.draft.deployment = deployment;
    if (deployment.status === 'failed') this.draft.success = false;
  }

  finalize(completedAt: string): BuildRecord {
    this.assertOpen();
    this.draft.completed_at = completedAt;
    this.finalized = true;
    return deepFreeze(this.draft);
  }

  private assertOpen(): void {
    if (this.finalized) throw new Error(`Build record ${this.draft.build_id} is already finalized`);
  }
}
