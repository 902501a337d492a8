export const BUILD_RECORD_SCHEMA_VERSION = '1.0';

export const STAGE_TYPES = [
  'code_analysis',
  'security_scan',
  'testing',
  'infrastructure_validation',
  'custom',
] as const;
export type StageType = (typeof STAGE_TYPES)[number];

export const SEVERITIES = ['critical', 'high', 'medium', 'low', 'info'] as const;
export type Severity = (typeof SEVERITIES)[number];

export type StageStatus = 'succeeded' | 'succeeded_with_findings' | 'failed' | 'skipped';
export type GateDecision = 'proceed' | 'block';
export type AggregationPolicy = 'max' | 'sum' | 'weighted_average';

export interface Finding {
  severity: Severity;
  message: string;
  rule?: string;
  location?: string;
}

export type MetricValue = number | string | boolean;

export interface RawFindings {
  stage_type: StageType;
  issue_count: number;
  issues: Finding[];
  metrics: Record<string, MetricValue>;
  /** The tool's own pass/fail verdict, where it has one (tests, IaC validation). */
  passed?: boolean;
  /** Set when the executor decided there was nothing to run. */
  skip_reason?: string;
  /** Set when the executor itself failed. */
  error?: { type: string; message: string };
}

export interface SeverityCounts {
  critical: number;
  high: number;
  medium: number;
  low: number;
}

export interface Judgment {
  risk_level: number;
  suggestions: string[];
  narrative: string;
  severity_counts?: SeverityCounts;
  flagged_severity?: Severity;
  model?: string;
}

export interface StageResult {
  name: string;
  type: StageType;
  required: boolean;
  status: StageStatus;
  findings: RawFindings;
  judgment: Judgment | null;
  judge_error: string | null;
  skip_reason: string | null;
  duration_ms: number;
}

export interface RiskFactor {
  stage: string;
  sub_score: number;
  rationale: string;
  assessed: boolean;
}

export interface RiskAssessment {
  level: number;
  threshold: number;
  policy: AggregationPolicy;
  factors: RiskFactor[];
  gate: GateDecision;
  /** True when a stage that ran has no judgment, so the level may understate risk. */
  incomplete: boolean;
}

export type DeploymentStatus = 'deployed' | 'halted' | 'failed';

export interface DeploymentResult {
  status: DeploymentStatus;
  environment: string | null;
  reason: string | null;
  output: Record<string, unknown> | null;
}

export interface BuildRecord {
  schema_version: string;
  build_id: string;
  repository: string;
  branch: string | null;
  commit: string | null;
  started_at: string;
  completed_at: string | null;
  success: boolean;
  canceled: boolean;
  error: { type: string; message: string } | null;
  stages: Record<string, StageResult>;
  risk_assessment: RiskAssessment | null;
  ai_summary: string | null;
  ai_summary_source: 'judge' | 'template' | null;
  deployment: DeploymentResult | null;
}

// ── Collaborator contracts ────────────────────────────────────────────────

export interface RepositorySnapshot {
  /** Read-only checkout shared by every stage of one run. */
  path: string;
  branch: string;
  commit: string | null;
  /** Paths touched by the checked-out commit, when the provider can tell. */
  changedFiles?: readonly string[];
  cleanup(): Promise<void>;
}

export interface RepositoryProvider {
  prepare(repositoryRef: string, branch: string | undefined, signal: AbortSignal): Promise<RepositorySnapshot>;
}

export interface PipelineContext {
  repository: string;
  branch: string;
  commit: string | null;
  snapshotPath: string;
  changedFiles: readonly string[];
  /** Results of the stages that completed before this one, in configuration order. */
  priorResults: readonly StageResult[];
}

export interface StageExecutor {
  execute(snapshotPath: string, context: PipelineContext, signal: AbortSignal): Promise<RawFindings>;
}

export interface AIJudge {
  assess(stageType: StageType, findings: RawFindings, context: PipelineContext, signal: AbortSignal): Promise<Judgment>;
  summarize(results: readonly StageResult[], risk: RiskAssessment, signal: AbortSignal): Promise<string>;
}

export interface Deployer {
  deploy(snapshotPath: string, record: Readonly<BuildRecord>, signal: AbortSignal): Promise<DeploymentResult>;
}

export interface BuildRecordSink {
  persist(record: BuildRecord): Promise<void>;
}

// ── Configuration ─────────────────────────────────────────────────────────

export interface StageConfig {
  name: string;
  type: StageType;
  required: boolean;
  enabled: boolean;
  executor: StageExecutor;
  timeout_ms?: number;
  parallel_group?: string;
  fail_on_severity?: Severity;
  weight?: number;
}

export interface PipelineTimeouts {
  checkout_ms: number;
  executor_ms: number;
  judge_ms: number;
  summary_ms: number;
}

export interface PipelineConfig {
  risk_threshold: number;
  aggregation: AggregationPolicy;
  timeouts: PipelineTimeouts;
  stages: readonly StageConfig[];
}

export const DEFAULT_RISK_THRESHOLD = 3;
export const MAX_RISK_LEVEL = 5;

/** Longest delay a Node.js timer honours; larger values fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const DEFAULT_TIMEOUTS: PipelineTimeouts = {
  checkout_ms: 300_000,
  executor_ms: 600_000,
  judge_ms: 60_000,
  summary_ms: 60_000,
};
