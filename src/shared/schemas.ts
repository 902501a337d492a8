import { z } from 'zod';
import { DEFAULT_RISK_THRESHOLD, MAX_TIMEOUT_MS, SEVERITIES, STAGE_TYPES } from '../pipeline/types.js';

const TimeoutSchema = z.number().int().positive().max(MAX_TIMEOUT_MS, `must be at most ${MAX_TIMEOUT_MS}`);

export const SeveritySchema = z.enum(SEVERITIES);
export const StageTypeSchema = z.enum(STAGE_TYPES);

export const FindingSchema = z.object({
  severity: SeveritySchema,
  message: z.string(),
  rule: z.string().optional(),
  location: z.string().optional(),
});

export const RawFindingsSchema = z.object({
  stage_type: StageTypeSchema,
  issue_count: z.number().int().nonnegative().optional(),
  issues: z.array(FindingSchema).default([]),
  metrics: z.record(z.union([z.number(), z.string(), z.boolean()])).default({}),
  passed: z.boolean().optional(),
  skip_reason: z.string().optional(),
  error: z.object({ type: z.string(), message: z.string() }).optional(),
});

export const SeverityCountsSchema = z.object({
  critical: z.number().int().nonnegative().default(0),
  high: z.number().int().nonnegative().default(0),
  medium: z.number().int().nonnegative().default(0),
  low: z.number().int().nonnegative().default(0),
});

export const JudgmentSchema = z.object({
  risk_level: z.number().int().min(0).max(5),
  suggestions: z.array(z.string()).default([]),
  narrative: z.string().default(''),
  severity_counts: SeverityCountsSchema.optional(),
  flagged_severity: SeveritySchema.optional(),
  model: z.string().optional(),
});

const NAME_PATTERN = /^[a-z][a-z0-9_-]*$/;

export const ExecutorSpecSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  parser: z.enum(['json', 'eslint', 'npm_audit', 'jest', 'terraform', 'plain']).default('json'),
  requires_paths: z.array(z.string()).optional(),
  env: z.record(z.string()).optional(),
  coverage_target: z.number().min(0).max(100).optional(),
});

export const StageSpecSchema = z.object({
  name: z.string().regex(NAME_PATTERN, 'must be lowercase letters, digits, "-" or "_", starting with a letter'),
  type: StageTypeSchema,
  required: z.boolean().default(true),
  enabled: z.boolean().default(true),
  timeout_ms: TimeoutSchema.optional(),
  parallel_group: z.string().min(1).optional(),
  fail_on_severity: SeveritySchema.optional(),
  weight: z.number().positive().optional(),
  executor: ExecutorSpecSchema,
});

export const JudgeSpecSchema = z.object({
  provider: z.enum(['openai', 'heuristic', 'none']).default('heuristic'),
  model: z.string().optional(),
  api_base: z.string().url().optional(),
});

export const DeploySpecSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  environment: z.string().min(1),
});

export const PipelineFileSchema = z.object({
  version: z.string().default('1'),
  risk_threshold: z.number().int().min(0).max(5).default(DEFAULT_RISK_THRESHOLD),
  aggregation: z.enum(['max', 'sum', 'weighted_average']).default('max'),
  timeouts: z
    .object({
      checkout_ms: TimeoutSchema.default(300_000),
      executor_ms: TimeoutSchema.default(600_000),
      judge_ms: TimeoutSchema.default(60_000),
      summary_ms: TimeoutSchema.default(60_000),
    })
    .default({}),
  judge: JudgeSpecSchema.default({}),
  stages: z.array(StageSpecSchema).min(1, 'at least one stage is required'),
  deploy: DeploySpecSchema.optional(),
});

export type ExecutorSpec = z.infer<typeof ExecutorSpecSchema>;
export type StageSpec = z.infer<typeof StageSpecSchema>;
export type JudgeSpec = z.infer<typeof JudgeSpecSchema>;
export type DeploySpec = z.infer<typeof DeploySpecSchema>;
export type PipelineFile = z.infer<typeof PipelineFileSchema>;

export const WorkspaceEnvSchema = z.object({
  llm: z
    .object({
      api_key: z.string().optional(),
      api_base: z.string().optional(),
      model: z.string().optional(),
    })
    .optional(),
});

// ── Stored build records ──────────────────────────────────────────────────

const ErrorDescriptionSchema = z.object({ type: z.string(), message: z.string() });

export const StageResultSchema = z.object({
  name: z.string(),
  type: StageTypeSchema,
  required: z.boolean(),
  status: z.enum(['succeeded', 'succeeded_with_findings', 'failed', 'skipped']),
  findings: RawFindingsSchema.extend({ issue_count: z.number().int().nonnegative() }),
  judgment: JudgmentSchema.nullable(),
  judge_error: z.string().nullable(),
  skip_reason: z.string().nullable(),
  duration_ms: z.number().nonnegative(),
});

export const RiskAssessmentSchema = z.object({
  level: z.number().int().min(0).max(5),
  threshold: z.number().int().min(0).max(5),
  policy: z.enum(['max', 'sum', 'weighted_average']),
  factors: z.array(
    z.object({ stage: z.string(), sub_score: z.number(), rationale: z.string(), assessed: z.boolean() }),
  ),
  gate: z.enum(['proceed', 'block']),
  incomplete: z.boolean(),
});

export const BuildRecordSchema = z.object({
  schema_version: z.string(),
  build_id: z.string(),
  repository: z.string(),
  branch: z.string().nullable(),
  commit: z.string().nullable(),
  started_at: z.string(),
  completed_at: z.string().nullable(),
  success: z.boolean(),
  canceled: z.boolean(),
  error: ErrorDescriptionSchema.nullable(),
  stages: z.record(StageResultSchema),
  risk_assessment: RiskAssessmentSchema.nullable(),
  ai_summary: z.string().nullable(),
  ai_summary_source: z.enum(['judge', 'template']).nullable(),
  deployment: z
    .object({
      status: z.enum(['deployed', 'halted', 'failed']),
      environment: z.string().nullable(),
      reason: z.string().nullable(),
      output: z.record(z.unknown()).nullable(),
    })
    .nullable(),
});
