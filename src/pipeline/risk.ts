import { ConfigurationError } from '../shared/errors.js';
import { clampLevel, STAGE_SCORERS } from './scorers.js';
import {
  MAX_RISK_LEVEL,
  type AggregationPolicy,
  type GateDecision,
  type RiskAssessment,
  type RiskFactor,
  type StageResult,
} from './types.js';

export interface RiskPolicy {
  threshold: number;
  policy: AggregationPolicy;
  /** Per-stage weights for `weighted_average`. Missing stages weigh 1. */
  weights?: Readonly<Record<string, number>>;
  /** Configured stage names. When given, each one must have a result before risk is assessed. */
  stages?: readonly string[];
}

export function assertValidThreshold(threshold: number, path = 'risk_threshold'): void {
  if (!Number.isInteger(threshold) || threshold < 0 || threshold > MAX_RISK_LEVEL) {
    throw new ConfigurationError(`must be an integer between 0 and ${MAX_RISK_LEVEL}, got ${threshold}`, path);
  }
}

export function gateDecision(level: number, threshold: number): GateDecision {
  return level > threshold ? 'block' : 'proceed';
}

export function scoreStage(result: StageResult): RiskFactor {
  if (result.status === 'skipped') {
    return {
      stage: result.name,
      sub_score: 0,
      rationale: `skipped: ${result.skip_reason ?? 'no reason given'}`,
      assessed: false,
    };
  }
  if (!result.judgment) {
    const why = result.status === 'failed' && result.findings.error
      ? `stage failed before assessment (${result.findings.error.message})`
      : `judge unavailable (${result.judge_error ?? 'no judgment'})`;
    return { stage: result.name, sub_score: 0, rationale: `unassessed: ${why}`, assessed: false };
  }
  const { score, rationale } = STAGE_SCORERS[result.type](result.judgment, result.findings);
  return { stage: result.name, sub_score: clampLevel(score), rationale, assessed: true };
}

function aggregate(factors: RiskFactor[], policy: RiskPolicy): number {
  const assessed = factors.filter((f) => f.assessed);
  if (assessed.length === 0) return 0;

  switch (policy.policy) {
    case 'max':
      return Math.max(...assessed.map((f) => f.sub_score));
    case 'sum':
      return Math.min(MAX_RISK_LEVEL, assessed.reduce((acc, f) => acc + f.sub_score, 0));
    case 'weighted_average': {
      let total = 0;
      let weightSum = 0;
      for (const f of assessed) {
        const weights = policy.weights ?? {};
        const weight = Object.hasOwn(weights, f.stage) ? (weights[f.stage] ?? 1) : 1;
        total += f.sub_score * weight;
        weightSum += weight;
      }
      return weightSum === 0 ? 0 : clampLevel(Math.floor(total / weightSum + 0.5));
    }
  }
}

/**
 * Fold terminal stage results into one risk level and a gate decision.
 * No I/O: the same results and policy always give the same assessment.
 */
export function computeRiskAssessment(results: readonly StageResult[], policy: RiskPolicy): RiskAssessment {
  assertValidThreshold(policy.threshold);
  if (policy.stages) {
    const missing = policy.stages.filter((name) => !results.some((r) => r.name === name));
    if (missing.length > 0) {
      throw new ConfigurationError(`cannot assess risk before every stage finishes; missing ${missing.join(', ')}`, 'stages');
    }
  }

  const factors = results.map(scoreStage);
  const level = aggregate(factors, policy);
  const incomplete = results.some((r, i) => r.status !== 'skipped' && factors[i]?.assessed === false);

  return {
    level,
    threshold: policy.threshold,
    policy: policy.policy,
    factors,
    gate: gateDecision(level, policy.threshold),
    incomplete,
  };
}
