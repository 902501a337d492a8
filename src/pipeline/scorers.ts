import { MAX_RISK_LEVEL, type Judgment, type RawFindings, type Severity, type SeverityCounts, type StageType } from './types.js';

export interface SubScore {
  score: number;
  rationale: string;
}

export type StageScorer = (judgment: Judgment, findings: RawFindings) => SubScore;

export const SEVERITY_WEIGHT: Record<Severity, number> = {
  critical: 5,
  high: 4,
  medium: 2,
  low: 1,
  info: 0,
};

export function clampLevel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(MAX_RISK_LEVEL, Math.max(0, Math.round(value)));
}

export function countSeverities(findings: RawFindings): SeverityCounts {
  const counts: SeverityCounts = { critical: 0, high: 0, medium: 0, low: 0 };
  for (const issue of findings.issues) {
    if (issue.severity !== 'info') counts[issue.severity] += 1;
  }
  return counts;
}

function numericMetric(findings: RawFindings, key: string): number | null {
  const value = findings.metrics[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function judgeLevel(judgment: Judgment): SubScore {
  const score = clampLevel(judgment.risk_level);
  return { score, rationale: `judge risk ${score}` };
}

/** Keeps the higher of two sub-scores and joins both rationales. */
function strongest(base: SubScore, candidate: SubScore | null): SubScore {
  if (!candidate || candidate.score <= base.score) return base;
  return { score: candidate.score, rationale: `${candidate.rationale}; ${base.rationale}` };
}

/** Critical findings pin the maximum; otherwise high and medium counts are weighted, capped at 4. */
export function scoreSecurity(judgment: Judgment, findings: RawFindings): SubScore {
  const counts = judgment.severity_counts ?? countSeverities(findings);
  const weighted =
    counts.critical > 0 ? MAX_RISK_LEVEL : Math.min(4, counts.high * 2 + Math.floor(counts.medium / 3));
  const domain: SubScore = {
    score: weighted,
    rationale: `${counts.critical} critical, ${counts.high} high, ${counts.medium} medium`,
  };
  return strongest(domain, judgeLevel(judgment));
}

export function scoreCodeQuality(judgment: Judgment): SubScore {
  const base = judgeLevel(judgment);
  if (!judgment.flagged_severity) return base;
  return strongest(base, {
    score: SEVERITY_WEIGHT[judgment.flagged_severity],
    rationale: `judge flagged ${judgment.flagged_severity} severity`,
  });
}

export function scoreTesting(judgment: Judgment, findings: RawFindings): SubScore {
  let result = judgeLevel(judgment);
  const failed = numericMetric(findings, 'failed');
  if (failed !== null && failed > 0) {
    result = strongest(result, { score: 4, rationale: `${failed} failing test(s)` });
  }
  const coverage = numericMetric(findings, 'coverage');
  const target = numericMetric(findings, 'coverage_target');
  if (coverage !== null && target !== null && coverage < target) {
    result = strongest(result, { score: 2, rationale: `coverage ${coverage}% below target ${target}%` });
  }
  return result;
}

export function scoreInfrastructure(judgment: Judgment, findings: RawFindings): SubScore {
  const base = judgeLevel(judgment);
  if (findings.passed !== false) return base;
  return strongest(base, { score: 4, rationale: 'infrastructure validation failed' });
}

export const STAGE_SCORERS: Record<StageType, StageScorer> = {
  security_scan: scoreSecurity,
  code_analysis: (judgment) => scoreCodeQuality(judgment),
  testing: scoreTesting,
  infrastructure_validation: scoreInfrastructure,
  custom: (judgment) => judgeLevel(judgment),
};
