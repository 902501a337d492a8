import { countSeverities, SEVERITY_WEIGHT } from '../pipeline/scorers.js';
import {
  SEVERITIES,
  type AIJudge,
  type Judgment,
  type RawFindings,
  type RiskAssessment,
  type Severity,
  type StageResult,
  type StageType,
} from '../pipeline/types.js';

const MAX_SUGGESTIONS = 5;

function highestSeverity(findings: RawFindings): Severity | undefined {
  return SEVERITIES.find((severity) => findings.issues.some((issue) => issue.severity === severity));
}

/**
 * Offline judge: derives risk from finding severities alone.
 * Deterministic, so it doubles as the default when no model is configured.
 */
export class HeuristicJudge implements AIJudge {
  async assess(stageType: StageType, findings: RawFindings): Promise<Judgment> {
    const counts = countSeverities(findings);
    const flagged = highestSeverity(findings);
    let risk = flagged ? SEVERITY_WEIGHT[flagged] : 0;
    if (findings.passed === false) risk = Math.max(risk, 3);

    const suggestions: string[] = [];
    for (const issue of findings.issues) {
      if (suggestions.length >= MAX_SUGGESTIONS) break;
      const text = issue.rule ? `${issue.rule}: ${issue.message}` : issue.message;
      if (!suggestions.includes(text)) suggestions.push(text);
    }

    const narrative =
      findings.issue_count === 0 && findings.passed !== false
        ? `No ${stageType.replace(/_/g, ' ')} issues found.`
        : `${findings.issue_count} issue(s): ${counts.critical} critical, ${counts.high} high, ` +
          `${counts.medium} medium, ${counts.low} low` +
          (findings.passed === false ? '; the tool reported a failing result.' : '.');

    return {
      risk_level: risk,
      suggestions,
      narrative,
      severity_counts: counts,
      ...(flagged ? { flagged_severity: flagged } : {}),
      model: 'heuristic',
    };
  }

  async summarize(results: readonly StageResult[], risk: RiskAssessment): Promise<string> {
    const top = [...risk.factors].sort((a, b) => b.sub_score - a.sub_score)[0];
    const withFindings = results.filter((r) => r.findings.issue_count > 0).length;
    const parts = [
      `Risk level ${risk.level}/5; the gate decision is ${risk.gate}.`,
      `${withFindings} of ${results.length} stage(s) reported findings.`,
    ];
    if (top && top.sub_score > 0) parts.push(`Largest contributor: ${top.stage} (${top.sub_score}, ${top.rationale}).`);
    return parts.join(' ');
  }
}
