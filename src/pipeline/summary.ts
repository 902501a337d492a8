import type { RiskAssessment, StageResult, StageStatus } from './types.js';

const STATUS_ORDER: readonly StageStatus[] = ['succeeded', 'succeeded_with_findings', 'failed', 'skipped'];

const STATUS_LABELS: Record<StageStatus, string> = {
  succeeded: 'succeeded',
  succeeded_with_findings: 'succeeded with findings',
  failed: 'failed',
  skipped: 'skipped',
};

export interface TemplateSummaryInput {
  results: readonly StageResult[];
  risk: RiskAssessment | null;
  success: boolean;
  canceled: boolean;
  error?: { type: string; message: string } | null;
}

/**
 * Deterministic summary built only from stage statuses and the risk figure.
 * Used whenever the judge cannot produce one.
 */
export function templateSummary(input: TemplateSummaryInput): string {
  const { results, risk } = input;
  const verdict = input.canceled ? 'canceled' : input.success ? 'passed' : 'failed';

  const counts = STATUS_ORDER
    .map((status) => `${results.filter((r) => r.status === status).length} ${STATUS_LABELS[status]}`)
    .join(', ');
  const lines = [`Build ${verdict}: ${results.length} stage(s) (${counts}).`];
  if (input.error) lines.push(`Error (${input.error.type}): ${input.error.message}.`);

  if (risk) {
    const action = risk.gate === 'block' ? 'deployment blocked' : 'deployment may proceed';
    lines.push(`Risk level ${risk.level}/5 against threshold ${risk.threshold}: ${action}.`);
  } else {
    lines.push('Risk not assessed.');
  }

  const failed = results.filter((r) => r.status === 'failed').map((r) => (r.required ? r.name : `${r.name} (optional)`));
  if (failed.length > 0) lines.push(`Failed stages: ${failed.join(', ')}.`);

  const unassessed = risk?.factors.filter((f) => !f.assessed && !f.rationale.startsWith('skipped')) ?? [];
  if (unassessed.length > 0) {
    lines.push(`Unassessed stages: ${unassessed.map((f) => f.stage).join(', ')}; the risk level may be incomplete.`);
  }

  return lines.join(' ');
}
