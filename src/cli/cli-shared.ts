import type Database from 'better-sqlite3';
import { getStagegatePaths } from '../workspace/paths.js';
import { openDb } from '../workspace/db.js';
import { SqliteBuildStore } from '../store/sqlite-store.js';
import type { StagegatePaths } from '../workspace/types.js';
import type { BuildRecord, StageStatus } from '../pipeline/types.js';

export interface WorkspaceContext {
  paths: StagegatePaths;
  db: Database.Database;
  store: SqliteBuildStore;
}

export function openWorkspace(cwd?: string): WorkspaceContext {
  const paths = getStagegatePaths(cwd);
  const db = openDb(paths.stateDb);
  return { paths, db, store: new SqliteBuildStore(db) };
}

export const EXIT_OK = 0;
export const EXIT_BLOCKED = 1;
export const EXIT_CONFIG = 2;

/** 0 only when every required stage passed and the gate let the build through. */
export function exitCodeFor(record: BuildRecord): number {
  return record.success && record.risk_assessment?.gate === 'proceed' ? EXIT_OK : EXIT_BLOCKED;
}

const STATUS_LABEL: Record<StageStatus, string> = {
  succeeded: '[ok]',
  succeeded_with_findings: '[warn]',
  failed: '[fail]',
  skipped: '[skip]',
};

export function formatBuildReport(record: BuildRecord): string[] {
  const lines = [`Build ${record.build_id} (${record.repository}${record.branch ? `@${record.branch}` : ''})`];
  if (record.error) lines.push(`  Error: ${record.error.message}`);

  for (const stage of Object.values(record.stages)) {
    const risk = stage.judgment ? `risk ${stage.judgment.risk_level}` : 'unassessed';
    const detail = stage.skip_reason ?? `${stage.findings.issue_count} issue(s), ${risk}`;
    lines.push(`  ${STATUS_LABEL[stage.status].padEnd(7)} ${stage.name.padEnd(28)} ${detail}`);
    if (stage.findings.error) lines.push(`          ${stage.findings.error.message}`);
  }

  const risk = record.risk_assessment;
  if (risk) {
    lines.push(`Risk: ${risk.level}/5 (threshold ${risk.threshold}, ${risk.policy}) -> ${risk.gate.toUpperCase()}`);
  }
  if (record.deployment) {
    const env = record.deployment.environment ? ` to ${record.deployment.environment}` : '';
    const reason = record.deployment.reason ? `: ${record.deployment.reason}` : '';
    lines.push(`Deployment ${record.deployment.status}${env}${reason}`);
  }
  if (record.ai_summary) lines.push('', record.ai_summary);
  return lines;
}
