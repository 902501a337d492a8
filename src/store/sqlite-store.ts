import type Database from 'better-sqlite3';
import { jsonHash } from '../shared/redact.js';
import { BuildRecordSchema } from '../shared/schemas.js';
import type { BuildRecord, BuildRecordSink, GateDecision } from '../pipeline/types.js';

export interface BuildSummaryRow {
  build_id: string;
  repository: string;
  branch: string | null;
  commit: string | null;
  started_at: string;
  completed_at: string | null;
  success: boolean;
  canceled: boolean;
  risk_level: number | null;
  gate: GateDecision | null;
}

interface BuildRow {
  build_id: string;
  repository: string;
  branch: string | null;
  commit_sha: string | null;
  started_at: string;
  completed_at: string | null;
  success: number;
  canceled: number;
  risk_level: number | null;
  gate: GateDecision | null;
}

export interface ListOptions {
  limit?: number;
  offset?: number;
  repository?: string;
}

function toSummary(row: BuildRow): BuildSummaryRow {
  return {
    build_id: row.build_id,
    repository: row.repository,
    branch: row.branch,
    commit: row.commit_sha,
    started_at: row.started_at,
    completed_at: row.completed_at,
    success: row.success === 1,
    canceled: row.canceled === 1,
    risk_level: row.risk_level,
    gate: row.gate,
  };
}

/**
 * Build history in the workspace SQLite database. The full record is stored as JSON
 * next to the columns the listing queries need, with a hash to detect tampering.
 */
export class SqliteBuildStore implements BuildRecordSink {
  constructor(private readonly db: Database.Database) {}

  async persist(record: BuildRecord): Promise<void> {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO builds
          (build_id, schema_version, repository, branch, commit_sha, started_at, completed_at,
           success, canceled, risk_level, gate, record_json, record_hash)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        record.build_id,
        record.schema_version,
        record.repository,
        record.branch,
        record.commit,
        record.started_at,
        record.completed_at,
        record.success ? 1 : 0,
        record.canceled ? 1 : 0,
        record.risk_assessment?.level ?? null,
        record.risk_assessment?.gate ?? null,
        JSON.stringify(record),
        jsonHash(record),
      );
  }

  get(buildId: string): BuildRecord | null {
    const row = this.db
      .prepare(`SELECT record_json, record_hash FROM builds WHERE build_id = ?`)
      .get(buildId) as { record_json: string; record_hash: string } | undefined;
    if (!row) return null;

    const parsed = BuildRecordSchema.safeParse(JSON.parse(row.record_json));
    if (!parsed.success) {
      throw new Error(`Stored build ${buildId} does not match the build record schema`);
    }
    if (jsonHash(parsed.data) !== row.record_hash) {
      throw new Error(`Stored build ${buildId} failed its integrity check`);
    }
    return parsed.data;
  }

  /** Most recent builds first. */
  list(opts: ListOptions = {}): BuildSummaryRow[] {
    const limit = opts.limit ?? 50;
    const offset = opts.offset ?? 0;
    const rows = opts.repository
      ? this.db
          .prepare(
            `SELECT * FROM builds WHERE repository = ?
             ORDER BY started_at DESC, build_id DESC LIMIT ? OFFSET ?`,
          )
          .all(opts.repository, limit, offset)
      : this.db
          .prepare(`SELECT * FROM builds ORDER BY started_at DESC, build_id DESC LIMIT ? OFFSET ?`)
          .all(limit, offset);
    return (rows as BuildRow[]).map(toSummary);
  }

  count(): number {
    const row = this.db.prepare(`SELECT COUNT(*) AS n FROM builds`).get() as { n: number };
    return row.n;
  }
}
