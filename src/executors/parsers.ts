import { z } from 'zod';
import { StageExecutionError } from '../shared/errors.js';
import { RawFindingsSchema } from '../shared/schemas.js';
import type { Finding, RawFindings, Severity, StageType } from '../pipeline/types.js';
import { tail, type ProcessResult } from './process.js';

export type ParserName = 'json' | 'eslint' | 'npm_audit' | 'jest' | 'terraform' | 'plain';

export interface ParseContext {
  stage: string;
  stageType: StageType;
  coverageTarget?: number;
}

export interface OutputParser {
  /** Exit codes that mean "the tool ran"; anything else is an executor failure. */
  acceptsExit(code: number | null): boolean;
  parse(result: ProcessResult, ctx: ParseContext): RawFindings;
}

function parseJson(stdout: string, ctx: ParseContext): unknown {
  const text = stdout.trim();
  if (!text) throw new StageExecutionError(ctx.stage, 'Tool produced no output');
  try {
    return JSON.parse(text);
  } catch {
    throw new StageExecutionError(ctx.stage, `Tool output is not JSON: ${tail(text, 120)}`);
  }
}

function validated<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, ctx: ParseContext, tool: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new StageExecutionError(
      ctx.stage,
      `Unexpected ${tool} output at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'invalid'}`,
    );
  }
  return parsed.data;
}

function findings(ctx: ParseContext, issues: Finding[], metrics: RawFindings['metrics'], passed?: boolean): RawFindings {
  return {
    stage_type: ctx.stageType,
    issue_count: issues.length,
    issues,
    metrics,
    ...(passed === undefined ? {} : { passed }),
  };
}

// ── ESLint (--format json) ────────────────────────────────────────────────

const EslintReportSchema = z.array(
  z.object({
    filePath: z.string(),
    messages: z.array(
      z.object({
        ruleId: z.string().nullable().optional(),
        severity: z.number(),
        message: z.string(),
        fatal: z.boolean().optional(),
        line: z.number().optional(),
        column: z.number().optional(),
      }),
    ),
  }),
);

const eslintParser: OutputParser = {
  acceptsExit: (code) => code === 0 || code === 1,
  parse(result, ctx) {
    const report = validated(EslintReportSchema, parseJson(result.stdout, ctx), ctx, 'eslint');
    const issues: Finding[] = [];
    let errors = 0;
    let warnings = 0;
    for (const file of report) {
      for (const msg of file.messages) {
        const severity: Severity = msg.fatal ? 'high' : msg.severity >= 2 ? 'medium' : 'low';
        if (msg.severity >= 2) errors += 1;
        else warnings += 1;
        issues.push({
          severity,
          message: msg.message,
          ...(msg.ruleId ? { rule: msg.ruleId } : {}),
          location: msg.line !== undefined ? `${file.filePath}:${msg.line}` : file.filePath,
        });
      }
    }
    return findings(ctx, issues, { files: report.length, errors, warnings });
  },
};

// ── npm audit (--json) ────────────────────────────────────────────────────

const NPM_SEVERITY: Record<string, Severity> = {
  critical: 'critical',
  high: 'high',
  moderate: 'medium',
  low: 'low',
  info: 'info',
};

const NpmAuditSchema = z.object({
  error: z.object({ code: z.string().nullable().optional(), summary: z.string().optional() }).optional(),
  vulnerabilities: z
    .record(
      z.object({
        name: z.string().optional(),
        severity: z.string(),
        range: z.string().optional(),
        via: z.array(z.union([z.string(), z.object({ title: z.string().optional(), url: z.string().optional() })])).default([]),
      }),
    )
    .default({}),
});

const npmAuditParser: OutputParser = {
  // npm audit exits non-zero whenever it finds something; crashes are detected from the JSON body.
  acceptsExit: (code) => code !== null,
  parse(result, ctx) {
    const audit = validated(NpmAuditSchema, parseJson(result.stdout, ctx), ctx, 'npm audit');
    if (audit.error) {
      throw new StageExecutionError(ctx.stage, `npm audit failed: ${audit.error.summary ?? audit.error.code ?? 'unknown error'}`, result.code);
    }
    const issues: Finding[] = Object.entries(audit.vulnerabilities)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([pkg, vuln]): Finding => {
        const advisory = vuln.via.find((v): v is { title?: string; url?: string } => typeof v === 'object');
        return {
          severity: NPM_SEVERITY[vuln.severity] ?? 'medium',
          message: advisory?.title ? `${pkg}: ${advisory.title}` : `${pkg} is vulnerable`,
          ...(advisory?.url ? { rule: advisory.url } : {}),
          ...(vuln.range ? { location: `${pkg}@${vuln.range}` } : {}),
        };
      });
    const bySeverity = (s: Severity) => issues.filter((i) => i.severity === s).length;
    return findings(ctx, issues, {
      critical: bySeverity('critical'),
      high: bySeverity('high'),
      medium: bySeverity('medium'),
      low: bySeverity('low'),
    });
  },
};

// ── Jest (--json [--coverage]) ────────────────────────────────────────────

const JestReportSchema = z.object({
  success: z.boolean(),
  numTotalTests: z.number(),
  numPassedTests: z.number(),
  numFailedTests: z.number(),
  testResults: z
    .array(
      z.object({
        name: z.string(),
        assertionResults: z
          .array(z.object({ fullName: z.string(), status: z.string(), failureMessages: z.array(z.string()).default([]) }))
          .default([]),
      }),
    )
    .default([]),
  coverageMap: z.record(z.object({ s: z.record(z.number()) })).optional(),
});

/** Statement coverage percentage across all files, one decimal place. */
export function statementCoverage(coverageMap: Record<string, { s: Record<string, number> }>): number | null {
  let total = 0;
  let covered = 0;
  for (const file of Object.values(coverageMap)) {
    for (const hits of Object.values(file.s)) {
      total += 1;
      if (hits > 0) covered += 1;
    }
  }
  return total === 0 ? null : Math.round((covered / total) * 1000) / 10;
}

const jestParser: OutputParser = {
  acceptsExit: (code) => code === 0 || code === 1,
  parse(result, ctx) {
    const report = validated(JestReportSchema, parseJson(result.stdout, ctx), ctx, 'jest');
    const issues: Finding[] = [];
    for (const suite of report.testResults) {
      for (const assertion of suite.assertionResults) {
        if (assertion.status !== 'failed') continue;
        const firstLine = assertion.failureMessages[0]?.split('\n')[0];
        issues.push({
          severity: 'high',
          message: firstLine ? `${assertion.fullName}: ${firstLine}` : assertion.fullName,
          location: suite.name,
        });
      }
    }
    const metrics: RawFindings['metrics'] = {
      total: report.numTotalTests,
      passed: report.numPassedTests,
      failed: report.numFailedTests,
    };
    const coverage = report.coverageMap ? statementCoverage(report.coverageMap) : null;
    if (coverage !== null) metrics['coverage'] = coverage;
    if (ctx.coverageTarget !== undefined) metrics['coverage_target'] = ctx.coverageTarget;
    return findings(ctx, issues, metrics, report.success);
  },
};

// ── terraform validate -json ──────────────────────────────────────────────

const TerraformValidateSchema = z.object({
  valid: z.boolean(),
  diagnostics: z
    .array(
      z.object({
        severity: z.string(),
        summary: z.string(),
        detail: z.string().optional(),
        range: z.object({ filename: z.string(), start: z.object({ line: z.number() }) }).optional(),
      }),
    )
    .default([]),
});

const terraformParser: OutputParser = {
  acceptsExit: (code) => code === 0 || code === 1,
  parse(result, ctx) {
    const report = validated(TerraformValidateSchema, parseJson(result.stdout, ctx), ctx, 'terraform');
    const issues: Finding[] = report.diagnostics.map((d): Finding => ({
      severity: d.severity === 'error' ? 'high' : 'low',
      message: d.detail ? `${d.summary}: ${d.detail}` : d.summary,
      ...(d.range ? { location: `${d.range.filename}:${d.range.start.line}` } : {}),
    }));
    const errors = report.diagnostics.filter((d) => d.severity === 'error').length;
    return findings(ctx, issues, { errors, warnings: issues.length - errors }, report.valid);
  },
};

// ── Generic ───────────────────────────────────────────────────────────────

const jsonParser: OutputParser = {
  acceptsExit: (code) => code === 0,
  parse(result, ctx) {
    const parsed = validated(RawFindingsSchema, parseJson(result.stdout, ctx), ctx, 'json');
    const { issue_count, ...rest } = parsed;
    return { ...rest, stage_type: ctx.stageType, issue_count: issue_count ?? rest.issues.length };
  },
};

const plainParser: OutputParser = {
  acceptsExit: (code) => code === 0,
  parse(_result, ctx) {
    return findings(ctx, [], {}, true);
  },
};

export const PARSERS: Record<ParserName, OutputParser> = {
  json: jsonParser,
  eslint: eslintParser,
  npm_audit: npmAuditParser,
  jest: jestParser,
  terraform: terraformParser,
  plain: plainParser,
};
