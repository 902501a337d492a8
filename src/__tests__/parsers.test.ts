import { describe, it, expect } from '@jest/globals';
import { PARSERS, statementCoverage } from '../executors/parsers.js';
import { StageExecutionError } from '../shared/errors.js';
import type { ParseContext } from '../executors/parsers.js';

const out = (stdout: unknown, code = 0) => ({
  code,
  stdout: typeof stdout === 'string' ? stdout : JSON.stringify(stdout),
  stderr: '',
});

describe('eslint parser', () => {
  const ctx: ParseContext = { stage: 'lint', stageType: 'code_analysis' };

  it('maps messages to findings with file locations', () => {
    const report = [
      {
        filePath: '/snap/src/a.ts',
        messages: [
          { ruleId: 'no-unused-vars', severity: 2, message: "'x' is defined but never used", line: 3, column: 7 },
          { ruleId: null, severity: 1, message: 'Unexpected console statement', line: 9 },
        ],
      },
      { filePath: '/snap/src/b.ts', messages: [] },
    ];

    expect(PARSERS.eslint.parse(out(report, 1), ctx)).toEqual({
      stage_type: 'code_analysis',
      issue_count: 2,
      issues: [
        {
          severity: 'medium',
          message: "'x' is defined but never used",
          rule: 'no-unused-vars',
          location: '/snap/src/a.ts:3',
        },
        { severity: 'low', message: 'Unexpected console statement', location: '/snap/src/a.ts:9' },
      ],
      metrics: { files: 2, errors: 1, warnings: 1 },
    });
  });

  it('treats exit code 2 as a crashed linter', () => {
    expect(PARSERS.eslint.acceptsExit(0)).toBe(true);
    expect(PARSERS.eslint.acceptsExit(1)).toBe(true);
    expect(PARSERS.eslint.acceptsExit(2)).toBe(false);
  });

  it('rejects output that is not a lint report', () => {
    expect(() => PARSERS.eslint.parse(out({ files: [] }), ctx)).toThrow(StageExecutionError);
  });
});

describe('npm audit parser', () => {
  const ctx: ParseContext = { stage: 'audit', stageType: 'security_scan' };

  it('lists vulnerable packages by name with mapped severities', () => {
    const audit = {
      vulnerabilities: {
        zlib: { name: 'zlib', severity: 'moderate', range: '<1.2.0', via: ['minizip'] },
        acorn: {
          name: 'acorn',
          severity: 'critical',
          range: '<5.0.0',
          via: [{ title: 'Prototype pollution', url: 'https://advisories.example.test/1' }],
        },
      },
    };

    expect(PARSERS.npm_audit.parse(out(audit, 1), ctx)).toEqual({
      stage_type: 'security_scan',
      issue_count: 2,
      issues: [
        {
          severity: 'critical',
          message: 'acorn: Prototype pollution',
          rule: 'https://advisories.example.test/1',
          location: 'acorn@<5.0.0',
        },
        { severity: 'medium', message: 'zlib is vulnerable', location: 'zlib@<1.2.0' },
      ],
      metrics: { critical: 1, high: 0, medium: 1, low: 0 },
    });
  });

  it('reports a clean audit', () => {
    expect(PARSERS.npm_audit.parse(out({ vulnerabilities: {} }), ctx).issue_count).toBe(0);
  });

  it('raises when npm itself failed', () => {
    const body = { error: { code: 'ENOLOCK', summary: 'This command requires an existing lockfile.' } };
    expect(() => PARSERS.npm_audit.parse(out(body, 1), ctx)).toThrow(
      'npm audit failed: This command requires an existing lockfile.',
    );
  });
});

describe('jest parser', () => {
  it('reports failing assertions, counts and coverage against the target', () => {
    const report = {
      success: false,
      numTotalTests: 3,
      numPassedTests: 2,
      numFailedTests: 1,
      testResults: [
        {
          name: '/snap/test/math.test.js',
          assertionResults: [
            { fullName: 'math adds', status: 'passed', failureMessages: [] },
            { fullName: 'math subtracts', status: 'failed', failureMessages: ['Expected: 1\nReceived: 2'] },
          ],
        },
      ],
      coverageMap: { '/snap/src/math.js': { s: { '0': 1, '1': 0, '2': 3 } } },
    };

    expect(
      PARSERS.jest.parse(out(report, 1), { stage: 'tests', stageType: 'testing', coverageTarget: 80 }),
    ).toEqual({
      stage_type: 'testing',
      issue_count: 1,
      issues: [{ severity: 'high', message: 'math subtracts: Expected: 1', location: '/snap/test/math.test.js' }],
      metrics: { total: 3, passed: 2, failed: 1, coverage: 66.7, coverage_target: 80 },
      passed: false,
    });
  });

  it('computes statement coverage to one decimal place', () => {
    expect(statementCoverage({ a: { s: { '0': 1, '1': 1 } }, b: { s: { '0': 0 } } })).toBe(66.7);
    expect(statementCoverage({})).toBeNull();
  });
});

describe('terraform parser', () => {
  it('maps diagnostics and the validity verdict', () => {
    const report = {
      valid: false,
      diagnostics: [
        {
          severity: 'error',
          summary: 'Missing required argument',
          detail: 'The argument "region" is required.',
          range: { filename: 'main.tf', start: { line: 4 } },
        },
        { severity: 'warning', summary: 'Deprecated attribute' },
      ],
    };

    expect(PARSERS.terraform.parse(out(report, 1), { stage: 'iac', stageType: 'infrastructure_validation' })).toEqual({
      stage_type: 'infrastructure_validation',
      issue_count: 2,
      issues: [
        {
          severity: 'high',
          message: 'Missing required argument: The argument "region" is required.',
          location: 'main.tf:4',
        },
        { severity: 'low', message: 'Deprecated attribute' },
      ],
      metrics: { errors: 1, warnings: 1 },
      passed: false,
    });
  });
});

describe('json and plain parsers', () => {
  const ctx: ParseContext = { stage: 'custom', stageType: 'custom' };

  it('accepts findings JSON and takes the stage type from configuration', () => {
    const stdout = '{"stage_type":"testing","issues":[{"severity":"low","message":"slow test"}]}';
    expect(PARSERS.json.parse(out(stdout), ctx)).toEqual({
      stage_type: 'custom',
      issue_count: 1,
      issues: [{ severity: 'low', message: 'slow test' }],
      metrics: {},
    });
  });

  it('rejects empty and non-JSON output', () => {
    expect(() => PARSERS.json.parse(out('  '), ctx)).toThrow('Tool produced no output');
    expect(() => PARSERS.json.parse(out('hello'), ctx)).toThrow('Tool output is not JSON: hello');
  });

  it('passes any successful command for plain stages', () => {
    expect(PARSERS.plain.acceptsExit(1)).toBe(false);
    expect(PARSERS.plain.parse(out('built in 3s'), ctx)).toEqual({
      stage_type: 'custom',
      issue_count: 0,
      issues: [],
      metrics: {},
      passed: true,
    });
  });
});
