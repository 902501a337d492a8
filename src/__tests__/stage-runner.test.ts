import { describe, it, expect } from '@jest/globals';
import { runStage } from '../pipeline/stage-runner.js';
import { StageExecutionError } from '../shared/errors.js';
import { DEFAULT_TIMEOUTS, type AIJudge, type PipelineContext, type RawFindings } from '../pipeline/types.js';
import { FakeExecutor, FakeJudge, findings, makeStage } from './test-helpers.js';

const context: PipelineContext = {
  repository: 'https://example.test/repo.git',
  branch: 'main',
  commit: 'abc123',
  snapshotPath: '/tmp/snapshot',
  changedFiles: [],
  priorResults: [],
};

const options = { timeouts: DEFAULT_TIMEOUTS };

describe('runStage', () => {
  it('marks a clean, assessed stage as succeeded', async () => {
    const judge = new FakeJudge();
    const result = await runStage(makeStage('lint', { type: 'code_analysis' }), judge, context, options);

    expect(result.status).toBe('succeeded');
    expect(result.judgment).toEqual({ risk_level: 0, suggestions: [], narrative: 'looks fine' });
    expect(result.judge_error).toBeNull();
    expect(judge.assessed).toEqual(['code_analysis']);
    expect(Object.isFrozen(result)).toBe(true);
  });

  it('reports findings as succeeded_with_findings', async () => {
    const stage = makeStage('lint', {
      type: 'code_analysis',
      findings: findings('code_analysis', { issues: [{ severity: 'low', message: 'unused import' }] }),
    });
    const result = await runStage(stage, new FakeJudge(), context, options);

    expect(result.status).toBe('succeeded_with_findings');
    expect(result.findings.issue_count).toBe(1);
  });

  it('keeps the findings when the judge is unavailable', async () => {
    const judge = new FakeJudge(() => {
      throw new Error('model down');
    });
    const result = await runStage(makeStage('tests', { type: 'testing' }), judge, context, options);

    expect(result.status).toBe('succeeded_with_findings');
    expect(result.judgment).toBeNull();
    expect(result.judge_error).toBe('model down');
  });

  it('does not call the judge when the executor fails', async () => {
    const judge = new FakeJudge();
    const stage = makeStage('audit', {
      type: 'security_scan',
      executor: FakeExecutor.failing(new StageExecutionError('audit', 'npm exited with code 2')),
    });
    const result = await runStage(stage, judge, context, options);

    expect(result.status).toBe('failed');
    expect(result.findings.error).toEqual({ type: 'stage_execution', message: 'npm exited with code 2' });
    expect(result.judgment).toBeNull();
    expect(judge.assessed).toEqual([]);
  });

  it('never rejects, even when the judge throws synchronously', async () => {
    const judge: AIJudge = {
      assess: () => {
        throw new Error('sync failure');
      },
      summarize: async () => 'unused',
    };
    const result = await runStage(makeStage('custom'), judge, context, options);

    expect(result.status).toBe('succeeded_with_findings');
    expect(result.judge_error).toBe('sync failure');
  });

  it('skips a stage whose executor found nothing to run', async () => {
    const judge = new FakeJudge();
    const stage = makeStage('iac', {
      type: 'infrastructure_validation',
      findings: findings('infrastructure_validation', { skip_reason: 'none of main.tf present' }),
    });
    const result = await runStage(stage, judge, context, options);

    expect(result.status).toBe('skipped');
    expect(result.skip_reason).toBe('none of main.tf present');
    expect(judge.assessed).toEqual([]);
  });

  it('skips a disabled stage without running it', async () => {
    const executor = FakeExecutor.returning(findings('custom'));
    const result = await runStage(makeStage('off', { enabled: false, executor }), new FakeJudge(), context, options);

    expect(result.status).toBe('skipped');
    expect(result.skip_reason).toBe('disabled');
    expect(executor.calls).toBe(0);
  });

  it("fails the stage on the tool's own failing verdict", async () => {
    const stage = makeStage('tests', { type: 'testing', findings: findings('testing', { passed: false }) });
    const result = await runStage(stage, new FakeJudge(), context, options);

    expect(result.status).toBe('failed');
    expect(result.judgment?.risk_level).toBe(0);
  });

  it('fails the stage when a finding reaches fail_on_severity', async () => {
    const critical = makeStage('audit', {
      type: 'security_scan',
      fail_on_severity: 'high',
      findings: findings('security_scan', { issues: [{ severity: 'critical', message: 'RCE in parser' }] }),
    });
    const medium = makeStage('audit', {
      type: 'security_scan',
      fail_on_severity: 'high',
      findings: findings('security_scan', { issues: [{ severity: 'medium', message: 'ReDoS' }] }),
    });

    expect((await runStage(critical, new FakeJudge(), context, options)).status).toBe('failed');
    expect((await runStage(medium, new FakeJudge(), context, options)).status).toBe('succeeded_with_findings');
  });

  it('fails a stage whose executor exceeds its timeout', async () => {
    const executor = new FakeExecutor(
      (_path, _ctx, signal) =>
        new Promise((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(signal.reason));
        }),
    );
    const result = await runStage(makeStage('slow', { executor, timeout_ms: 20 }), new FakeJudge(), context, options);

    expect(result.status).toBe('failed');
    expect(result.findings.error).toEqual({ type: 'timeout', message: 'Stage slow executor timed out after 20ms' });
  });

  it('rejects malformed findings as an executor failure', async () => {
    const executor = new FakeExecutor(async () => JSON.parse('{"stage_type":"custom","issues":"nope"}'));
    const result = await runStage(makeStage('odd', { executor }), new FakeJudge(), context, options);

    expect(result.status).toBe('failed');
    expect(result.findings.error?.type).toBe('stage_execution');
    expect(result.findings.error?.message).toMatch(/^Executor returned malformed findings at issues: /);
  });

  it('takes the stage type from configuration and counts issues when the executor omits the count', async () => {
    const executor = new FakeExecutor(async () =>
      JSON.parse('{"stage_type":"testing","issues":[{"severity":"low","message":"flaky"}]}'),
    );
    const result = await runStage(makeStage('odd', { executor }), new FakeJudge(), context, options);

    expect(result.findings.stage_type).toBe('custom');
    expect(result.findings.issue_count).toBe(1);
    expect(result.findings.metrics).toEqual({});
  });

  it('never counts fewer issues than the executor listed', async () => {
    const issues: RawFindings['issues'] = [{ severity: 'medium', message: 'missing null check' }];
    const undercounted = makeStage('lint', { findings: findings('custom', { issues, issue_count: 0 }) });
    const truncated = makeStage('audit', { findings: findings('custom', { issues, issue_count: 40 }) });

    const first = await runStage(undercounted, new FakeJudge(), context, options);
    const second = await runStage(truncated, new FakeJudge(), context, options);

    expect(first.status).toBe('succeeded_with_findings');
    expect(first.findings.issue_count).toBe(1);
    expect(second.findings.issue_count).toBe(40);
  });

  it('treats an out-of-range judgment as an unavailable judge', async () => {
    const judge = new FakeJudge(() => ({ risk_level: 9, suggestions: [], narrative: 'very bad' }));
    const result = await runStage(makeStage('custom'), judge, context, options);

    expect(result.judgment).toBeNull();
    expect(result.judge_error).toMatch(/^Judge returned a malformed judgment: risk_level /);
  });

  it('measures duration with the injected clock', async () => {
    let tick = 0;
    const clock = () => new Date(Date.UTC(2026, 0, 1) + (tick++) * 250);
    const result = await runStage(makeStage('custom'), new FakeJudge(), context, { ...options, clock });

    expect(result.duration_ms).toBe(250);
  });
});
