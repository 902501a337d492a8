import { describe, it, expect, jest } from '@jest/globals';
import { createJudge, DisabledJudge, HeuristicJudge, OpenAIJudge } from '../judges/index.js';
import { extractJson } from '../judges/openai.js';
import { buildAssessPrompt } from '../judges/prompts.js';
import { ConfigurationError, JudgeUnavailableError } from '../shared/errors.js';
import type { PipelineContext, RiskAssessment, StageResult } from '../pipeline/types.js';
import { findings } from './test-helpers.js';

const context: PipelineContext = {
  repository: 'https://example.test/repo.git',
  branch: 'main',
  commit: 'abc123',
  snapshotPath: '/tmp/snapshot',
  changedFiles: [],
  priorResults: [],
};

const signal = new AbortController().signal;

function stageResult(name: string, issueCount: number): StageResult {
  const issues = Array.from({ length: issueCount }, (_, i) => ({ severity: 'low' as const, message: `issue ${i}` }));
  return {
    name,
    type: 'custom',
    required: true,
    status: issueCount > 0 ? 'succeeded_with_findings' : 'succeeded',
    findings: findings('custom', { issues }),
    judgment: null,
    judge_error: null,
    skip_reason: null,
    duration_ms: 0,
  };
}

const risk: RiskAssessment = {
  level: 4,
  threshold: 3,
  policy: 'max',
  factors: [
    { stage: 'lint', sub_score: 0, rationale: 'judge risk 0', assessed: true },
    { stage: 'deps', sub_score: 4, rationale: '0 critical, 2 high, 0 medium', assessed: true },
  ],
  gate: 'block',
  incomplete: false,
};

describe('HeuristicJudge', () => {
  const judge = new HeuristicJudge();

  it('derives risk from the worst severity', async () => {
    const judgment = await judge.assess(
      'security_scan',
      findings('security_scan', {
        issues: [
          { severity: 'medium', message: 'ReDoS', rule: 'GHSA-1' },
          { severity: 'critical', message: 'RCE in parser' },
        ],
      }),
    );

    expect(judgment).toEqual({
      risk_level: 5,
      suggestions: ['GHSA-1: ReDoS', 'RCE in parser'],
      narrative: '2 issue(s): 1 critical, 0 high, 1 medium, 0 low.',
      severity_counts: { critical: 1, high: 0, medium: 1, low: 0 },
      flagged_severity: 'critical',
      model: 'heuristic',
    });
  });

  it('reports a clean stage as risk 0', async () => {
    const judgment = await judge.assess('code_analysis', findings('code_analysis'));

    expect(judgment.risk_level).toBe(0);
    expect(judgment.narrative).toBe('No code analysis issues found.');
    expect(judgment.flagged_severity).toBeUndefined();
  });

  it('raises risk to 3 when the tool reports failure without findings', async () => {
    const judgment = await judge.assess('testing', findings('testing', { passed: false }));

    expect(judgment.risk_level).toBe(3);
    expect(judgment.narrative).toBe('0 issue(s): 0 critical, 0 high, 0 medium, 0 low; the tool reported a failing result.');
  });

  it('summarizes the gate and the largest contributor', async () => {
    const summary = await judge.summarize([stageResult('lint', 0), stageResult('deps', 2)], risk);

    expect(summary).toBe(
      'Risk level 4/5; the gate decision is block. 1 of 2 stage(s) reported findings. ' +
        'Largest contributor: deps (4, 0 critical, 2 high, 0 medium).',
    );
  });
});

describe('DisabledJudge', () => {
  it('is always unavailable', async () => {
    const judge = new DisabledJudge();
    await expect(judge.assess()).rejects.toBeInstanceOf(JudgeUnavailableError);
    await expect(judge.summarize([], risk)).rejects.toThrow('AI judge is disabled');
  });
});

describe('createJudge', () => {
  it('builds the configured provider', () => {
    expect(createJudge({ provider: 'heuristic' }, {})).toBeInstanceOf(HeuristicJudge);
    expect(createJudge({ provider: 'none' }, {})).toBeInstanceOf(DisabledJudge);
    expect(createJudge({ provider: 'openai' }, { LLM_API_KEY: 'test-secret' })).toBeInstanceOf(OpenAIJudge);
  });

  it('refuses the openai provider without an API key', () => {
    expect(() => createJudge({ provider: 'openai' }, {})).toThrow(ConfigurationError);
  });
});

interface FakeResponse {
  ok: boolean;
  status: number;
  json: () => Promise<unknown>;
  text: () => Promise<string>;
}

function reply(status: number, body: unknown): FakeResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => (typeof body === 'string' ? body : JSON.stringify(body)),
  };
}

function completion(content: string | null) {
  return reply(200, { model: 'gpt-4o-mini', choices: [{ message: { content } }] });
}

function openAIJudge(response: FakeResponse | Error) {
  const fetchMock = jest.fn(async (_url: string, _init: RequestInit) => {
    if (response instanceof Error) throw response;
    return response;
  });
  const judge = new OpenAIJudge({
    apiKey: 'test-secret',
    apiBase: 'https://llm.example.test/v1/',
    fetch: fetchMock as unknown as typeof fetch,
  });
  return { judge, fetchMock };
}

const withIssues = findings('security_scan', { issues: [{ severity: 'high', message: 'lodash: prototype pollution' }] });

describe('OpenAIJudge', () => {
  it('skips the model for clean analysis and security stages', async () => {
    const { judge, fetchMock } = openAIJudge(completion('{}'));

    const judgment = await judge.assess('security_scan', findings('security_scan'), context, signal);

    expect(judgment).toEqual({ risk_level: 0, suggestions: [], narrative: 'No issues found.', model: 'gpt-4o-mini' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('posts a JSON-mode chat completion and validates the judgment', async () => {
    const { judge, fetchMock } = openAIJudge(
      completion('{"risk_level":4,"suggestions":["upgrade lodash"],"narrative":"One exploitable dependency."}'),
    );

    const judgment = await judge.assess('security_scan', withIssues, context, signal);

    expect(judgment).toEqual({
      risk_level: 4,
      suggestions: ['upgrade lodash'],
      narrative: 'One exploitable dependency.',
      model: 'gpt-4o-mini',
    });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://llm.example.test/v1/chat/completions');
    expect(init?.headers).toEqual({ Authorization: 'Bearer test-secret', 'Content-Type': 'application/json' });
    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({ model: 'gpt-4o-mini', temperature: 0.2, response_format: { type: 'json_object' } });
  });

  it('extracts the JSON object from surrounding prose', async () => {
    const { judge } = openAIJudge(completion('Here is my review: {"risk_level": 2} Thanks!'));

    const judgment = await judge.assess('testing', findings('testing', { passed: false }), context, signal);

    expect(judgment).toEqual({ risk_level: 2, suggestions: [], narrative: '', model: 'gpt-4o-mini' });
  });

  it('reports HTTP errors as an unavailable judge', async () => {
    const { judge } = openAIJudge(reply(503, 'overloaded'));
    await expect(judge.assess('security_scan', withIssues, context, signal)).rejects.toThrow(
      'Judge API error 503: overloaded',
    );
  });

  it('reports network failures as an unavailable judge', async () => {
    const { judge } = openAIJudge(new Error('connect ECONNREFUSED'));
    const assessing = judge.assess('security_scan', withIssues, context, signal);
    await expect(assessing).rejects.toBeInstanceOf(JudgeUnavailableError);
    await expect(assessing).rejects.toThrow('Judge request failed: connect ECONNREFUSED');
  });

  it('rejects replies without a usable judgment', async () => {
    await expect(openAIJudge(completion(null)).judge.assess('custom', withIssues, context, signal)).rejects.toThrow(
      'Judge response had no content',
    );
    await expect(openAIJudge(completion('no idea')).judge.assess('custom', withIssues, context, signal)).rejects.toThrow(
      'Judge response contained no JSON object',
    );
    await expect(
      openAIJudge(completion('{"risk_level": 7}')).judge.assess('custom', withIssues, context, signal),
    ).rejects.toThrow(/^Judge response did not match the judgment schema at risk_level: /);
  });

  it('returns the trimmed summary text', async () => {
    const { judge, fetchMock } = openAIJudge(completion('  Ship it after upgrading lodash.\n'));

    await expect(judge.summarize([stageResult('deps', 1)], risk, signal)).resolves.toBe('Ship it after upgrading lodash.');
    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0]?.[1].body));
    expect(body).not.toHaveProperty('response_format');
  });

  it('finds the outermost braces', () => {
    expect(extractJson('x {"a":{"b":1}} y')).toBe('{"a":{"b":1}}');
    expect(extractJson('} nothing {')).toBeNull();
  });
});

describe('buildAssessPrompt', () => {
  const changed: PipelineContext = { ...context, changedFiles: ['src/cart.ts', 'src/cart.test.ts'] };

  it('lists the changed files for the testing stage', () => {
    const lines = buildAssessPrompt('testing', findings('testing'), changed).split('\n');

    expect(lines[1]).toBe('Repository: https://example.test/repo.git (branch main, commit abc123)');
    expect(lines[2]).toBe('Earlier stages: none');
    expect(lines[3]).toBe('Changed files (2): src/cart.ts, src/cart.test.ts');
    expect(lines[4]).toBe('Findings (JSON):');
  });

  it('says when the changes are unknown', () => {
    expect(buildAssessPrompt('testing', findings('testing'), context).split('\n')[3]).toBe('Changed files: unknown');
  });

  it('leaves the change list out of other stages', () => {
    expect(buildAssessPrompt('security_scan', findings('security_scan'), changed).split('\n')[3]).toBe('Findings (JSON):');
  });
});
