/**
 * Judge backed by an OpenAI-compatible chat completion endpoint.
 *
 * Configuration (pipeline.yaml `judge:` block, then env vars):
 *   api_base / LLM_API_BASE   default https://api.openai.com/v1
 *   model    / LLM_MODEL      default gpt-4o-mini
 *   LLM_API_KEY or OPENAI_API_KEY
 */
import { describeError, JudgeUnavailableError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { JudgmentSchema } from '../shared/schemas.js';
import type {
  AIJudge,
  Judgment,
  PipelineContext,
  RawFindings,
  RiskAssessment,
  StageResult,
  StageType,
} from '../pipeline/types.js';
import { buildAssessPrompt, buildSummaryPrompt, JUDGE_SYSTEM_PROMPT, SUMMARY_SYSTEM_PROMPT } from './prompts.js';

export interface OpenAIJudgeOptions {
  apiKey: string;
  apiBase?: string;
  model?: string;
  fetch?: typeof fetch;
}

interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

interface OpenAIResponse {
  model?: string;
  choices?: Array<{ message?: { content?: string | null } }>;
}

// Stages whose clean result needs no model call.
const SHORT_CIRCUIT_STAGES: ReadonlySet<StageType> = new Set<StageType>(['code_analysis', 'security_scan']);

export function extractJson(raw: string): string | null {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start === -1 || end === -1 || end <= start) return null;
  return raw.slice(start, end + 1);
}

export class OpenAIJudge implements AIJudge {
  private readonly apiBase: string;
  private readonly model: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: OpenAIJudgeOptions) {
    this.apiBase = (opts.apiBase ?? 'https://api.openai.com/v1').replace(/\/+$/, '');
    this.model = opts.model ?? 'gpt-4o-mini';
    this.fetchImpl = opts.fetch ?? fetch;
  }

  async assess(
    stageType: StageType,
    findings: RawFindings,
    context: PipelineContext,
    signal: AbortSignal,
  ): Promise<Judgment> {
    if (SHORT_CIRCUIT_STAGES.has(stageType) && findings.issue_count === 0 && findings.passed !== false) {
      return { risk_level: 0, suggestions: [], narrative: 'No issues found.', model: this.model };
    }

    const content = await this.complete(
      [
        { role: 'system', content: JUDGE_SYSTEM_PROMPT },
        { role: 'user', content: buildAssessPrompt(stageType, findings, context) },
      ],
      signal,
      true,
    );

    const jsonText = extractJson(content);
    if (!jsonText) throw new JudgeUnavailableError('Judge response contained no JSON object');

    let raw: unknown;
    try {
      raw = JSON.parse(jsonText);
    } catch (err) {
      throw new JudgeUnavailableError(`Judge returned invalid JSON: ${describeError(err).message}`);
    }

    const parsed = JudgmentSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new JudgeUnavailableError(
        `Judge response did not match the judgment schema at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'invalid'}`,
      );
    }
    return { ...parsed.data, model: this.model };
  }

  async summarize(results: readonly StageResult[], risk: RiskAssessment, signal: AbortSignal): Promise<string> {
    const content = await this.complete(
      [
        { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
        { role: 'user', content: buildSummaryPrompt(results, risk) },
      ],
      signal,
      false,
    );
    return content.trim();
  }

  private async complete(messages: ChatMessage[], signal: AbortSignal, json: boolean): Promise<string> {
    logger.debug('Calling judge model', { model: this.model, prompt_chars: messages.reduce((n, m) => n + m.content.length, 0) });

    let resp: Response;
    try {
      resp = await this.fetchImpl(`${this.apiBase}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.opts.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          temperature: 0.2,
          ...(json ? { response_format: { type: 'json_object' } } : {}),
        }),
        signal,
      });
    } catch (err) {
      throw new JudgeUnavailableError(`Judge request failed: ${describeError(err).message}`);
    }

    if (!resp.ok) {
      const body = await resp.text();
      throw new JudgeUnavailableError(`Judge API error ${resp.status}: ${body.slice(0, 200)}`);
    }

    const data = (await resp.json()) as OpenAIResponse;
    const content = data.choices?.[0]?.message?.content;
    if (!content) throw new JudgeUnavailableError('Judge response had no content');
    return content;
  }
}
