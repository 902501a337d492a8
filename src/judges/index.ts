import type { AIJudge } from '../pipeline/types.js';
import type { JudgeSpec } from '../shared/schemas.js';
import { ConfigurationError } from '../shared/errors.js';
import { DisabledJudge } from './disabled.js';
import { HeuristicJudge } from './heuristic.js';
import { OpenAIJudge } from './openai.js';

export { DisabledJudge } from './disabled.js';
export { HeuristicJudge } from './heuristic.js';
export { OpenAIJudge } from './openai.js';

export function createJudge(spec: JudgeSpec, env: NodeJS.ProcessEnv = process.env): AIJudge {
  switch (spec.provider) {
    case 'heuristic':
      return new HeuristicJudge();
    case 'none':
      return new DisabledJudge();
    case 'openai': {
      const apiKey = env['LLM_API_KEY'] ?? env['OPENAI_API_KEY'];
      if (!apiKey) {
        throw new ConfigurationError(
          'the openai judge needs an API key: set LLM_API_KEY or add llm.api_key to .stagegate/env.json',
          'judge.provider',
        );
      }
      return new OpenAIJudge({
        apiKey,
        apiBase: spec.api_base ?? env['LLM_API_BASE'],
        model: spec.model ?? env['LLM_MODEL'],
      });
    }
  }
}
