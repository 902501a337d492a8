import { existsSync, readFileSync } from 'node:fs';
import { getStagegatePaths } from './paths.js';
import { WorkspaceEnvSchema } from '../shared/schemas.js';
import { describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/**
 * Load judge credentials from .stagegate/env.json into the current process.
 * Variables already set in the environment win.
 */
export function loadWorkspaceEnv(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): void {
  const filePath = getStagegatePaths(cwd).env;
  if (!existsSync(filePath)) return;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (err) {
    logger.warn('Failed to read workspace env file', { path: filePath, error: describeError(err).message });
    return;
  }

  const parsed = WorkspaceEnvSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('Ignoring malformed workspace env file', { path: filePath });
    return;
  }

  const llm = parsed.data.llm ?? {};
  const pairs: Array<[string, string | undefined]> = [
    ['LLM_API_KEY', llm.api_key],
    ['LLM_API_BASE', llm.api_base],
    ['LLM_MODEL', llm.model],
  ];
  for (const [key, value] of pairs) {
    if (value && !env[key]) env[key] = value;
  }
}
