import { JudgeUnavailableError } from '../shared/errors.js';
import type { AIJudge, Judgment, RiskAssessment, StageResult } from '../pipeline/types.js';

/** Stands in when AI enrichment is switched off: every call is unavailable. */
export class DisabledJudge implements AIJudge {
  async assess(): Promise<Judgment> {
    throw new JudgeUnavailableError('AI judge is disabled');
  }

  async summarize(_results: readonly StageResult[], _risk: RiskAssessment): Promise<string> {
    throw new JudgeUnavailableError('AI judge is disabled');
  }
}
