export * from './pipeline/types.js';
export { runPipeline, type OrchestratorDeps, type RunOptions } from './pipeline/orchestrator.js';
export { runStage, type StageRunOptions } from './pipeline/stage-runner.js';
export { computeRiskAssessment, gateDecision, type RiskPolicy } from './pipeline/risk.js';
export { STAGE_SCORERS } from './pipeline/scorers.js';
export { templateSummary } from './pipeline/summary.js';
export { planBatches, validatePipelineConfig } from './pipeline/config.js';
export { BuildRecordBuilder } from './pipeline/build-record.js';
export {
  ConfigurationError,
  FatalSetupError,
  JudgeUnavailableError,
  PersistenceError,
  StageExecutionError,
  StagegateError,
  TimeoutError,
} from './shared/errors.js';
export { createJudge, DisabledJudge, HeuristicJudge, OpenAIJudge } from './judges/index.js';
export { CommandStageExecutor } from './executors/command.js';
export { CommandDeployer } from './executors/command-deployer.js';
export { GitCheckout } from './repository/git-checkout.js';
export { JsonFileSink } from './store/json-file-sink.js';
export { SqliteBuildStore } from './store/sqlite-store.js';
export { parsePipelineFile, readPipelineFile, resolvePipelineConfig } from './workspace/config.js';
