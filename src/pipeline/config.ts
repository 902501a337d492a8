import { ConfigurationError } from '../shared/errors.js';
import { assertValidThreshold } from './risk.js';
import { MAX_TIMEOUT_MS, type PipelineConfig, type StageConfig } from './types.js';

/**
 * Group stages into execution batches. Adjacent stages that share a
 * `parallel_group` form one batch; every other stage runs alone.
 */
export function planBatches(stages: readonly StageConfig[]): StageConfig[][] {
  const batches: StageConfig[][] = [];
  for (const stage of stages) {
    const last = batches[batches.length - 1];
    const lastGroup = last?.[0]?.parallel_group;
    if (last && stage.parallel_group !== undefined && lastGroup === stage.parallel_group) {
      last.push(stage);
    } else {
      batches.push([stage]);
    }
  }
  return batches;
}

function assertValidTimeout(value: number, path: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`must be a positive integer, got ${value}`, path);
  }
  if (value > MAX_TIMEOUT_MS) {
    throw new ConfigurationError(`must be at most ${MAX_TIMEOUT_MS}, got ${value}`, path);
  }
}

/**
 * Reject a configuration the orchestrator cannot run. Called before any work starts.
 */
export function validatePipelineConfig(config: PipelineConfig): void {
  assertValidThreshold(config.risk_threshold);

  if (config.stages.length === 0) {
    throw new ConfigurationError('at least one stage is required', 'stages');
  }

  for (const [key, value] of Object.entries(config.timeouts)) {
    assertValidTimeout(value, `timeouts.${key}`);
  }

  const seen = new Set<string>();
  const closedGroups = new Set<string>();
  let openGroup: string | undefined;

  config.stages.forEach((stage, i) => {
    const path = `stages.${i}`;
    if (!stage.name) throw new ConfigurationError('stage name is required', `${path}.name`);
    if (seen.has(stage.name)) {
      throw new ConfigurationError(`duplicate stage name "${stage.name}"`, `${path}.name`);
    }
    seen.add(stage.name);

    if (stage.timeout_ms !== undefined) assertValidTimeout(stage.timeout_ms, `${path}.timeout_ms`);
    if (stage.weight !== undefined && !(stage.weight > 0)) {
      throw new ConfigurationError(`must be positive, got ${stage.weight}`, `${path}.weight`);
    }

    const group = stage.parallel_group;
    if (group !== openGroup && openGroup !== undefined) closedGroups.add(openGroup);
    if (group !== undefined && closedGroups.has(group)) {
      throw new ConfigurationError(
        `parallel group "${group}" must list its stages next to each other`,
        `${path}.parallel_group`,
      );
    }
    openGroup = group;
  });
}

export function stageWeights(config: PipelineConfig): Record<string, number> {
  const weights: Record<string, number> = {};
  for (const stage of config.stages) {
    if (stage.weight !== undefined) weights[stage.name] = stage.weight;
  }
  return weights;
}
