import { join } from 'node:path';
import type { StagegatePaths } from './types.js';

export function getStagegatePaths(cwd: string = process.cwd()): StagegatePaths {
  const root = join(cwd, '.stagegate');
  return {
    root,
    pipeline: join(root, 'pipeline.yaml'),
    stateDb: join(root, 'state.db'),
    env: join(root, 'env.json'),
    buildsDir: join(root, 'builds'),
  };
}
