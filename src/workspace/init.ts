import { existsSync, mkdirSync } from 'node:fs';
import { getStagegatePaths } from './paths.js';
import { openDb } from './db.js';
import { DEFAULT_PIPELINE, writePipelineFile } from './config.js';
import type { StagegatePaths } from './types.js';

export interface InitOptions {
  cwd?: string;
  force?: boolean;
}

export function initWorkspace(opts: InitOptions = {}): StagegatePaths {
  const paths = getStagegatePaths(opts.cwd);

  if (existsSync(paths.pipeline) && !opts.force) {
    throw new Error(`Workspace already exists at ${paths.root}. Use --force to reinitialize.`);
  }

  for (const dir of [paths.root, paths.buildsDir]) {
    mkdirSync(dir, { recursive: true });
  }

  writePipelineFile(paths.pipeline, DEFAULT_PIPELINE);
  openDb(paths.stateDb);

  return paths;
}
