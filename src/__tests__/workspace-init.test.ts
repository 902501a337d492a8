import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { initWorkspace } from '../workspace/init.js';
import { closeDb } from '../workspace/db.js';
import { DEFAULT_PIPELINE, readPipelineFile } from '../workspace/config.js';

describe('initWorkspace', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'stagegate-init-'));
  });

  afterEach(() => {
    closeDb();
    rmSync(cwd, { recursive: true, force: true });
  });

  it('creates the pipeline file, build directory and history database', () => {
    const paths = initWorkspace({ cwd });

    expect(existsSync(paths.pipeline)).toBe(true);
    expect(existsSync(paths.buildsDir)).toBe(true);
    expect(existsSync(paths.stateDb)).toBe(true);
    expect(readPipelineFile(paths.pipeline)).toEqual(DEFAULT_PIPELINE);
  });

  it('refuses to overwrite an existing workspace without force', () => {
    const paths = initWorkspace({ cwd });
    writeFileSync(paths.pipeline, 'stages: []\n');

    expect(() => initWorkspace({ cwd })).toThrow(`Workspace already exists at ${paths.root}. Use --force to reinitialize.`);

    initWorkspace({ cwd, force: true });
    expect(readPipelineFile(paths.pipeline).stages).toHaveLength(4);
  });
});
