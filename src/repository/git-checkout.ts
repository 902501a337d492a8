import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describeError, FatalSetupError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { runProcess, tail, type SpawnFn } from '../executors/process.js';
import type { RepositoryProvider, RepositorySnapshot } from '../pipeline/types.js';

export interface GitCheckoutOptions {
  gitBin?: string;
  tmpDir?: string;
  /** Clone depth; 0 clones full history. At least 2 lets the latest commit be diffed against its parent. */
  depth?: number;
  spawn?: SpawnFn;
}

/**
 * Prepares a repository snapshot with a shallow `git clone` into a scratch directory.
 * Works for remote URLs and local paths alike.
 */
export class GitCheckout implements RepositoryProvider {
  constructor(private readonly opts: GitCheckoutOptions = {}) {}

  async prepare(repositoryRef: string, branch: string | undefined, signal: AbortSignal): Promise<RepositorySnapshot> {
    const dir = await mkdtemp(join(this.opts.tmpDir ?? tmpdir(), 'stagegate-repo-'));
    const cleanup = () => rm(dir, { recursive: true, force: true });

    try {
      const depth = this.opts.depth ?? 2;
      const args = ['clone', '--quiet'];
      if (depth > 0) args.push('--depth', String(depth));
      if (branch) args.push('--branch', branch);
      args.push('--', repositoryRef, dir);

      logger.info('Cloning repository', { repository: repositoryRef, branch: branch ?? '(default)' });
      await this.git(args, undefined, signal);

      const resolvedBranch = branch ?? (await this.git(['rev-parse', '--abbrev-ref', 'HEAD'], dir, signal));
      const commit = await this.git(['rev-parse', 'HEAD'], dir, signal);
      const changedFiles = await this.changedFiles(dir, signal);
      return { path: dir, branch: resolvedBranch, commit, changedFiles, cleanup };
    } catch (err) {
      await cleanup().catch((cleanupErr: unknown) =>
        logger.warn('Failed to remove scratch checkout', { path: dir, error: describeError(cleanupErr).message }),
      );
      throw err instanceof FatalSetupError ? err : new FatalSetupError(repositoryRef, describeError(err).message);
    }
  }

  /** Files touched by HEAD. A failure here only costs the judge some context. */
  private async changedFiles(dir: string, signal: AbortSignal): Promise<string[]> {
    try {
      const out = await this.git(['show', '--name-only', '--pretty=format:', 'HEAD'], dir, signal);
      return out
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
    } catch (err) {
      logger.warn('Could not list changed files', { path: dir, error: describeError(err).message });
      return [];
    }
  }

  private async git(args: string[], cwd: string | undefined, signal: AbortSignal): Promise<string> {
    const result = await runProcess(this.opts.gitBin ?? 'git', args, {
      cwd,
      signal,
      spawn: this.opts.spawn,
      env: { GIT_TERMINAL_PROMPT: '0' },
    });
    if (result.code !== 0) {
      throw new Error(`git ${args[0] ?? ''} exited with code ${result.code}: ${tail(result.stderr) || 'no output'}`);
    }
    return result.stdout.trim();
  }
}
