import { spawn, type ChildProcessWithoutNullStreams, type SpawnOptionsWithoutStdio } from 'node:child_process';
import { logger } from '../shared/logger.js';

export type SpawnFn = typeof spawn;

export interface ProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export interface RunProcessOptions {
  cwd?: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
  spawn?: SpawnFn;
}

/**
 * Spawn a command and collect its output. Resolves with the exit code whatever it is;
 * rejects only when the process cannot be started or the signal aborts it.
 */
export function runProcess(command: string, args: readonly string[], opts: RunProcessOptions = {}): Promise<ProcessResult> {
  const spawnImpl = opts.spawn ?? spawn;

  return new Promise((resolve, reject) => {
    if (opts.signal?.aborted) {
      reject(opts.signal.reason ?? new Error(`${command} aborted before start`));
      return;
    }

    const spawnOpts: SpawnOptionsWithoutStdio = {
      cwd: opts.cwd,
      env: { ...process.env, ...opts.env },
      stdio: 'pipe',
    };
    const child: ChildProcessWithoutNullStreams = spawnImpl(command, [...args], spawnOpts);

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let settled = false;

    const onAbort = () => {
      logger.debug('Killing aborted process', { command });
      child.kill('SIGTERM');
      if (!settled) {
        settled = true;
        reject(opts.signal?.reason ?? new Error(`${command} aborted`));
      }
    };
    opts.signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout.on('data', (chunk) => stdoutChunks.push(Buffer.from(chunk)));
    child.stderr.on('data', (chunk) => stderrChunks.push(Buffer.from(chunk)));

    child.on('error', (err) => {
      opts.signal?.removeEventListener('abort', onAbort);
      if (settled) return;
      settled = true;
      reject(err);
    });

    child.on('close', (code: number | null) => {
      opts.signal?.removeEventListener('abort', onAbort);
      if (settled) return;
      settled = true;
      resolve({
        code,
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
      });
    });

    child.stdin.end();
  });
}

/** Trimmed tail of tool output, for error messages. */
export function tail(text: string, max = 300): string {
  const trimmed = text.trim();
  return trimmed.length > max ? `...${trimmed.slice(-max)}` : trimmed;
}
