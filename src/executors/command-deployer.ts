import { StageExecutionError } from '../shared/errors.js';
import type { DeploySpec } from '../shared/schemas.js';
import type { BuildRecord, Deployer, DeploymentResult } from '../pipeline/types.js';
import { runProcess, tail, type SpawnFn } from './process.js';

/**
 * Runs the configured deploy command. The build id and risk level are exported
 * to the command's environment so deploy scripts can tag what they release.
 */
export class CommandDeployer implements Deployer {
  constructor(
    private readonly spec: DeploySpec,
    private readonly spawnImpl?: SpawnFn,
  ) {}

  async deploy(snapshotPath: string, record: Readonly<BuildRecord>, signal: AbortSignal): Promise<DeploymentResult> {
    const result = await runProcess(this.spec.command, this.spec.args, {
      cwd: snapshotPath,
      env: {
        STAGEGATE_BUILD_ID: record.build_id,
        STAGEGATE_ENVIRONMENT: this.spec.environment,
        STAGEGATE_RISK_LEVEL: String(record.risk_assessment?.level ?? ''),
      },
      signal,
      spawn: this.spawnImpl,
    });

    if (result.code !== 0) {
      throw new StageExecutionError(
        'deploy',
        `${this.spec.command} exited with code ${result.code}: ${tail(result.stderr) || tail(result.stdout) || 'no output'}`,
        result.code,
      );
    }

    return {
      status: 'deployed',
      environment: this.spec.environment,
      reason: null,
      output: { stdout: tail(result.stdout, 2000) },
    };
  }
}
