import { ConfigurationRecord, DeploySettings, Logger } from '../types/index.js';
import { DeploymentFailure, describeError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { buildChildEnvironment } from '../config/loader.js';
import { EnvironmentTable } from '../config/types.js';
import { ProcessOutcome, ProcessRunner, SpawnProcessRunner } from '../preflight/process-runner.js';

export interface DeploymentInvokerOptions {
  runner?: ProcessRunner;
  logger?: Logger;
  /** Environment the record is overlaid on; `process.env` by default */
  baseEnv?: EnvironmentTable;
  cwd?: string;
}

/**
 * Runs the external deployment program once and turns a non-zero exit into a
 * failure carrying that exit code.
 */
export class DeploymentInvoker {
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;

  constructor(private readonly settings: DeploySettings, private readonly options: DeploymentInvokerOptions = {}) {
    this.runner = options.runner ?? new SpawnProcessRunner();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * @throws DeploymentFailure DELEGATED_DEPLOYMENT_FAILED with the program's exit code
   */
  async invoke(record: ConfigurationRecord): Promise<void> {
    const { runtime, program } = this.settings;
    const env = buildChildEnvironment(record, this.options.baseEnv ?? process.env);

    this.logger.info('Starting deployment...');

    let outcome: ProcessOutcome;
    try {
      outcome = await this.runner.run(runtime, [program], { env, cwd: this.options.cwd });
    } catch (error) {
      throw new DeploymentFailure('DELEGATED_DEPLOYMENT_FAILED', `Could not start ${program}: ${describeError(error)}`, {
        cause: error
      });
    }

    if (outcome.code === 0) {
      return;
    }

    if (outcome.code === null) {
      throw new DeploymentFailure('DELEGATED_DEPLOYMENT_FAILED', `${program} was terminated by signal ${outcome.signal}`);
    }

    throw new DeploymentFailure('DELEGATED_DEPLOYMENT_FAILED', `${program} exited with code ${outcome.code}`, {
      exitCode: outcome.code,
      remediation: 'Check the deployment output above for details'
    });
  }
}
