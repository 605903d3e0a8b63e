import { DeploySettings, Logger } from '../types/index.js';
import { DeploymentFailure, describeError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { findExecutable } from './executable.js';
import { ProcessOutcome, ProcessRunner, SpawnProcessRunner } from './process-runner.js';

export interface PreflightOptions {
  runner?: ProcessRunner;
  logger?: Logger;
  /** PATH value searched for the runtime */
  pathEnv?: string;
  /** Environment handed to the installer */
  env?: Record<string, string>;
}

/**
 * Verifies the runtime is installed and installs the package the deployment
 * program needs.
 */
export class Preflight {
  private readonly runner: ProcessRunner;
  private readonly logger: Logger;

  constructor(private readonly settings: DeploySettings, private readonly options: PreflightOptions = {}) {
    this.runner = options.runner ?? new SpawnProcessRunner();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * @returns Resolved path of the runtime executable
   * @throws DeploymentFailure RUNTIME_MISSING
   */
  checkRuntime(): string {
    const location = findExecutable(this.settings.runtime, this.options.pathEnv ?? process.env.PATH);
    if (!location) {
      throw new DeploymentFailure('RUNTIME_MISSING', `${this.settings.runtime} is not installed`, {
        remediation: `Install ${this.settings.runtime} and make sure it is on your PATH`
      });
    }
    this.logger.detail(`Found ${this.settings.runtime} at ${location}`);
    return location;
  }

  /**
   * Runs `<installer> install -q <dependency>`.
   * @throws DeploymentFailure DEPENDENCY_INSTALL_FAILED on a non-zero exit or spawn error
   */
  async installDependency(): Promise<void> {
    const { installer, dependency } = this.settings;
    this.logger.info('Installing Python dependencies...');

    let outcome: ProcessOutcome;
    try {
      outcome = await this.runner.run(installer, ['install', '-q', dependency], { env: this.options.env });
    } catch (error) {
      throw new DeploymentFailure('DEPENDENCY_INSTALL_FAILED', `Could not run ${installer}: ${describeError(error)}`, {
        cause: error,
        remediation: `Make sure ${installer} is installed and on your PATH`
      });
    }

    if (outcome.code !== 0) {
      const status = outcome.code === null ? `signal ${outcome.signal}` : `exit code ${outcome.code}`;
      throw new DeploymentFailure('DEPENDENCY_INSTALL_FAILED', `${installer} install ${dependency} failed with ${status}`, {
        remediation: `Try running "${installer} install ${dependency}" manually`
      });
    }

    this.logger.success('Dependencies installed');
  }
}
