import { v4 as uuidv4 } from 'uuid';
import {
  ConfigurationRecord,
  DeploySettings,
  DeploymentError,
  DeploymentMetadata,
  DeploymentErrorCode,
  DeploymentResult,
  Logger
} from '../types/index.js';
import { DeploymentFailure, describeError, isDeploymentFailure } from '../errors.js';
import { silentLogger } from '../logger.js';
import { ConfigLoader, EnvironmentTable } from '../config/types.js';
import { DEFAULT_ENV_FILE, EnvConfigLoader, buildChildEnvironment, exportToEnvironment } from '../config/loader.js';
import { Preflight } from '../preflight/preflight.js';
import { ProcessRunner } from '../preflight/process-runner.js';
import { DeploymentInvoker } from '../invocation/deployment-invoker.js';
import { DeployOptions } from './types.js';

export const DEFAULT_DEPLOY_SETTINGS: DeploySettings = {
  runtime: 'python3',
  installer: 'pip',
  dependency: 'requests',
  program: 'deploy_runpod.py'
};

type DeploymentPhase = 'load' | 'preflight' | 'install' | 'invoke';

// Code reported for an error that escapes a phase without a code of its own
const PHASE_ERROR_CODES: Record<DeploymentPhase, DeploymentErrorCode> = {
  load: 'CONFIGURATION_INVALID',
  preflight: 'RUNTIME_MISSING',
  install: 'DEPENDENCY_INSTALL_FAILED',
  invoke: 'DELEGATED_DEPLOYMENT_FAILED'
};

export interface OrchestratorDependencies {
  loader?: ConfigLoader;
  runner?: ProcessRunner;
  logger?: Logger;
  /** Environment table the configuration is exported into */
  env?: EnvironmentTable;
  /** PATH searched for the runtime; read from `env` when omitted */
  pathEnv?: string;
}

/**
 * Runs load → export → preflight → delegated deployment, stopping at the first
 * failure.
 */
export class DeploymentOrchestrator {
  private readonly loader: ConfigLoader;
  private readonly logger: Logger;
  private readonly env: EnvironmentTable;

  constructor(
    private readonly settings: DeploySettings = DEFAULT_DEPLOY_SETTINGS,
    private readonly deps: OrchestratorDependencies = {}
  ) {
    this.loader = deps.loader ?? new EnvConfigLoader();
    this.logger = deps.logger ?? silentLogger;
    this.env = deps.env ?? process.env;
  }

  async deploy(options: DeployOptions = {}): Promise<DeploymentResult> {
    const envFile = options.envFile ?? DEFAULT_ENV_FILE;
    const startTime = Date.now();

    const metadata: DeploymentMetadata = {
      deploymentId: uuidv4(),
      timestamp: new Date()
    };

    let phase: DeploymentPhase = 'load';

    try {
      // Step 1: Load configuration
      const record = await this.loadConfiguration(envFile);
      metadata.endpointName = record.RUNPOD_ENDPOINT_NAME;

      // Step 2: Preflight
      phase = 'preflight';
      const preflight = new Preflight(this.settings, {
        runner: this.deps.runner,
        logger: this.logger,
        pathEnv: this.deps.pathEnv ?? this.env.PATH,
        env: buildChildEnvironment(record, this.env)
      });
      preflight.checkRuntime();
      phase = 'install';
      await preflight.installDependency();
      this.logger.info('');

      // Step 3: Delegate
      phase = 'invoke';
      const invoker = new DeploymentInvoker(this.settings, {
        runner: this.deps.runner,
        logger: this.logger,
        baseEnv: this.env,
        cwd: options.cwd
      });
      await invoker.invoke(record);

      metadata.duration = Date.now() - startTime;

      return {
        success: true,
        exitCode: 0,
        metadata
      };
    } catch (error) {
      metadata.duration = Date.now() - startTime;

      return {
        success: false,
        exitCode: isDeploymentFailure(error) ? error.exitCode : 1,
        errors: [this.toDeploymentError(error, phase)],
        metadata
      };
    }
  }

  private async loadConfiguration(envFile: string): Promise<ConfigurationRecord> {
    this.logger.info(`Loading configuration from ${envFile}...`);
    const record = await this.loader.load(envFile);
    exportToEnvironment(record, this.env);
    this.logger.success('Configuration loaded');
    this.logger.info('');
    return record;
  }

  private toDeploymentError(error: unknown, phase: DeploymentPhase): DeploymentError {
    if (isDeploymentFailure(error)) {
      return error.toDeploymentError();
    }

    return new DeploymentFailure(PHASE_ERROR_CODES[phase], `Unexpected error during ${phase}: ${describeError(error)}`, {
      cause: error
    }).toDeploymentError();
  }
}

// Convenience function mirroring the one-shot shell workflow
export async function deploy(options: DeployOptions = {}): Promise<DeploymentResult> {
  const orchestrator = new DeploymentOrchestrator();
  return orchestrator.deploy(options);
}
