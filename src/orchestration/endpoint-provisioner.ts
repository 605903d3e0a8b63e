import { writeFile } from 'fs/promises';
import { EndpointInfo, Logger } from '../types/index.js';
import { DeploymentFailure, describeError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { ConfigLoader } from '../config/types.js';
import { DEFAULT_ENV_FILE, EnvConfigLoader } from '../config/loader.js';
import { resolveDeploymentSettings } from '../config/validator.js';
import { RunPodClient } from '../provisioning/runpod-client.js';
import { EndpointManager } from '../provisioning/endpoint-manager.js';
import { FetchFunction } from '../provisioning/types.js';

export const ENDPOINT_INFO_FILE = 'runpod_endpoint_info.json';

export interface ProvisionOptions {
  envFile?: string;
  /** Where the endpoint info JSON is written; skipped when false */
  output?: string | false;
}

export interface ProvisionerDependencies {
  loader?: ConfigLoader;
  logger?: Logger;
  fetch?: FetchFunction;
  now?: () => number;
}

/**
 * Provisions the endpoint through the RunPod API without the external
 * deployment program.
 */
export class EndpointProvisioner {
  private readonly loader: ConfigLoader;
  private readonly logger: Logger;

  constructor(private readonly deps: ProvisionerDependencies = {}) {
    this.loader = deps.loader ?? new EnvConfigLoader();
    this.logger = deps.logger ?? silentLogger;
  }

  async provision(options: ProvisionOptions = {}): Promise<EndpointInfo> {
    const record = await this.loader.load(options.envFile ?? DEFAULT_ENV_FILE);
    const settings = resolveDeploymentSettings(record);

    this.logger.step('Deployment Configuration:');
    this.logger.info(`  Endpoint Name: ${settings.endpointName}`);
    this.logger.info(`  Docker Image: ${settings.dockerImage}`);
    this.logger.info(`  GPU Type: ${settings.gpuIds}`);
    this.logger.info(`  Max Workers: ${settings.workersMax}`);
    this.logger.info(`  Container Disk: ${settings.containerDiskGb} GB`);
    this.logger.info(`  Volume: ${settings.volumeGb} GB`);

    const client = new RunPodClient(settings.apiKey, this.deps.fetch);
    const manager = new EndpointManager(client, { logger: this.logger, now: this.deps.now });
    const info = await manager.deploy(settings);

    const output = options.output ?? ENDPOINT_INFO_FILE;
    if (output !== false) {
      try {
        await writeFile(output, `${JSON.stringify(info, null, 2)}\n`, 'utf-8');
      } catch (error) {
        throw new DeploymentFailure('PROVISIONING_FAILED', `Endpoint ${info.id} is live but ${output} could not be written: ${describeError(error)}`, {
          cause: error
        });
      }
    }

    return info;
  }
}
