import { EndpointInfo, Logger, RunPodSettings } from '../types/index.js';
import { silentLogger } from '../logger.js';
import { RunPodClient } from './runpod-client.js';

export const RUNPOD_ENDPOINT_BASE_URL = 'https://api.runpod.ai/v2';

export const ENDPOINT_DEFAULTS = {
  workersMin: 0,
  idleTimeout: 5,
  executionTimeout: 300,
  gpuUtilization: 90
} as const;

export function endpointUrl(endpointId: string): string {
  return `${RUNPOD_ENDPOINT_BASE_URL}/${endpointId}`;
}

/**
 * Environment the worker container starts with.
 */
export function containerEnvironment(settings: RunPodSettings): Record<string, string> {
  const env: Record<string, string> = {
    MODEL_CHECKPOINT: settings.modelCheckpoint,
    MAX_OUTPUT_TOKENS: String(settings.maxOutputTokens),
    TORCH_DEVICE: 'cuda'
  };
  if (settings.hfToken) {
    env.HF_TOKEN = settings.hfToken;
  }
  return env;
}

export interface EndpointManagerOptions {
  logger?: Logger;
  /** Clock used for template names; defaults to Date.now */
  now?: () => number;
}

/**
 * Creates the serverless endpoint, or points an existing endpoint with the
 * same name at a freshly saved template.
 */
export class EndpointManager {
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly client: RunPodClient, options: EndpointManagerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  async deploy(settings: RunPodSettings): Promise<EndpointInfo> {
    const existing = await this.client.findEndpointByName(settings.endpointName);

    if (existing) {
      this.logger.warn(`Endpoint '${settings.endpointName}' already exists (ID: ${existing.id})`);
      this.logger.info('Updating existing endpoint...');

      const templateName = `${settings.endpointName}-template-${Math.floor(this.now() / 1000)}`;
      const templateId = await this.saveTemplate(templateName, settings);

      await this.client.updateEndpoint({
        id: existing.id,
        templateId,
        workersMax: settings.workersMax
      });
      this.logger.success(`Updated endpoint: ${existing.id}`);

      return {
        id: existing.id,
        name: settings.endpointName,
        url: endpointUrl(existing.id),
        status: 'updated'
      };
    }

    this.logger.info(`Creating new endpoint '${settings.endpointName}'...`);
    const templateId = await this.saveTemplate(`${settings.endpointName}-template`, settings);

    const endpoint = await this.client.createEndpoint({
      name: settings.endpointName,
      templateId,
      gpuIds: settings.gpuIds,
      workersMax: settings.workersMax,
      ...ENDPOINT_DEFAULTS
    });
    this.logger.success(`Created endpoint: ${endpoint.name}`);
    this.logger.detail(`  Endpoint ID: ${endpoint.id}`);

    return {
      id: endpoint.id,
      name: settings.endpointName,
      url: endpointUrl(endpoint.id),
      status: 'created'
    };
  }

  private async saveTemplate(name: string, settings: RunPodSettings): Promise<string> {
    const templateId = await this.client.saveTemplate({
      name,
      imageName: settings.dockerImage,
      containerDiskInGb: settings.containerDiskGb,
      volumeInGb: settings.volumeGb,
      env: containerEnvironment(settings)
    });
    this.logger.success(`Created template: ${name} (ID: ${templateId})`);
    return templateId;
  }
}
