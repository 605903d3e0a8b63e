import { DeploymentFailure, describeError } from '../errors.js';
import {
  EndpointInput,
  EndpointUpdate,
  FetchFunction,
  ServerlessEndpoint,
  TemplateInput
} from './types.js';
import { JsonObject, asObject, optionalNumber, optionalString } from './json.js';

export const RUNPOD_GRAPHQL_URL = 'https://api.runpod.io/graphql';

const LIST_ENDPOINTS = `
  query {
    myself {
      serverlessEndpoints {
        id
        name
        templateId
        gpuIds
        workersMin
        workersMax
        idleTimeout
      }
    }
  }`;

const SAVE_TEMPLATE = `
  mutation SaveTemplateServerless($input: SaveTemplateInput!) {
    saveTemplateServerless(input: $input) {
      id
      name
    }
  }`;

const SAVE_ENDPOINT = `
  mutation SaveServerlessEndpoint($input: ServerlessEndpointInput!) {
    saveEndpoint(input: $input) {
      id
      name
      templateId
      gpuIds
    }
  }`;

function toEndpoint(value: unknown): ServerlessEndpoint | undefined {
  const obj = asObject(value);
  if (!obj || typeof obj.id !== 'string' || typeof obj.name !== 'string') {
    return undefined;
  }
  return {
    id: obj.id,
    name: obj.name,
    templateId: optionalString(obj.templateId),
    gpuIds: optionalString(obj.gpuIds),
    workersMin: optionalNumber(obj.workersMin),
    workersMax: optionalNumber(obj.workersMax),
    idleTimeout: optionalNumber(obj.idleTimeout)
  };
}

/**
 * Minimal client for the RunPod GraphQL API. The API key travels as a query
 * parameter.
 */
export class RunPodClient {
  private readonly fetchFn: FetchFunction;

  constructor(private readonly apiKey: string, fetchFn?: FetchFunction) {
    this.fetchFn = fetchFn ?? ((input, init) => fetch(input, init));
  }

  async listEndpoints(): Promise<ServerlessEndpoint[]> {
    const data = await this.query(LIST_ENDPOINTS);
    const endpoints = asObject(data.myself)?.serverlessEndpoints;
    if (!Array.isArray(endpoints)) {
      return [];
    }
    return endpoints
      .map(toEndpoint)
      .filter((endpoint): endpoint is ServerlessEndpoint => endpoint !== undefined);
  }

  async findEndpointByName(name: string): Promise<ServerlessEndpoint | undefined> {
    const endpoints = await this.listEndpoints();
    return endpoints.find(endpoint => endpoint.name === name);
  }

  /**
   * @returns ID of the saved template
   */
  async saveTemplate(input: TemplateInput): Promise<string> {
    const data = await this.query(SAVE_TEMPLATE, {
      input: {
        name: input.name,
        imageName: input.imageName,
        dockerArgs: input.dockerArgs ?? '',
        containerDiskInGb: input.containerDiskInGb,
        volumeInGb: input.volumeInGb,
        env: Object.entries(input.env).map(([key, value]) => ({ key, value })),
        isServerless: true
      }
    });

    const templateId = asObject(data.saveTemplateServerless)?.id;
    if (typeof templateId !== 'string' || templateId === '') {
      throw new DeploymentFailure('PROVISIONING_FAILED', `Failed to create template ${input.name}`, {
        cause: data
      });
    }
    return templateId;
  }

  async createEndpoint(input: EndpointInput): Promise<ServerlessEndpoint> {
    const data = await this.query(SAVE_ENDPOINT, {
      input: {
        ...input,
        scalerType: 'QUEUE_DELAY',
        scalerValue: 4
      }
    });

    const endpoint = toEndpoint(data.saveEndpoint);
    if (!endpoint) {
      throw new DeploymentFailure('PROVISIONING_FAILED', `Failed to create endpoint ${input.name}`, {
        cause: data
      });
    }
    return endpoint;
  }

  async updateEndpoint(update: EndpointUpdate): Promise<void> {
    const data = await this.query(SAVE_ENDPOINT, { input: update });
    if (!asObject(data.saveEndpoint)) {
      throw new DeploymentFailure('PROVISIONING_FAILED', `Failed to update endpoint ${update.id}`, {
        cause: data
      });
    }
  }

  private async query(query: string, variables?: JsonObject): Promise<JsonObject> {
    const url = `${RUNPOD_GRAPHQL_URL}?api_key=${encodeURIComponent(this.apiKey)}`;
    const payload: JsonObject = variables ? { query, variables } : { query };

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload)
      });
    } catch (error) {
      throw new DeploymentFailure('PROVISIONING_FAILED', `RunPod API request failed: ${describeError(error)}`, {
        cause: error,
        remediation: 'Check your network connection and try again'
      });
    }

    if (!response.ok) {
      throw new DeploymentFailure('PROVISIONING_FAILED', `RunPod API returned ${response.status} ${response.statusText}`, {
        remediation: response.status === 401 || response.status === 403
          ? 'Check that RUNPOD_API_KEY is valid'
          : undefined
      });
    }

    let parsed: unknown;
    try {
      parsed = await response.json();
    } catch (error) {
      throw new DeploymentFailure('PROVISIONING_FAILED', `RunPod API returned a non-JSON response: ${describeError(error)}`, {
        cause: error
      });
    }

    const body = asObject(parsed);
    const errors = body?.errors;
    if (Array.isArray(errors) && errors.length > 0) {
      const messages = errors.map(error => optionalString(asObject(error)?.message) ?? 'unknown error');
      throw new DeploymentFailure('PROVISIONING_FAILED', `RunPod API error: ${messages.join('; ')}`, {
        cause: errors
      });
    }

    return asObject(body?.data) ?? {};
  }
}
