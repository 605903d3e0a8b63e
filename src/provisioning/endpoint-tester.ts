import { setTimeout as delay } from 'timers/promises';
import { Logger } from '../types/index.js';
import { DeploymentFailure, describeError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { endpointUrl } from './endpoint-manager.js';
import { JsonObject, asObject, optionalNumber, optionalString } from './json.js';
import { EndpointTestReport, FetchFunction, OcrPageSummary, OcrRequest } from './types.js';

export const RUNSYNC_TIMEOUT_MS = 300_000;
export const STATUS_POLL_INTERVAL_MS = 2_000;

const PENDING_STATUSES = new Set(['IN_QUEUE', 'IN_PROGRESS']);

const TROUBLESHOOTING = [
  'Troubleshooting:',
  '1. Check that the endpoint ID is correct',
  '2. Verify that RUNPOD_API_KEY is valid',
  '3. Make sure the endpoint is running (RunPod console)',
  '4. Check the endpoint logs for details'
].join('\n');

export interface EndpointTesterOptions {
  fetch?: FetchFunction;
  logger?: Logger;
  /** Overall budget for the job, queueing included */
  timeoutMs?: number;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Sends one OCR job to a deployed endpoint through `/runsync` and waits for
 * the result, following up on `/status/<job>` while the job is still queued.
 */
export class EndpointTester {
  private readonly fetchFn: FetchFunction;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly apiKey: string, options: EndpointTesterOptions = {}) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
    this.timeoutMs = options.timeoutMs ?? RUNSYNC_TIMEOUT_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? STATUS_POLL_INTERVAL_MS;
    this.sleep = options.sleep ?? (ms => delay(ms));
  }

  /**
   * @throws DeploymentFailure ENDPOINT_TEST_FAILED when the request fails, the
   *   job does not complete in time, or the handler reports an error
   */
  async runSync(endpointId: string, request: OcrRequest): Promise<EndpointTestReport> {
    const baseUrl = endpointUrl(endpointId);
    const deadline = Date.now() + this.timeoutMs;

    let job = await this.send(`${baseUrl}/runsync`, deadline, {
      method: 'POST',
      headers: { ...this.authorization(), 'Content-Type': 'application/json' },
      body: JSON.stringify({
        input: {
          image: request.image,
          max_output_tokens: request.maxOutputTokens,
          include_images: request.includeImages,
          include_headers_footers: request.includeHeadersFooters
        }
      })
    });

    const jobId = optionalString(job.id) ?? '';
    let status = optionalString(job.status);

    while (status !== undefined && PENDING_STATUSES.has(status)) {
      if (jobId === '') {
        throw new DeploymentFailure('ENDPOINT_TEST_FAILED', `Endpoint accepted the job (${status}) without returning a job ID`);
      }
      if (Date.now() + this.pollIntervalMs > deadline) {
        throw this.timeoutFailure();
      }
      this.logger.detail(`Job ${jobId} is ${status}, waiting...`);
      await this.sleep(this.pollIntervalMs);
      job = await this.send(`${baseUrl}/status/${jobId}`, deadline, {
        method: 'GET',
        headers: this.authorization()
      });
      status = optionalString(job.status);
    }

    if (status !== 'COMPLETED') {
      const reason = optionalString(job.error) ?? `job ended with status ${status ?? 'unknown'}`;
      throw new DeploymentFailure('ENDPOINT_TEST_FAILED', `Endpoint job ${jobId} failed: ${reason}`, {
        cause: job,
        remediation: TROUBLESHOOTING
      });
    }

    return { endpointId, jobId, ...summarizeOutput(job.output) };
  }

  private authorization(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiKey}` };
  }

  private timeoutFailure(cause?: unknown): DeploymentFailure {
    return new DeploymentFailure('ENDPOINT_TEST_FAILED', `Endpoint did not finish within ${this.timeoutMs / 1000}s`, {
      cause,
      remediation: 'The first request after a cold start can take a while; try again once a worker is up'
    });
  }

  private async send(url: string, deadline: number, init: RequestInit): Promise<JsonObject> {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      throw this.timeoutFailure();
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, { ...init, signal: AbortSignal.timeout(remaining) });
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        throw this.timeoutFailure(error);
      }
      throw new DeploymentFailure('ENDPOINT_TEST_FAILED', `Endpoint request failed: ${describeError(error)}`, {
        cause: error,
        remediation: TROUBLESHOOTING
      });
    }

    if (!response.ok) {
      throw new DeploymentFailure('ENDPOINT_TEST_FAILED', `Endpoint returned ${response.status} ${response.statusText}`, {
        remediation: response.status === 401 || response.status === 403
          ? 'Check that RUNPOD_API_KEY is valid'
          : response.status === 404
            ? 'Check that the endpoint ID is correct'
            : TROUBLESHOOTING
      });
    }

    let parsed: unknown;
    try {
      parsed = await response.json();
    } catch (error) {
      throw new DeploymentFailure('ENDPOINT_TEST_FAILED', `Endpoint returned a non-JSON response: ${describeError(error)}`, {
        cause: error
      });
    }

    const body = asObject(parsed);
    if (!body) {
      throw new DeploymentFailure('ENDPOINT_TEST_FAILED', 'Endpoint returned an unexpected response', { cause: parsed });
    }
    return body;
  }
}

function summarizeOutput(output: unknown): Pick<EndpointTestReport, 'pages' | 'totalTokens'> {
  const body = asObject(output);

  if (body && body.error !== undefined) {
    const reason = optionalString(body.error) ?? JSON.stringify(body.error);
    throw new DeploymentFailure('ENDPOINT_TEST_FAILED', `Endpoint handler returned an error: ${reason}`, {
      cause: body
    });
  }

  if (!body || !Array.isArray(body.results)) {
    throw new DeploymentFailure('ENDPOINT_TEST_FAILED', 'Unexpected result format', { cause: output });
  }

  return {
    pages: body.results.map(summarizePage),
    totalTokens: optionalNumber(body.total_tokens)
  };
}

function summarizePage(value: unknown, index: number): OcrPageSummary {
  const page = asObject(value) ?? {};
  const images = page.images;

  return {
    pageNumber: optionalNumber(page.page_number) ?? index + 1,
    tokenCount: optionalNumber(page.token_count),
    imageCount: Array.isArray(images) ? images.length : Object.keys(asObject(images) ?? {}).length,
    chunkCount: Array.isArray(page.chunks) ? page.chunks.length : 0,
    markdown: optionalString(page.markdown) ?? '',
    html: optionalString(page.html) ?? ''
  };
}
