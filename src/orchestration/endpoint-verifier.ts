import { mkdir, readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { Logger } from '../types/index.js';
import { DeploymentFailure, describeError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { ConfigLoader } from '../config/types.js';
import { DEFAULT_ENV_FILE, EnvConfigLoader } from '../config/loader.js';
import { resolveDeploymentSettings } from '../config/validator.js';
import { EndpointTester } from '../provisioning/endpoint-tester.js';
import { asObject, optionalString } from '../provisioning/json.js';
import { EndpointTestReport, FetchFunction } from '../provisioning/types.js';
import { ENDPOINT_INFO_FILE } from './endpoint-provisioner.js';

export const ENDPOINT_ID_KEY = 'RUNPOD_ENDPOINT_ID';
export const TEST_OUTPUT_DIR = 'test_output';

export interface VerifyOptions {
  /** Image or PDF path, or an http(s) URL passed through to the worker */
  image: string;
  envFile?: string;
  /** Takes precedence over RUNPOD_ENDPOINT_ID and the endpoint info file */
  endpointId?: string;
  infoFile?: string;
  /** Directory the per-page markdown and HTML are written to; skipped when false */
  outputDir?: string | false;
}

export interface VerifierDependencies {
  loader?: ConfigLoader;
  logger?: Logger;
  fetch?: FetchFunction;
  sleep?: (ms: number) => Promise<void>;
}

export function isImageUrl(source: string): boolean {
  return source.startsWith('http://') || source.startsWith('https://');
}

/**
 * Sends a sample document to the deployed endpoint and reports what came back.
 */
export class EndpointVerifier {
  private readonly loader: ConfigLoader;
  private readonly logger: Logger;

  constructor(private readonly deps: VerifierDependencies = {}) {
    this.loader = deps.loader ?? new EnvConfigLoader();
    this.logger = deps.logger ?? silentLogger;
  }

  async verify(options: VerifyOptions): Promise<EndpointTestReport> {
    const record = await this.loader.load(options.envFile ?? DEFAULT_ENV_FILE);
    const settings = resolveDeploymentSettings(record);
    // Empty values fall through to the next source
    const endpointId = options.endpointId
      || record[ENDPOINT_ID_KEY]
      || await readEndpointId(options.infoFile ?? ENDPOINT_INFO_FILE);

    this.logger.info(`Endpoint ID: ${endpointId}`);
    this.logger.info(`${isImageUrl(options.image) ? 'Image URL' : 'Image'}: ${options.image}`);

    const image = await loadImageInput(options.image);

    this.logger.step('Sending request to RunPod...');
    this.logger.detail('The first request after a cold start may take 10-30 seconds');

    const tester = new EndpointTester(settings.apiKey, {
      fetch: this.deps.fetch,
      logger: this.logger,
      sleep: this.deps.sleep
    });
    const report = await tester.runSync(endpointId, {
      image,
      maxOutputTokens: settings.maxOutputTokens,
      includeImages: true,
      includeHeadersFooters: false
    });

    const outputDir = options.outputDir ?? TEST_OUTPUT_DIR;
    if (outputDir !== false) {
      await saveReport(report, outputDir);
      this.logger.detail(`Results saved to ${outputDir}`);
    }

    return report;
  }
}

async function readEndpointId(infoFile: string): Promise<string> {
  const missing = new DeploymentFailure('CONFIGURATION_INVALID', 'No endpoint ID to test', {
    remediation: `Pass --endpoint-id, set ${ENDPOINT_ID_KEY} in ${DEFAULT_ENV_FILE}, or run ocr-deploy provision to write ${infoFile}`
  });
  if (!existsSync(infoFile)) {
    throw missing;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(infoFile, 'utf-8'));
  } catch (error) {
    throw new DeploymentFailure('CONFIGURATION_INVALID', `Could not read ${infoFile}: ${describeError(error)}`, {
      cause: error
    });
  }

  const id = optionalString(asObject(parsed)?.id);
  if (!id) {
    throw missing;
  }
  return id;
}

async function loadImageInput(source: string): Promise<string> {
  if (isImageUrl(source)) {
    return source;
  }
  try {
    return (await readFile(source)).toString('base64');
  } catch (error) {
    throw new DeploymentFailure('ENDPOINT_TEST_FAILED', `Could not read image ${source}: ${describeError(error)}`, {
      cause: error
    });
  }
}

async function saveReport(report: EndpointTestReport, outputDir: string): Promise<void> {
  try {
    await mkdir(outputDir, { recursive: true });
    for (const page of report.pages) {
      await writeFile(join(outputDir, `result_${page.pageNumber}.md`), page.markdown, 'utf-8');
      await writeFile(join(outputDir, `result_${page.pageNumber}.html`), page.html, 'utf-8');
    }
  } catch (error) {
    throw new DeploymentFailure('ENDPOINT_TEST_FAILED', `Could not save results to ${outputDir}: ${describeError(error)}`, {
      cause: error
    });
  }
}
