import Joi from 'joi';
import { ConfigurationRecord, RunPodSettings } from '../types/index.js';
import { DeploymentFailure } from '../errors.js';
import { ConfigValidationResult } from './types.js';

export const CREDENTIAL_KEY = 'RUNPOD_API_KEY';

interface RunPodEnv {
  RUNPOD_API_KEY: string;
  RUNPOD_ENDPOINT_NAME: string;
  DOCKER_IMAGE: string;
  GPU_IDS: string;
  WORKERS_MAX: number;
  CONTAINER_DISK_GB: number;
  VOLUME_GB: number;
  MODEL_CHECKPOINT: string;
  MAX_OUTPUT_TOKENS: number;
  HF_TOKEN?: string;
}

const positiveInteger = (label: string, fallback: number) =>
  Joi.number()
    .integer()
    .min(1)
    .default(fallback)
    .messages({
      'number.base': `${label} must be a number`,
      'number.integer': `${label} must be a whole number`,
      'number.min': `${label} must be at least 1`
    });

const runPodEnvSchema = Joi.object<RunPodEnv>({
  RUNPOD_API_KEY: Joi.string()
    .required()
    .messages({
      'any.required': `${CREDENTIAL_KEY} is not set`,
      'string.empty': `${CREDENTIAL_KEY} is not set`
    }),
  RUNPOD_ENDPOINT_NAME: Joi.string()
    .pattern(/^[a-zA-Z0-9][a-zA-Z0-9-_]*$/)
    .max(64)
    .default('chandra-ocr')
    .messages({
      'string.pattern.base': 'Endpoint name must start with a letter or digit and contain only alphanumeric characters, hyphens, and underscores',
      'string.max': 'Endpoint name must be no more than 64 characters long'
    }),
  DOCKER_IMAGE: Joi.string()
    .pattern(/^\S+$/)
    .default('chandra-runpod:latest')
    .messages({
      'string.pattern.base': 'Docker image must not contain whitespace'
    }),
  GPU_IDS: Joi.string()
    .default('AMPERE_16')
    .messages({
      'string.empty': 'GPU type must not be empty'
    }),
  WORKERS_MAX: positiveInteger('Max workers', 3),
  CONTAINER_DISK_GB: positiveInteger('Container disk size', 20),
  VOLUME_GB: positiveInteger('Volume size', 50),
  MODEL_CHECKPOINT: Joi.string().default('datalab-to/chandra'),
  MAX_OUTPUT_TOKENS: positiveInteger('Max output tokens', 12384),
  HF_TOKEN: Joi.string().allow('').optional()
}).unknown(true);

/**
 * Checks that the credential is present and non-empty.
 * @throws DeploymentFailure with code CREDENTIAL_MISSING
 */
export function assertCredential(record: ConfigurationRecord, source: string): string {
  const credential = record[CREDENTIAL_KEY];
  if (credential === undefined || credential === '') {
    throw new DeploymentFailure('CREDENTIAL_MISSING', `${CREDENTIAL_KEY} is not set in ${source}`, {
      remediation: `Add a line ${CREDENTIAL_KEY}=<your api key> to ${source}`
    });
  }
  return credential;
}

export function validateConfig(record: ConfigurationRecord): ConfigValidationResult {
  const { error } = runPodEnvSchema.validate(record, { abortEarly: false });

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return {
    valid: true,
    errors: []
  };
}

/**
 * Validates the record and returns the typed settings with defaults applied.
 * @throws DeploymentFailure with code CONFIGURATION_INVALID
 */
export function resolveDeploymentSettings(record: ConfigurationRecord): RunPodSettings {
  const { error, value } = runPodEnvSchema.validate(record, { abortEarly: false });

  if (error) {
    const errors = error.details.map(detail => detail.message);
    throw new DeploymentFailure('CONFIGURATION_INVALID', `Configuration validation failed:\n${errors.join('\n')}`);
  }

  return {
    apiKey: value.RUNPOD_API_KEY,
    endpointName: value.RUNPOD_ENDPOINT_NAME,
    dockerImage: value.DOCKER_IMAGE,
    gpuIds: value.GPU_IDS,
    workersMax: value.WORKERS_MAX,
    containerDiskGb: value.CONTAINER_DISK_GB,
    volumeGb: value.VOLUME_GB,
    modelCheckpoint: value.MODEL_CHECKPOINT,
    maxOutputTokens: value.MAX_OUTPUT_TOKENS,
    hfToken: value.HF_TOKEN ? value.HF_TOKEN : undefined
  };
}

/**
 * Gets the Joi schema for the env configuration (useful for testing)
 */
export function getConfigSchema() {
  return runPodEnvSchema;
}
