import { ConfigurationRecord } from '../types/index.js';
import { formatEnvFile } from './env-file.js';

export const ENV_TEMPLATE_VALUES: ConfigurationRecord = {
  RUNPOD_API_KEY: '',
  RUNPOD_ENDPOINT_NAME: 'chandra-ocr',
  DOCKER_IMAGE: 'chandra-runpod:latest',
  GPU_IDS: 'AMPERE_16',
  WORKERS_MAX: '3',
  CONTAINER_DISK_GB: '20',
  VOLUME_GB: '50',
  MODEL_CHECKPOINT: 'datalab-to/chandra',
  MAX_OUTPUT_TOKENS: '12384',
  HF_TOKEN: ''
};

export function renderEnvTemplate(generatedAt: Date = new Date()): string {
  return formatEnvFile(ENV_TEMPLATE_VALUES, [
    'RunPod Serverless deployment configuration',
    `Generated on ${generatedAt.toISOString()}`,
    'RUNPOD_API_KEY is required; everything else has a default.'
  ]);
}
