// Core type definitions for the OCR serverless deployment tool

/**
 * Key/value pairs read from the env-style configuration file.
 * Read once, never mutated afterwards.
 */
export type ConfigurationRecord = Readonly<Record<string, string>>;

export type DeploymentErrorCode =
  | 'CONFIGURATION_MISSING'
  | 'CONFIGURATION_INVALID'
  | 'CREDENTIAL_MISSING'
  | 'RUNTIME_MISSING'
  | 'DEPENDENCY_INSTALL_FAILED'
  | 'DELEGATED_DEPLOYMENT_FAILED'
  | 'PROVISIONING_FAILED'
  | 'ENDPOINT_TEST_FAILED'
  | 'RECIPE_INVALID';

export interface RunPodSettings {
  apiKey: string;
  endpointName: string;
  dockerImage: string;
  gpuIds: string;
  workersMax: number;
  containerDiskGb: number;
  volumeGb: number;
  modelCheckpoint: string;
  maxOutputTokens: number;
  hfToken?: string;
}

export interface DeploySettings {
  /** Runtime executable that must be on PATH and runs the deployment program */
  runtime: string;
  /** Package manager executable used for the dependency install */
  installer: string;
  /** Package installed before the deployment program runs */
  dependency: string;
  /** Deployment program handed to the runtime */
  program: string;
}

export interface DeploymentError {
  code: DeploymentErrorCode;
  message: string;
  details?: unknown;
  remediation?: string;
}

export interface DeploymentMetadata {
  deploymentId: string;
  timestamp: Date;
  duration?: number;
  endpointName?: string;
}

export interface DeploymentResult {
  success: boolean;
  exitCode: number;
  errors?: DeploymentError[];
  metadata: DeploymentMetadata;
}

export interface EndpointInfo {
  id: string;
  name: string;
  url: string;
  status: 'created' | 'updated';
}

export interface Logger {
  info(message: string): void;
  step(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  detail(message: string): void;
}
