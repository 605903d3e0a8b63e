import { DeploymentError, DeploymentErrorCode } from './types/index.js';

export interface DeploymentFailureOptions {
  remediation?: string;
  exitCode?: number;
  cause?: unknown;
}

/**
 * Fatal condition raised by any deployment phase. Never retried; the CLI
 * prints it and exits with `exitCode`.
 */
export class DeploymentFailure extends Error {
  readonly code: DeploymentErrorCode;
  readonly remediation?: string;
  readonly exitCode: number;

  constructor(code: DeploymentErrorCode, message: string, options: DeploymentFailureOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'DeploymentFailure';
    this.code = code;
    this.remediation = options.remediation;
    this.exitCode = options.exitCode ?? 1;
  }

  toDeploymentError(): DeploymentError {
    return {
      code: this.code,
      message: this.message,
      details: this.cause,
      remediation: this.remediation
    };
  }
}

export function isDeploymentFailure(error: unknown): error is DeploymentFailure {
  return error instanceof DeploymentFailure;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
