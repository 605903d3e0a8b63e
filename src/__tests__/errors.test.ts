import { describe, it, expect } from 'vitest';
import { DeploymentFailure, describeError, isDeploymentFailure } from '../errors.js';

describe('DeploymentFailure', () => {
  it('should default to exit code 1', () => {
    const failure = new DeploymentFailure('RUNTIME_MISSING', 'python3 is not installed');

    expect(failure.exitCode).toBe(1);
    expect(failure.name).toBe('DeploymentFailure');
    expect(failure).toBeInstanceOf(Error);
  });

  it('should convert to a deployment error record', () => {
    const cause = new Error('boom');
    const failure = new DeploymentFailure('DELEGATED_DEPLOYMENT_FAILED', 'deploy_runpod.py exited with code 4', {
      exitCode: 4,
      remediation: 'Check the deployment output above for details',
      cause
    });

    expect(failure.toDeploymentError()).toEqual({
      code: 'DELEGATED_DEPLOYMENT_FAILED',
      message: 'deploy_runpod.py exited with code 4',
      details: cause,
      remediation: 'Check the deployment output above for details'
    });
    expect(failure.exitCode).toBe(4);
  });

  it('should be recognised by the type guard', () => {
    expect(isDeploymentFailure(new DeploymentFailure('RECIPE_INVALID', 'bad'))).toBe(true);
    expect(isDeploymentFailure(new Error('bad'))).toBe(false);
  });

  it('should describe non-Error values', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
  });
});
