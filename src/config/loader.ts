// Configuration loading logic
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { basename } from 'path';
import { ConfigurationRecord } from '../types/index.js';
import { DeploymentFailure, describeError } from '../errors.js';
import { ConfigLoader, ConfigValidationResult, EnvironmentTable } from './types.js';
import { parseEnvFile } from './env-file.js';
import { assertCredential, validateConfig } from './validator.js';

export const DEFAULT_ENV_FILE = '.env.runpod';
export const ENV_TEMPLATE_FILE = '.env.runpod.example';

/**
 * Loads the env-style deployment configuration and checks the credential.
 */
export class EnvConfigLoader implements ConfigLoader {

  /**
   * Load and parse configuration from an env file
   * @param path - Path to the `KEY=VALUE` file
   * @returns Frozen configuration record
   * @throws DeploymentFailure CONFIGURATION_MISSING when the file does not exist,
   *   CREDENTIAL_MISSING when the credential is absent or empty
   */
  async load(path: string): Promise<ConfigurationRecord> {
    if (!existsSync(path)) {
      const target = basename(path);
      throw new DeploymentFailure('CONFIGURATION_MISSING', `${target} file not found`, {
        remediation: [
          `Please create ${target} file:`,
          `  cp ${ENV_TEMPLATE_FILE} ${target}`,
          `  # Edit ${target} with your configuration`
        ].join('\n')
      });
    }

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      throw new DeploymentFailure('CONFIGURATION_INVALID', `Could not read ${path}: ${describeError(error)}`, {
        cause: error
      });
    }
    const record = parseEnvFile(content);

    assertCredential(record, basename(path));

    return record;
  }

  /**
   * Validate a configuration record without loading it from a file
   */
  validate(record: ConfigurationRecord): ConfigValidationResult {
    return validateConfig(record);
  }
}

/**
 * Copy every entry of the record into an environment table.
 * @param record - Loaded configuration
 * @param env - Target table, `process.env` by default
 */
export function exportToEnvironment(record: ConfigurationRecord, env: EnvironmentTable = process.env): void {
  for (const [key, value] of Object.entries(record)) {
    env[key] = value;
  }
}

/**
 * Environment handed to a child process: the base table overlaid with the record.
 */
export function buildChildEnvironment(
  record: ConfigurationRecord,
  base: EnvironmentTable = process.env
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return { ...env, ...record };
}

/**
 * Convenience function to create a new configuration loader
 */
export function createConfigLoader(): EnvConfigLoader {
  return new EnvConfigLoader();
}
