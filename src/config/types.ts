// Configuration-specific types
import { ConfigurationRecord } from '../types/index.js';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader {
  load(path: string): Promise<ConfigurationRecord>;
  validate(record: ConfigurationRecord): ConfigValidationResult;
}

/** Environment table the loader exports into; `process.env` in the CLI. */
export type EnvironmentTable = Record<string, string | undefined>;
