import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  EnvConfigLoader,
  buildChildEnvironment,
  createConfigLoader,
  exportToEnvironment
} from '../loader.js';
import { DeploymentFailure } from '../../errors.js';

describe('Configuration Loader', () => {
  let testDir: string;
  let loader: EnvConfigLoader;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'ocr-deploy-config-'));
    loader = new EnvConfigLoader();
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should load a well-formed env file', async () => {
      const path = join(testDir, '.env.runpod');
      await writeFile(path, 'RUNPOD_API_KEY=abc123\n# comment\n');

      const record = await loader.load(path);

      expect(record).toEqual({ RUNPOD_API_KEY: 'abc123' });
    });

    it('should fail with CONFIGURATION_MISSING and creation guidance for a missing file', async () => {
      const path = join(testDir, '.env.runpod');

      const error = await loader.load(path).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(DeploymentFailure);
      expect(error).toMatchObject({
        code: 'CONFIGURATION_MISSING',
        message: '.env.runpod file not found',
        exitCode: 1
      });
      expect(error).toHaveProperty(
        'remediation',
        'Please create .env.runpod file:\n  cp .env.runpod.example .env.runpod\n  # Edit .env.runpod with your configuration'
      );
    });

    it('should fail with CREDENTIAL_MISSING when the key is absent', async () => {
      const path = join(testDir, '.env.runpod');
      await writeFile(path, 'RUNPOD_ENDPOINT_NAME=chandra-ocr\n');

      await expect(loader.load(path)).rejects.toMatchObject({
        code: 'CREDENTIAL_MISSING',
        message: 'RUNPOD_API_KEY is not set in .env.runpod'
      });
    });

    it('should fail with CREDENTIAL_MISSING when the key is empty', async () => {
      const path = join(testDir, '.env.runpod');
      await writeFile(path, 'RUNPOD_API_KEY=\n');

      await expect(loader.load(path)).rejects.toMatchObject({ code: 'CREDENTIAL_MISSING' });
    });

    it('should treat a commented-out credential as missing', async () => {
      const path = join(testDir, '.env.runpod');
      await writeFile(path, '# RUNPOD_API_KEY=abc123\n');

      await expect(loader.load(path)).rejects.toMatchObject({ code: 'CREDENTIAL_MISSING' });
    });

    it('should fail with CONFIGURATION_INVALID when the path is a directory', async () => {
      await expect(loader.load(testDir)).rejects.toMatchObject({ code: 'CONFIGURATION_INVALID' });
    });
  });

  describe('validate', () => {
    it('should validate a complete record', () => {
      const result = loader.validate({ RUNPOD_API_KEY: 'test-secret', WORKERS_MAX: '5' });

      expect(result).toEqual({ valid: true, errors: [] });
    });

    it('should report invalid numeric values', () => {
      const result = loader.validate({ RUNPOD_API_KEY: 'test-secret', WORKERS_MAX: 'many' });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['Max workers must be a number']);
    });
  });

  describe('exportToEnvironment', () => {
    it('should write every entry into the target table', () => {
      const env: Record<string, string | undefined> = { PATH: '/usr/bin' };

      exportToEnvironment({ RUNPOD_API_KEY: 'abc123', TOKEN: 'a=b' }, env);

      expect(env).toEqual({ PATH: '/usr/bin', RUNPOD_API_KEY: 'abc123', TOKEN: 'a=b' });
    });
  });

  describe('buildChildEnvironment', () => {
    it('should overlay the record on the base environment without touching it', () => {
      const base = { PATH: '/usr/bin', GPU_IDS: 'AMPERE_16', UNSET: undefined };

      const env = buildChildEnvironment({ GPU_IDS: 'ADA_24' }, base);

      expect(env).toEqual({ PATH: '/usr/bin', GPU_IDS: 'ADA_24' });
      expect(base.GPU_IDS).toBe('AMPERE_16');
    });
  });

  describe('createConfigLoader', () => {
    it('should create a new EnvConfigLoader instance', () => {
      expect(createConfigLoader()).toBeInstanceOf(EnvConfigLoader);
    });
  });
});
