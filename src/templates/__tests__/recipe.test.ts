import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_IMAGE_RECIPE, loadImageRecipe, validateImageRecipe } from '../recipe.js';

describe('Image recipe', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'ocr-deploy-recipe-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('validateImageRecipe', () => {
    it('should accept the default recipe', () => {
      expect(validateImageRecipe(DEFAULT_IMAGE_RECIPE)).toEqual(DEFAULT_IMAGE_RECIPE);
    });

    it('should reject a relative working directory', () => {
      expect(() => validateImageRecipe({ ...DEFAULT_IMAGE_RECIPE, workdir: 'app' }))
        .toThrow('Working directory must be an absolute path');
    });

    it('should reject invalid environment variable names', () => {
      expect(() => validateImageRecipe({ ...DEFAULT_IMAGE_RECIPE, env: { 'BAD-NAME': 'x' } }))
        .toThrow('Environment variable names must be valid identifiers');
    });

    it('should reject environment values that span lines', () => {
      const recipe = { ...DEFAULT_IMAGE_RECIPE, env: { ...DEFAULT_IMAGE_RECIPE.env, TORCH_DEVICE: 'cuda\nRUN rm -rf /' } };

      expect(() => validateImageRecipe(recipe)).toThrow('Environment variable values must be a single line');
    });

    it('should accept empty environment values', () => {
      const recipe = { ...DEFAULT_IMAGE_RECIPE, env: { EMPTY: '' } };

      expect(validateImageRecipe(recipe).env).toEqual({ EMPTY: '' });
    });

    it('should reject copy entries containing whitespace', () => {
      const recipe = { ...DEFAULT_IMAGE_RECIPE, copy: [{ source: 'my handler.py', destination: '.' }] };

      expect(() => validateImageRecipe(recipe)).toThrow('Copy sources and destinations must not contain whitespace');
    });

    it('should report every invalid copy path', () => {
      const recipe = { ...DEFAULT_IMAGE_RECIPE, copy: [{ source: 'a b', destination: 'c d' }] };

      expect(() => validateImageRecipe(recipe)).toThrow(
        'Image recipe validation failed:\n' +
        'Copy sources and destinations must not contain whitespace\n' +
        'Copy sources and destinations must not contain whitespace'
      );
    });
  });

  describe('loadImageRecipe', () => {
    it('should merge env entries and replace other fields', async () => {
      const path = join(testDir, 'image.yml');
      await writeFile(path, [
        'baseImage: nvidia/cuda:12.4.1-runtime-ubuntu22.04',
        'env:',
        '  MAX_OUTPUT_TOKENS: 8192',
        '  TORCH_DEVICE: cpu',
        'optionalPythonPackages: []',
        ''
      ].join('\n'));

      const recipe = await loadImageRecipe(path);

      expect(recipe.baseImage).toBe('nvidia/cuda:12.4.1-runtime-ubuntu22.04');
      expect(recipe.env).toEqual({
        ...DEFAULT_IMAGE_RECIPE.env,
        MAX_OUTPUT_TOKENS: '8192',
        TORCH_DEVICE: 'cpu'
      });
      expect(recipe.optionalPythonPackages).toEqual([]);
      expect(recipe.systemPackages).toEqual(DEFAULT_IMAGE_RECIPE.systemPackages);
      expect(recipe.handler).toBe('runpod_handler.py');
    });

    it('should fall back to the defaults for an empty file', async () => {
      const path = join(testDir, 'image.yml');
      await writeFile(path, '');

      expect(await loadImageRecipe(path)).toEqual(DEFAULT_IMAGE_RECIPE);
    });

    it('should fail with RECIPE_INVALID for a missing file', async () => {
      await expect(loadImageRecipe(join(testDir, 'missing.yml'))).rejects.toMatchObject({
        code: 'RECIPE_INVALID',
        message: `Image recipe not found: ${join(testDir, 'missing.yml')}`
      });
    });

    it('should fail with RECIPE_INVALID when the file is not a mapping', async () => {
      const path = join(testDir, 'image.yml');
      await writeFile(path, '- one\n- two\n');

      await expect(loadImageRecipe(path)).rejects.toMatchObject({
        code: 'RECIPE_INVALID',
        message: `Image recipe ${path} must be a mapping`
      });
    });

    it('should fail with RECIPE_INVALID for malformed YAML', async () => {
      const path = join(testDir, 'image.yml');
      await writeFile(path, 'env: [unclosed\n');

      await expect(loadImageRecipe(path)).rejects.toMatchObject({ code: 'RECIPE_INVALID' });
    });

    it('should reject unknown recipe fields', async () => {
      const path = join(testDir, 'image.yml');
      await writeFile(path, 'entrypoint: run.sh\n');

      await expect(loadImageRecipe(path)).rejects.toThrow('"entrypoint" is not allowed');
    });
  });
});
