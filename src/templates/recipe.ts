import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import Joi from 'joi';
import { parse as parseYaml } from 'yaml';
import { DeploymentFailure, describeError } from '../errors.js';
import { ImageRecipe } from './types.js';

export const DEFAULT_IMAGE_RECIPE: ImageRecipe = {
  baseImage: 'runpod/pytorch:2.4.0-py3.11-cuda12.4.1-devel-ubuntu22.04',
  workdir: '/app',
  env: {
    HF_HOME: '/runpod-volume/huggingface',
    TRANSFORMERS_CACHE: '/runpod-volume/huggingface/transformers',
    TORCH_HOME: '/runpod-volume/torch',
    MODEL_CHECKPOINT: 'datalab-to/chandra',
    TORCH_DEVICE: 'cuda',
    MAX_OUTPUT_TOKENS: '12384'
  },
  systemPackages: ['git', 'poppler-utils', 'libgl1', 'libglib2.0-0'],
  copy: [
    { source: 'requirements.txt', destination: '.' },
    { source: 'runpod_handler.py', destination: '.' }
  ],
  requirementsFile: 'requirements.txt',
  pythonPackages: ['runpod', 'chandra-ocr', 'filetype'],
  optionalPythonPackages: ['flash-attn'],
  handler: 'runpod_handler.py'
};

const packageName = Joi.string().pattern(/^\S+$/).messages({
  'string.pattern.base': 'Package names must not contain whitespace'
});

const copyPath = Joi.string().pattern(/^\S+$/).required().messages({
  'string.pattern.base': 'Copy sources and destinations must not contain whitespace'
});

const envValue = Joi.string().allow('').pattern(/^[^\r\n]*$/).messages({
  'string.pattern.base': 'Environment variable values must be a single line'
});

const imageRecipeSchema = Joi.object<ImageRecipe>({
  baseImage: Joi.string().pattern(/^\S+$/).required().messages({
    'string.pattern.base': 'Base image must not contain whitespace'
  }),
  workdir: Joi.string().pattern(/^\//).required().messages({
    'string.pattern.base': 'Working directory must be an absolute path'
  }),
  env: Joi.object()
    .pattern(Joi.string().pattern(/^[A-Za-z_][A-Za-z0-9_]*$/), envValue)
    .required()
    .messages({
      'object.unknown': 'Environment variable names must be valid identifiers'
    }),
  systemPackages: Joi.array().items(packageName).required(),
  copy: Joi.array()
    .items(Joi.object({
      source: copyPath,
      destination: copyPath
    }))
    .required(),
  requirementsFile: Joi.string().optional(),
  pythonPackages: Joi.array().items(packageName).required(),
  optionalPythonPackages: Joi.array().items(packageName).required(),
  handler: Joi.string().required()
});

/**
 * Validates a recipe.
 * @throws DeploymentFailure RECIPE_INVALID
 */
export function validateImageRecipe(recipe: unknown): ImageRecipe {
  const { error, value } = imageRecipeSchema.validate(recipe, { abortEarly: false });
  if (error) {
    const errors = error.details.map(detail => detail.message);
    throw new DeploymentFailure('RECIPE_INVALID', `Image recipe validation failed:\n${errors.join('\n')}`);
  }
  return value;
}

/**
 * Load a YAML recipe and lay it over the default recipe. `env` entries are
 * merged key by key; any other field given in the file replaces the default.
 */
export async function loadImageRecipe(path: string): Promise<ImageRecipe> {
  if (!existsSync(path)) {
    throw new DeploymentFailure('RECIPE_INVALID', `Image recipe not found: ${path}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new DeploymentFailure('RECIPE_INVALID', `Failed to parse image recipe ${path}: ${describeError(error)}`, {
      cause: error
    });
  }

  if (parsed === null || parsed === undefined) {
    return validateImageRecipe(DEFAULT_IMAGE_RECIPE);
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new DeploymentFailure('RECIPE_INVALID', `Image recipe ${path} must be a mapping`);
  }

  return validateImageRecipe(mergeRecipe(DEFAULT_IMAGE_RECIPE, parsed));
}

function mergeRecipe(defaults: ImageRecipe, overrides: object): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...defaults };
  for (const [key, value] of Object.entries(overrides)) {
    if (key === 'env' && value !== null && typeof value === 'object' && !Array.isArray(value)) {
      merged.env = { ...defaults.env, ...stringifyScalars(value) };
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

// YAML reads `MAX_OUTPUT_TOKENS: 8192` as a number; ENV values are text.
function stringifyScalars(values: object): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    result[key] = typeof value === 'number' || typeof value === 'boolean' ? String(value) : value;
  }
  return result;
}
