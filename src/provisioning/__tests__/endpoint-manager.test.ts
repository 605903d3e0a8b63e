import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ENDPOINT_DEFAULTS, EndpointManager, containerEnvironment, endpointUrl } from '../endpoint-manager.js';
import { RunPodClient } from '../runpod-client.js';
import { RunPodSettings } from '../../types/index.js';

const settings: RunPodSettings = {
  apiKey: 'test-secret',
  endpointName: 'chandra-ocr',
  dockerImage: 'chandra-runpod:latest',
  gpuIds: 'AMPERE_16',
  workersMax: 3,
  containerDiskGb: 20,
  volumeGb: 50,
  modelCheckpoint: 'datalab-to/chandra',
  maxOutputTokens: 12384
};

describe('EndpointManager', () => {
  let client: RunPodClient;
  let manager: EndpointManager;

  beforeEach(() => {
    client = new RunPodClient('test-secret', vi.fn());
    manager = new EndpointManager(client, { now: () => 1_700_000_000_500 });
  });

  it('should create a template and endpoint when none exists', async () => {
    vi.spyOn(client, 'findEndpointByName').mockResolvedValue(undefined);
    const saveTemplate = vi.spyOn(client, 'saveTemplate').mockResolvedValue('tpl-1');
    const createEndpoint = vi.spyOn(client, 'createEndpoint').mockResolvedValue({ id: 'ep-1', name: 'chandra-ocr' });
    const updateEndpoint = vi.spyOn(client, 'updateEndpoint');

    const info = await manager.deploy(settings);

    expect(info).toEqual({
      id: 'ep-1',
      name: 'chandra-ocr',
      url: 'https://api.runpod.ai/v2/ep-1',
      status: 'created'
    });
    expect(saveTemplate).toHaveBeenCalledWith({
      name: 'chandra-ocr-template',
      imageName: 'chandra-runpod:latest',
      containerDiskInGb: 20,
      volumeInGb: 50,
      env: {
        MODEL_CHECKPOINT: 'datalab-to/chandra',
        MAX_OUTPUT_TOKENS: '12384',
        TORCH_DEVICE: 'cuda'
      }
    });
    expect(createEndpoint).toHaveBeenCalledWith({
      name: 'chandra-ocr',
      templateId: 'tpl-1',
      gpuIds: 'AMPERE_16',
      workersMax: 3,
      workersMin: 0,
      idleTimeout: 5,
      executionTimeout: 300,
      gpuUtilization: 90
    });
    expect(updateEndpoint).not.toHaveBeenCalled();
  });

  it('should point an existing endpoint at a new timestamped template', async () => {
    vi.spyOn(client, 'findEndpointByName').mockResolvedValue({ id: 'ep-7', name: 'chandra-ocr' });
    const saveTemplate = vi.spyOn(client, 'saveTemplate').mockResolvedValue('tpl-2');
    const createEndpoint = vi.spyOn(client, 'createEndpoint');
    const updateEndpoint = vi.spyOn(client, 'updateEndpoint').mockResolvedValue(undefined);

    const info = await manager.deploy({ ...settings, workersMax: 5 });

    expect(info).toEqual({
      id: 'ep-7',
      name: 'chandra-ocr',
      url: 'https://api.runpod.ai/v2/ep-7',
      status: 'updated'
    });
    expect(saveTemplate).toHaveBeenCalledWith(expect.objectContaining({ name: 'chandra-ocr-template-1700000000' }));
    expect(updateEndpoint).toHaveBeenCalledWith({ id: 'ep-7', templateId: 'tpl-2', workersMax: 5 });
    expect(createEndpoint).not.toHaveBeenCalled();
  });

  it('should not touch the endpoint when the template cannot be saved', async () => {
    vi.spyOn(client, 'findEndpointByName').mockResolvedValue({ id: 'ep-7', name: 'chandra-ocr' });
    vi.spyOn(client, 'saveTemplate').mockRejectedValue(new Error('Failed to create template'));
    const updateEndpoint = vi.spyOn(client, 'updateEndpoint');

    await expect(manager.deploy(settings)).rejects.toThrow('Failed to create template');
    expect(updateEndpoint).not.toHaveBeenCalled();
  });
});

describe('containerEnvironment', () => {
  it('should include HF_TOKEN only when set', () => {
    expect(containerEnvironment(settings)).not.toHaveProperty('HF_TOKEN');
    expect(containerEnvironment({ ...settings, hfToken: 'hf-placeholder' }).HF_TOKEN).toBe('hf-placeholder');
  });
});

describe('endpointUrl', () => {
  it('should build the serverless API URL', () => {
    expect(endpointUrl('abc')).toBe('https://api.runpod.ai/v2/abc');
    expect(ENDPOINT_DEFAULTS.executionTimeout).toBe(300);
  });
});
