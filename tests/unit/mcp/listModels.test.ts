/**
 * list_models Tool Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockConfigure, mockListModels, mockLoadConfig } = vi.hoisted(() => ({
  mockConfigure: vi.fn(),
  mockListModels: vi.fn(),
  mockLoadConfig: vi.fn(),
}));

vi.mock('../../../src/main/ai/ModelSession.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/main/ai/ModelSession.js')>();
  return {
    ...actual,
    ModelSession: vi.fn().mockImplementation(() => ({
      configure: mockConfigure,
      listGenerationCapableModels: mockListModels,
    })),
  };
});

vi.mock('../../../src/main/config.js', () => ({
  loadConfig: mockLoadConfig,
}));

import { register } from '../../../src/mcp/tools/listModels.js';
import { createToolRecorder, resultText } from '../../helpers/mcp.js';

describe('list_models tool', () => {
  let recorder: ReturnType<typeof createToolRecorder>;

  beforeEach(() => {
    vi.clearAllMocks();
    mockLoadConfig.mockReturnValue({ apiKey: 'test-secret' });
    mockConfigure.mockReturnValue(true);
    mockListModels.mockResolvedValue(['models/gemini-1.5-pro-latest', 'models/gemini-1.5-flash']);

    recorder = createToolRecorder();
    register(recorder.server);
  });

  it('registers without arguments', () => {
    expect(recorder.server.tool).toHaveBeenCalledWith('list_models', expect.any(String), expect.any(Function));
  });

  it('lists models with the default marked', async () => {
    const result = await recorder.handler()({});

    expect(resultText(result)).toBe('models/gemini-1.5-pro-latest (default)\nmodels/gemini-1.5-flash');
  });

  it('marks the configured model as the default', async () => {
    mockLoadConfig.mockReturnValue({ apiKey: 'test-secret', model: 'models/gemini-1.5-flash' });

    const result = await recorder.handler()({});

    expect(resultText(result)).toBe('models/gemini-1.5-pro-latest\nmodels/gemini-1.5-flash (default)');
  });

  it('returns isError without an API key', async () => {
    mockConfigure.mockReturnValue(false);

    const result = await recorder.handler()({});

    expect(result.isError).toBe(true);
    expect(mockListModels).not.toHaveBeenCalled();
  });

  it('returns isError when no models are available', async () => {
    mockListModels.mockResolvedValue([]);

    const result = await recorder.handler()({});

    expect(result.isError).toBe(true);
    expect(resultText(result)).toContain('No generation-capable models available');
  });
});
