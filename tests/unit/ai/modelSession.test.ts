/**
 * ModelSession Unit Tests
 *
 * The Gemini SDK is mocked; model listing is fed from an async generator the
 * way the SDK's pager iterates.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockList, MockGoogleGenAI } = vi.hoisted(() => {
  const list = vi.fn();
  return {
    mockList: list,
    MockGoogleGenAI: vi.fn().mockImplementation(() => ({
      models: { list },
      files: {},
    })),
  };
});

vi.mock('@google/genai', () => ({
  GoogleGenAI: MockGoogleGenAI,
}));

import { ModelSession, pickDefaultModel, sortModelsByPreference } from '../../../src/main/ai/ModelSession.js';
import { FALLBACK_MODEL } from '../../../src/main/ai/types.js';
import { ConfigurationError } from '../../../src/main/errors.js';

interface FakeModel {
  name?: string;
  supportedActions?: string[];
}

async function* pager(models: FakeModel[]): AsyncGenerator<FakeModel> {
  for (const model of models) {
    yield model;
  }
}

describe('ModelSession', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('configure', () => {
    it('rejects an empty or blank credential', () => {
      const session = new ModelSession();

      expect(session.configure('')).toBe(false);
      expect(session.configure('   ')).toBe(false);
      expect(session.configure(undefined)).toBe(false);
      expect(session.isConfigured).toBe(false);
      expect(MockGoogleGenAI).not.toHaveBeenCalled();
    });

    it('accepts any non-empty credential without validating it', () => {
      const session = new ModelSession();

      expect(session.configure(' any-non-empty-string ')).toBe(true);
      expect(session.isConfigured).toBe(true);
      expect(MockGoogleGenAI).toHaveBeenCalledWith({ apiKey: 'any-non-empty-string' });
    });
  });

  describe('client', () => {
    it('throws MISSING_CREDENTIAL before configure succeeds', () => {
      const session = new ModelSession();

      expect(() => session.client).toThrow(ConfigurationError);
      expect(() => session.client).toThrow(/No Google AI API key configured/);
    });
  });

  describe('listGenerationCapableModels', () => {
    it('keeps generation-capable models, pro tier first, then flash', async () => {
      mockList.mockResolvedValue(
        pager([
          { name: 'models/embedding-001', supportedActions: ['embedContent'] },
          { name: 'models/gemini-1.5-flash', supportedActions: ['generateContent'] },
          { name: 'models/other-model', supportedActions: ['generateContent'] },
          { name: 'models/gemini-1.5-pro', supportedActions: ['generateContent', 'countTokens'] },
          { supportedActions: ['generateContent'] },
        ]),
      );
      const session = new ModelSession();
      session.configure('test-secret');

      await expect(session.listGenerationCapableModels()).resolves.toEqual([
        'models/gemini-1.5-pro',
        'models/gemini-1.5-flash',
        'models/other-model',
      ]);
    });

    it('returns an empty list when the provider fails', async () => {
      mockList.mockRejectedValue(new Error('403 Forbidden'));
      const session = new ModelSession();
      session.configure('test-secret');

      await expect(session.listGenerationCapableModels()).resolves.toEqual([]);
    });

    it('returns an empty list when unconfigured', async () => {
      const session = new ModelSession();

      await expect(session.listGenerationCapableModels()).resolves.toEqual([]);
      expect(mockList).not.toHaveBeenCalled();
    });
  });
});

describe('sortModelsByPreference', () => {
  it('keeps provider order within a tier', () => {
    expect(
      sortModelsByPreference(['b', 'models/gemini-1.5-flash-8b', 'a', 'models/gemini-1.5-pro-002', 'models/gemini-1.5-pro']),
    ).toEqual(['models/gemini-1.5-pro-002', 'models/gemini-1.5-pro', 'models/gemini-1.5-flash-8b', 'b', 'a']);
  });
});

describe('pickDefaultModel', () => {
  it('prefers a latest pro model', () => {
    expect(
      pickDefaultModel(['models/gemini-1.5-pro-002', 'models/gemini-1.5-pro-latest', 'models/gemini-1.5-flash']),
    ).toBe('models/gemini-1.5-pro-latest');
  });

  it('falls back to the first pro model', () => {
    expect(pickDefaultModel(['models/gemini-1.5-flash', 'models/gemini-1.5-pro-002'])).toBe(
      'models/gemini-1.5-pro-002',
    );
  });

  it('falls back to the first listed model', () => {
    expect(pickDefaultModel(['models/gemini-1.5-flash', 'models/other'])).toBe('models/gemini-1.5-flash');
  });

  it('uses the fallback name for an empty list', () => {
    expect(pickDefaultModel([])).toBe(FALLBACK_MODEL);
  });
});
