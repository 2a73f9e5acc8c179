/**
 * ModelSession - Provider client and credential for one process
 *
 * Holds the Gemini client that the uploader and generator share. Nothing is
 * validated at configure time: a bad key only shows up on the first real
 * call.
 */

import { GoogleGenAI } from '@google/genai';
import { ConfigurationError, errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { FALLBACK_MODEL } from './types.js';

const log = createLogger('ModelSession');

/** Supported action a model must advertise to be offered for SOP generation. */
const GENERATE_CONTENT_ACTION = 'generateContent';

/** Substrings ranked first and second when listing models. */
const PREFERRED_MODEL_TIERS = ['gemini-1.5-pro', 'gemini-1.5-flash'] as const;

export type ClientFactory = (apiKey: string) => GoogleGenAI;

const defaultClientFactory: ClientFactory = (apiKey) => new GoogleGenAI({ apiKey });

export class ModelSession {
  private genai: GoogleGenAI | null = null;
  private readonly createClient: ClientFactory;

  constructor(createClient: ClientFactory = defaultClientFactory) {
    this.createClient = createClient;
  }

  /**
   * Set up the provider client. Returns false (and leaves the session
   * unconfigured) when the credential is empty.
   */
  configure(credential: string | undefined): boolean {
    const apiKey = credential?.trim();
    if (!apiKey) {
      return false;
    }
    this.genai = this.createClient(apiKey);
    return true;
  }

  get isConfigured(): boolean {
    return this.genai !== null;
  }

  /**
   * @throws ConfigurationError when configure() has not succeeded
   */
  get client(): GoogleGenAI {
    if (!this.genai) {
      throw new ConfigurationError(
        'No Google AI API key configured. Set GOOGLE_API_KEY or pass --api-key.',
        'MISSING_CREDENTIAL',
      );
    }
    return this.genai;
  }

  /**
   * Names of models that support content generation, preferred tiers first.
   * Any provider failure yields an empty list: treat it as "no models
   * available", not as success.
   */
  async listGenerationCapableModels(): Promise<string[]> {
    if (!this.genai) {
      log.warn('Model listing requested before the session was configured');
      return [];
    }

    try {
      const pager = await this.genai.models.list();
      const names: string[] = [];
      for await (const model of pager) {
        if (model.name && model.supportedActions?.includes(GENERATE_CONTENT_ACTION)) {
          names.push(model.name);
        }
      }
      log.debug(`Provider returned ${names.length} generation-capable model(s)`);
      return sortModelsByPreference(names);
    } catch (error) {
      log.warn(`Could not list models: ${errorMessage(error)}`);
      return [];
    }
  }
}

// =============================================================================
// Model ranking
// =============================================================================

function preferenceRank(name: string): number {
  const index = PREFERRED_MODEL_TIERS.findIndex((tier) => name.includes(tier));
  return index === -1 ? PREFERRED_MODEL_TIERS.length : index;
}

/**
 * Stable sort: pro tier, then flash tier, then everything else, keeping the
 * provider's order within each group.
 */
export function sortModelsByPreference(names: readonly string[]): string[] {
  return [...names].sort((a, b) => preferenceRank(a) - preferenceRank(b));
}

/**
 * Default selection: a "latest" pro model, else the first pro model, else
 * the first listed model, else the fallback name.
 */
export function pickDefaultModel(models: readonly string[]): string {
  const [pro] = PREFERRED_MODEL_TIERS;
  const latestPro = models.find((m) => m.includes(pro) && m.includes('latest'));
  if (latestPro) return latestPro;

  const firstPro = models.find((m) => m.includes(pro));
  if (firstPro) return firstPro;

  return models[0] ?? FALLBACK_MODEL;
}
