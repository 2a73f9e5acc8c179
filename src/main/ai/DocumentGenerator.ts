/**
 * DocumentGenerator - One generateContent call, raw text out
 *
 * No retries and no streaming: a failure surfaces to the caller as a
 * GenerationError, and a success returns the whole document at once.
 */

import type { GenerateContentResponse } from '@google/genai';
import { GenerationError, SOPError, errorMessage } from '../errors.js';
import type { GenerationErrorCode } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import type { ModelSession } from './ModelSession.js';
import { toContents } from './PromptComposer.js';
import type { GenerationRequest } from './types.js';

const log = createLogger('DocumentGenerator');

function codeForStatus(status: number): GenerationErrorCode {
  if (status === 429) return 'RATE_LIMITED';
  if (status === 401 || status === 403) return 'AUTH_FAILED';
  if (status >= 500) return 'SERVER_ERROR';
  return 'UNKNOWN';
}

/**
 * Map whatever the SDK threw onto a GenerationError. SDK API errors carry
 * the HTTP status; anything else (network, aborted fetch) is UNKNOWN.
 */
export function toGenerationError(error: unknown): SOPError {
  if (error instanceof SOPError) {
    return error;
  }

  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return new GenerationError(
      `Generation failed (${error.status}): ${error.message}`,
      codeForStatus(error.status),
      error,
    );
  }

  return new GenerationError(`Generation failed: ${errorMessage(error)}`, 'UNKNOWN', error);
}

export class DocumentGenerator {
  constructor(private readonly session: ModelSession) {}

  /**
   * @returns the generated text, verbatim
   * @throws ConfigurationError if the session has no credential
   * @throws GenerationError on provider failure, blocked prompt or empty output
   */
  async generate(request: GenerationRequest, model: string): Promise<string> {
    const { models } = this.session.client;
    const startedAt = Date.now();

    let response: GenerateContentResponse;
    try {
      response = await models.generateContent({ model, contents: toContents(request) });
    } catch (error) {
      throw toGenerationError(error);
    }

    const blockReason = response.promptFeedback?.blockReason;
    if (blockReason) {
      throw new GenerationError(`Prompt was blocked by the provider (${blockReason})`, 'CONTENT_BLOCKED');
    }

    const text = response.text;
    if (!text) {
      throw new GenerationError('Model returned an empty response', 'EMPTY_RESPONSE');
    }

    log.info(`${model} produced ${text.length} chars in ${Date.now() - startedAt}ms`);
    return text;
  }
}
