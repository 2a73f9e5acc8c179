/**
 * AI Pipeline Types
 *
 * Types shared by the session, uploader, prompt composer and document
 * generator that together turn a procedure video into raw SOP text.
 */

// =============================================================================
// Assets
// =============================================================================

/**
 * Provider-side processing state of an uploaded file. Anything the provider
 * reports besides PROCESSING and ACTIVE is collapsed into FAILED.
 */
export type AssetState = 'PROCESSING' | 'ACTIVE' | 'FAILED';

/**
 * A video or image uploaded to the provider's file store. Values are never
 * mutated; polling produces a new Asset.
 */
export interface Asset {
  /** Provider resource name, e.g. "files/abc123". */
  readonly name: string;
  /** URI used to reference the file from a prompt. */
  readonly uri: string;
  readonly mimeType: string;
  readonly state: AssetState;
}

// =============================================================================
// Polling
// =============================================================================

/**
 * How `awaitActive` polls an asset that is still PROCESSING.
 */
export interface PollPolicy {
  /** Delay before the first re-check, in ms. */
  intervalMs: number;
  /** Multiplier applied to the delay after every re-check (1 = fixed interval). */
  backoffFactor: number;
  /** Upper bound for the delay once backoff kicks in. */
  maxIntervalMs: number;
  /** Give up after this long. Unset waits indefinitely. */
  timeoutMs?: number;
  /** Cancels the wait. */
  signal?: AbortSignal;
}

export const DEFAULT_POLL_POLICY: PollPolicy = {
  intervalMs: 2000,
  backoffFactor: 1,
  maxIntervalMs: 30_000,
};

// =============================================================================
// Generation request
// =============================================================================

export type GenerationPart =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'asset'; readonly asset: Asset };

/**
 * Ordered prompt parts submitted in one generation call. Frozen on creation;
 * the model is sensitive to part order.
 */
export interface GenerationRequest {
  readonly parts: readonly GenerationPart[];
}

/**
 * The model's response as returned, plus the form with timestamp tags
 * swapped for snapshots. `rawText` is never rewritten.
 */
export interface GeneratedDocument {
  readonly rawText: string;
  readonly annotatedText: string;
}

// =============================================================================
// Models
// =============================================================================

/** Model used when the provider list is empty or unavailable. */
export const FALLBACK_MODEL = 'models/gemini-1.5-pro';
