/**
 * Error taxonomy for the SOP pipeline.
 *
 * Every failure that reaches a surface (CLI, MCP) is one of these. The `code`
 * narrows the cause within a category; none of them is retried automatically.
 */

// =============================================================================
// Error codes
// =============================================================================

export type ConfigurationErrorCode = 'MISSING_CREDENTIAL' | 'INVALID_CONFIG';

export type AssetProcessingErrorCode =
  | 'UPLOAD_FAILED'
  | 'INVALID_HANDLE'
  | 'STATUS_CHECK_FAILED'
  | 'PROCESSING_FAILED'
  | 'TIMEOUT'
  | 'ABORTED';

export type GenerationErrorCode =
  | 'RATE_LIMITED'
  | 'AUTH_FAILED'
  | 'SERVER_ERROR'
  | 'CONTENT_BLOCKED'
  | 'EMPTY_RESPONSE'
  | 'UNKNOWN';

export type RenderErrorCode = 'INVALID_IMAGE' | 'PDF_FAILED';

// =============================================================================
// Error classes
// =============================================================================

export class SOPError<Code extends string = string> extends Error {
  public readonly code: Code;

  constructor(message: string, code: Code, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SOPError';
    this.code = code;
  }
}

/** Missing or malformed credential/configuration. The user must fix input. */
export class ConfigurationError extends SOPError<ConfigurationErrorCode> {
  constructor(message: string, code: ConfigurationErrorCode, cause?: unknown) {
    super(message, code, cause);
    this.name = 'ConfigurationError';
  }
}

/** An uploaded asset never became usable by the provider. */
export class AssetProcessingError extends SOPError<AssetProcessingErrorCode> {
  constructor(message: string, code: AssetProcessingErrorCode, cause?: unknown) {
    super(message, code, cause);
    this.name = 'AssetProcessingError';
  }
}

/** The provider call that produces the document failed. */
export class GenerationError extends SOPError<GenerationErrorCode> {
  constructor(message: string, code: GenerationErrorCode, cause?: unknown) {
    super(message, code, cause);
    this.name = 'GenerationError';
  }
}

/** Export-only failure; the generated document itself is unaffected. */
export class RenderError extends SOPError<RenderErrorCode> {
  constructor(message: string, code: RenderErrorCode, cause?: unknown) {
    super(message, code, cause);
    this.name = 'RenderError';
  }
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
