/**
 * sopgen - library entry point
 */

export { ModelSession, pickDefaultModel, sortModelsByPreference } from './main/ai/ModelSession.js';
export { AssetUploader } from './main/ai/AssetUploader.js';
export { composePrompt, toContents, SOP_INSTRUCTIONS } from './main/ai/PromptComposer.js';
export { DocumentGenerator } from './main/ai/DocumentGenerator.js';
export { DEFAULT_POLL_POLICY, FALLBACK_MODEL } from './main/ai/types.js';
export type {
  Asset,
  AssetState,
  GeneratedDocument,
  GenerationPart,
  GenerationRequest,
  PollPolicy,
} from './main/ai/types.js';

export { FrameAnnotator, snapshotMarkdown, type AnnotationResult } from './main/pipeline/FrameAnnotator.js';
export { FrameExtractor, type FrameSource, type FrameExtractorOptions } from './main/pipeline/FrameExtractor.js';
export { timeStringToSeconds, formatTimestamp } from './main/pipeline/timestamps.js';

export { parseMarkdown, parseInline, plainText } from './main/output/MarkdownParser.js';
export type { Block, Inline, SopDocument } from './main/output/MarkdownParser.js';
export { renderHtml, markdownToHtml } from './main/output/HtmlRenderer.js';
export { renderPdf, type PdfRenderOptions } from './main/output/PdfRenderer.js';
export { generateHtmlDocument, type HtmlExportOptions } from './main/output/templates/html-template.js';
export {
  exportService,
  ExportService,
  EXPORT_FORMATS,
  EXPORT_MIME_TYPES,
  type ExportFormat,
  type ExportOptions,
  type ExportResult,
} from './main/output/ExportService.js';

export { loadConfig, loadDotenv, type SopConfig } from './main/config.js';
export {
  SOPError,
  ConfigurationError,
  AssetProcessingError,
  GenerationError,
  RenderError,
} from './main/errors.js';

export { SOPPipeline, SOPPipelineError, type SOPPipelineOptions, type SOPPipelineResult } from './cli/SOPPipeline.js';

export { SOP_SECTIONS, SOP_DOCUMENT_TITLE, createTimestampTagPattern } from './shared/sop.js';
export { mimeTypeFor, VIDEO_MIME_TYPES, IMAGE_MIME_TYPES } from './shared/media.js';
