/**
 * SOPPipeline.ts - End-to-end SOP generation for the CLI and MCP surfaces
 *
 * Validates inputs, uploads the video (and optional image) to Gemini, waits
 * for processing, generates the document, swaps timestamp tags for inline
 * snapshots and writes the markdown plus any requested exports.
 */

import { mkdir, stat, writeFile } from 'fs/promises';
import { basename, join } from 'path';

import { AssetUploader } from '../main/ai/AssetUploader.js';
import { DocumentGenerator } from '../main/ai/DocumentGenerator.js';
import { ModelSession, pickDefaultModel } from '../main/ai/ModelSession.js';
import { composePrompt } from '../main/ai/PromptComposer.js';
import type { Asset, GeneratedDocument, PollPolicy } from '../main/ai/types.js';
import { ConfigurationError, SOPError, errorMessage } from '../main/errors.js';
import { exportService, type ExportFormat, type ExportResult } from '../main/output/ExportService.js';
import { FrameAnnotator, type AnnotationResult } from '../main/pipeline/FrameAnnotator.js';
import { FrameExtractor } from '../main/pipeline/FrameExtractor.js';
import {
  ACCEPTED_IMAGE_EXTENSIONS,
  ACCEPTED_VIDEO_EXTENSIONS,
  mimeTypeFor,
  type MediaKind,
} from '../shared/media.js';
import { createTimestampTagPattern } from '../shared/sop.js';

// ============================================================================
// Types
// ============================================================================

export interface SOPPipelineOptions {
  videoPath: string;
  outputDir: string;
  /** Explicit model; otherwise picked from the provider's list */
  model?: string;
  observationText?: string;
  imagePath?: string;
  /** Extra exports beside the markdown, which is always written */
  formats: ExportFormat[];
  skipFrames: boolean;
  /** Also log unresolved tags and each written export */
  verbose: boolean;
  apiKey?: string;
  pollPolicy?: Omit<Partial<PollPolicy>, 'signal'>;
  snapshotMaxWidth?: number;
  snapshotQuality?: number;
  ffmpegPath?: string;
  ffprobePath?: string;
}

export interface SOPPipelineResult {
  outputPath: string;
  document: GeneratedDocument;
  exports: ExportResult[];
  model: string;
  /** Timestamp tags in the generated text */
  markers: number;
  /** Tags replaced with a snapshot */
  snapshots: number;
  unresolvedMarkers: string[];
  durationSeconds: number;
}

type LogFn = (message: string) => void;

// ============================================================================
// Exit code constants
// ============================================================================

export const EXIT_SUCCESS = 0;
export const EXIT_USER_ERROR = 1;
export const EXIT_SYSTEM_ERROR = 2;
export const EXIT_SIGINT = 130;

// ============================================================================
// SOPPipeline Class
// ============================================================================

export class SOPPipeline {
  private options: SOPPipelineOptions;
  private log: LogFn;
  private progress: LogFn;
  private abortController = new AbortController();

  constructor(options: SOPPipelineOptions, log: LogFn, progress?: LogFn) {
    this.options = options;
    this.log = log;
    this.progress = progress ?? (() => {});
  }

  /**
   * Run the full pipeline: validate -> upload -> wait -> generate ->
   * annotate -> write.
   *
   * @throws SOPPipelineError with `user` or `system` severity
   */
  async run(): Promise<SOPPipelineResult> {
    try {
      return await this.runPipeline();
    } catch (error) {
      throw toPipelineError(error);
    }
  }

  /**
   * Stop waiting on provider-side processing. Generation already in flight
   * runs to completion; nothing after it is written.
   */
  abort(): void {
    this.abortController.abort();
  }

  private async runPipeline(): Promise<SOPPipelineResult> {
    const startTime = Date.now();
    const { videoPath, imagePath } = this.options;

    // Step 0: Validate inputs
    const videoMimeType = await this.validateMediaFile(videoPath, 'video');
    const imageMimeType = imagePath ? await this.validateMediaFile(imagePath, 'image') : null;

    // Step 1: Ensure output directory exists
    await this.ensureOutputDir();

    // Step 2: Provider session
    const session = new ModelSession();
    if (!session.configure(this.options.apiKey)) {
      throw new SOPPipelineError(
        'No Google AI API key configured.\n' +
        '  Set GOOGLE_API_KEY in your environment or .env file, or pass --api-key.',
        'user',
      );
    }

    // Step 3: Resolve model
    const model = this.options.model ?? pickDefaultModel(await session.listGenerationCapableModels());
    this.log(`  Using model: ${model}`);

    // Step 4: Upload and wait for processing
    const uploader = new AssetUploader(session);
    this.progress('Uploading video...');
    const video = await this.uploadAndWait(uploader, videoPath, videoMimeType);

    let image: Asset | undefined;
    if (imagePath && imageMimeType) {
      this.progress('Uploading observation image...');
      image = await this.uploadAndWait(uploader, imagePath, imageMimeType);
    }

    // Step 5: Generate
    this.progress('Generating SOP (this may take a while)...');
    const request = composePrompt({
      video,
      observationText: this.options.observationText,
      observationImage: image,
    });
    const rawText = await new DocumentGenerator(session).generate(request, model);
    this.throwIfAborted();

    // Step 6: Snapshots (unless --no-frames)
    let annotation: AnnotationResult;
    if (!this.options.skipFrames) {
      this.progress('Embedding video snapshots...');
      annotation = await this.createAnnotator().annotateDetailed(rawText, videoPath);
    } else {
      const markers = [...rawText.matchAll(createTimestampTagPattern())].map(([tag]) => tag);
      annotation = { text: rawText, markers: markers.length, embedded: 0, unresolved: markers };
      this.log('  Snapshot embedding skipped (--no-frames)');
    }
    this.log(`  ${annotation.embedded}/${annotation.markers} timestamp(s) embedded`);
    if (this.options.verbose) {
      for (const marker of annotation.unresolved) {
        this.log(`    unresolved: ${marker}`);
      }
    }
    const document: GeneratedDocument = Object.freeze({ rawText, annotatedText: annotation.text });

    // Step 7: Write outputs
    this.progress('Writing SOP...');
    const generatedAt = new Date();
    const outputPath = join(this.options.outputDir, this.generateOutputFilename('.md'));
    try {
      await writeFile(outputPath, document.annotatedText, 'utf-8');
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
      throw new SOPPipelineError(
        `Failed to write output file: ${outputPath}\n` +
        `  Reason: ${code === 'ENOSPC' ? 'Disk is full' : errorMessage(error)}`,
        'system',
      );
    }

    const exports: ExportResult[] = [];
    for (const format of new Set(this.options.formats)) {
      if (format === 'markdown') continue;
      this.progress(`Exporting ${format.toUpperCase()}...`);
      const result = await exportService.export(document.annotatedText, {
        format,
        outputPath: exportService.siblingPath(outputPath, format),
        generatedAt,
        model,
      });
      if (!result.success) {
        this.log(`  WARNING: ${format} export failed: ${result.error ?? 'unknown error'}`);
      } else if (this.options.verbose) {
        this.log(`  ${format} written: ${result.outputPath} (${result.fileSize ?? 0} bytes)`);
      }
      exports.push(result);
    }

    return {
      outputPath,
      document,
      exports,
      model,
      markers: annotation.markers,
      snapshots: annotation.embedded,
      unresolvedMarkers: annotation.unresolved,
      durationSeconds: (Date.now() - startTime) / 1000,
    };
  }

  /**
   * Generate the output filename based on the video filename and current date (UTC).
   */
  generateOutputFilename(extension = '.md'): string {
    const videoName = basename(this.options.videoPath)
      .replace(/\.[^.]+$/, '')
      .replace(/[^a-zA-Z0-9_-]/g, '-')
      .replace(/-+/g, '-');

    const now = new Date();
    const dateStr = [
      now.getUTCFullYear(),
      String(now.getUTCMonth() + 1).padStart(2, '0'),
      String(now.getUTCDate()).padStart(2, '0'),
    ].join('');
    const timeStr = [
      String(now.getUTCHours()).padStart(2, '0'),
      String(now.getUTCMinutes()).padStart(2, '0'),
      String(now.getUTCSeconds()).padStart(2, '0'),
    ].join('');

    const ext = extension.startsWith('.') ? extension : `.${extension}`;
    return `${videoName}-sop-${dateStr}-${timeStr}${ext}`;
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  /**
   * Validate a regular, non-empty file with an accepted extension. Returns
   * its MIME type.
   */
  private async validateMediaFile(filePath: string, kind: MediaKind): Promise<string> {
    const label = kind === 'video' ? 'Video' : 'Image';

    let stats;
    try {
      stats = await stat(filePath);
    } catch {
      throw new SOPPipelineError(`${label} file not found: ${filePath}`, 'user');
    }

    if (!stats.isFile()) {
      throw new SOPPipelineError(`Not a regular file: ${filePath}`, 'user');
    }

    if (stats.size === 0) {
      throw new SOPPipelineError(`${label} file is empty (0 bytes): ${filePath}`, 'user');
    }

    const mimeType = mimeTypeFor(filePath, kind);
    if (!mimeType) {
      const accepted = kind === 'video' ? ACCEPTED_VIDEO_EXTENSIONS : ACCEPTED_IMAGE_EXTENSIONS;
      throw new SOPPipelineError(
        `Unsupported ${kind} format: ${filePath}\n  Accepted: ${accepted.join(', ')}`,
        'user',
      );
    }

    return mimeType;
  }

  private async ensureOutputDir(): Promise<void> {
    try {
      await mkdir(this.options.outputDir, { recursive: true });
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? String(error.code) : 'unknown';
      if (code === 'EACCES') {
        throw new SOPPipelineError(
          `Permission denied: cannot create output directory: ${this.options.outputDir}`,
          'user',
        );
      }
      throw new SOPPipelineError(
        `Cannot create output directory: ${this.options.outputDir} (${code})`,
        'system',
      );
    }
  }

  private async uploadAndWait(uploader: AssetUploader, filePath: string, mimeType: string): Promise<Asset> {
    const uploaded = await uploader.upload(filePath, mimeType);
    if (uploaded.state !== 'ACTIVE') {
      this.log(`  Waiting for ${uploaded.name} to finish processing...`);
    }
    const [active] = await uploader.awaitActive([uploaded], {
      ...this.options.pollPolicy,
      signal: this.abortController.signal,
    });
    return active;
  }

  private createAnnotator(): FrameAnnotator {
    return new FrameAnnotator(
      new FrameExtractor({
        ffmpegPath: this.options.ffmpegPath,
        ffprobePath: this.options.ffprobePath,
        maxWidth: this.options.snapshotMaxWidth,
        quality: this.options.snapshotQuality,
      }),
    );
  }

  private throwIfAborted(): void {
    if (this.abortController.signal.aborted) {
      throw new SOPPipelineError('Pipeline aborted', 'system');
    }
  }
}

// ============================================================================
// Error class with severity for exit code distinction
// ============================================================================

export type ErrorSeverity = 'user' | 'system';

export class SOPPipelineError extends Error {
  public readonly severity: ErrorSeverity;

  constructor(message: string, severity: ErrorSeverity, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SOPPipelineError';
    this.severity = severity;
  }
}

/**
 * Credential and configuration problems are the user's to fix; everything
 * the provider, ffmpeg or the filesystem throws is a system error.
 */
export function toPipelineError(error: unknown): SOPPipelineError {
  if (error instanceof SOPPipelineError) {
    return error;
  }
  if (error instanceof ConfigurationError) {
    return new SOPPipelineError(error.message, 'user', error);
  }
  if (error instanceof SOPError) {
    return new SOPPipelineError(`${error.message} [${error.code}]`, 'system', error);
  }
  return new SOPPipelineError(errorMessage(error), 'system', error);
}
