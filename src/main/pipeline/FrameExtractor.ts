/**
 * FrameExtractor.ts - Video snapshots via ffmpeg and sharp
 *
 * Grabs a single frame at a given offset with the system ffmpeg binary,
 * downsizes it with sharp and returns it as a JPEG data URI. Any failure
 * (no ffmpeg, offset past the end, undecodable frame) yields null so the
 * caller can leave its timestamp tag as-is.
 */

import { execFile as execFileCb } from 'child_process';
import { promisify } from 'util';
import sharp from 'sharp';
import { errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { formatTimestamp } from './timestamps.js';

const execFile = promisify(execFileCb);

// ============================================================================
// Types
// ============================================================================

export interface FrameExtractorOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  /** Snapshots wider than this are scaled down, aspect ratio preserved */
  maxWidth?: number;
  /** JPEG quality (1-100) */
  quality?: number;
}

/**
 * Anything that can turn (video, offset) into an inline image. The annotator
 * depends on this rather than on ffmpeg directly.
 */
export interface FrameSource {
  extractFrame(videoPath: string, seconds: number): Promise<string | null>;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_MAX_WIDTH = 400;
const DEFAULT_QUALITY = 85;

/** Timeout for a single ffmpeg frame extraction (10 seconds) */
const FFMPEG_FRAME_TIMEOUT_MS = 10_000;

/** Timeout for ffmpeg version check and ffprobe (5 seconds) */
const FFMPEG_CHECK_TIMEOUT_MS = 5_000;

/** A decoded PNG of a 4K frame fits comfortably below this */
const FRAME_MAX_BUFFER_BYTES = 64 * 1024 * 1024;

// ============================================================================
// FrameExtractor Class
// ============================================================================

export class FrameExtractor implements FrameSource {
  private readonly ffmpegPath: string;
  private readonly ffprobePath: string;
  private readonly maxWidth: number;
  private readonly quality: number;
  private ffmpegChecked: boolean = false;
  private ffmpegAvailable: boolean = false;
  private durations = new Map<string, number | null>();
  private log = createLogger('FrameExtractor');

  constructor(options: FrameExtractorOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
    this.maxWidth = options.maxWidth ?? DEFAULT_MAX_WIDTH;
    this.quality = options.quality ?? DEFAULT_QUALITY;
  }

  /**
   * Check if ffmpeg is installed and accessible.
   * Result is cached after the first check.
   */
  async checkFfmpeg(): Promise<boolean> {
    if (this.ffmpegChecked) {
      return this.ffmpegAvailable;
    }

    try {
      await execFile(this.ffmpegPath, ['-version'], {
        timeout: FFMPEG_CHECK_TIMEOUT_MS,
      });
      this.ffmpegAvailable = true;
      this.log.debug('ffmpeg is available');
    } catch {
      this.ffmpegAvailable = false;
      this.log.warn('ffmpeg is not available - snapshots will be skipped');
    }

    this.ffmpegChecked = true;
    return this.ffmpegAvailable;
  }

  /**
   * Video duration in seconds, or null when ffprobe cannot tell. Cached per
   * path for the lifetime of this extractor.
   */
  async probeDuration(videoPath: string): Promise<number | null> {
    const cached = this.durations.get(videoPath);
    if (cached !== undefined) {
      return cached;
    }

    let duration: number | null = null;
    try {
      const { stdout } = await execFile(
        this.ffprobePath,
        [
          '-v', 'error',
          '-show_entries', 'format=duration',
          '-of', 'default=noprint_wrappers=1:nokey=1',
          videoPath,
        ],
        { timeout: FFMPEG_CHECK_TIMEOUT_MS },
      );
      const parsed = Number.parseFloat(stdout.trim());
      duration = Number.isFinite(parsed) ? parsed : null;
    } catch (error) {
      this.log.debug(`ffprobe could not read ${videoPath}: ${errorMessage(error)}`);
    }

    this.durations.set(videoPath, duration);
    return duration;
  }

  /**
   * Snapshot of the frame at `seconds` as a `data:image/jpeg;base64,...` URI,
   * or null when no frame can be produced.
   */
  async extractFrame(videoPath: string, seconds: number): Promise<string | null> {
    const label = formatTimestamp(seconds);

    if (!(await this.checkFfmpeg())) {
      return null;
    }

    const duration = await this.probeDuration(videoPath);
    if (duration !== null && seconds >= duration) {
      this.log.warn(`Snapshot at ${label} is past the end of the video (${duration.toFixed(2)}s)`);
      return null;
    }

    let frame: Buffer;
    try {
      frame = await this.grabFrame(videoPath, seconds);
    } catch (error) {
      this.log.warn(`Failed to extract frame at ${label}: ${errorMessage(error)}`);
      return null;
    }

    if (frame.length === 0) {
      this.log.warn(`No frame decoded at ${label}`);
      return null;
    }

    try {
      const jpeg = await this.encodeSnapshot(frame);
      this.log.debug(`Extracted snapshot at ${label} (${jpeg.length} bytes)`);
      return `data:image/jpeg;base64,${jpeg.toString('base64')}`;
    } catch (error) {
      this.log.warn(`Could not encode frame at ${label}: ${errorMessage(error)}`);
      return null;
    }
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  /**
   * Decode one frame to PNG bytes on stdout.
   */
  private async grabFrame(videoPath: string, seconds: number): Promise<Buffer> {
    // -ss before -i for fast seeking
    // -frames:v 1 to extract exactly one frame
    const args = [
      '-v', 'error',
      '-ss', String(seconds),
      '-i', videoPath,
      '-frames:v', '1',
      '-f', 'image2pipe',
      '-vcodec', 'png',
      'pipe:1',
    ];

    const { stdout } = await execFile(this.ffmpegPath, args, {
      encoding: 'buffer',
      timeout: FFMPEG_FRAME_TIMEOUT_MS,
      maxBuffer: FRAME_MAX_BUFFER_BYTES,
    });
    return stdout;
  }

  /**
   * Resize to maxWidth (only when wider) and re-encode as JPEG.
   */
  private async encodeSnapshot(frame: Buffer): Promise<Buffer> {
    const metadata = await sharp(frame).metadata();
    const originalWidth = metadata.width ?? 0;

    let pipeline = sharp(frame);
    if (originalWidth > this.maxWidth) {
      pipeline = pipeline.resize({ width: this.maxWidth, withoutEnlargement: true });
    }

    return pipeline.jpeg({ quality: this.quality }).toBuffer();
  }
}
