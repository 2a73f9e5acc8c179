#!/usr/bin/env node
/**
 * sopgen CLI - Turn maintenance videos into Standard Operating Procedures
 *
 * Usage:
 *   sopgen generate <video-file> [options]
 *
 * Runs a procedure video through the SOP pipeline:
 *   1. Upload the video (and optional observation image) to Gemini
 *   2. Wait for provider-side processing
 *   3. Generate the SOP from the video plus technician notes
 *   4. Replace [TIMESTAMP: MM:SS] tags with inline video snapshots
 *   5. Write Markdown, and optionally HTML and PDF
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { Command } from 'commander';
import { ModelSession, pickDefaultModel } from '../main/ai/ModelSession.js';
import { loadConfig, loadDotenv, type SopConfig } from '../main/config.js';
import { errorMessage } from '../main/errors.js';
import {
  EXPORT_FORMATS,
  exportService,
  isExportFormat,
  type ExportFormat,
} from '../main/output/ExportService.js';
import { setLogLevel } from '../main/utils/logger.js';
import { readPackageVersion } from '../shared/version.js';
import { runDoctorChecks } from './doctor.js';
import {
  SOPPipeline,
  SOPPipelineError,
  EXIT_SUCCESS,
  EXIT_USER_ERROR,
  EXIT_SYSTEM_ERROR,
  EXIT_SIGINT,
} from './SOPPipeline.js';

const VERSION = readPackageVersion();

// ============================================================================
// Console output helpers
// ============================================================================

const SYMBOLS = {
  check: '✔',    // checkmark
  cross: '✘',    // cross
  arrow: '→',    // right arrow
  bullet: '•',   // bullet
  warn: '⚠',     // warning sign
  line: '─',     // horizontal line
} as const;

function banner(): void {
  console.log();
  console.log(`  sopgen v${VERSION} ${SYMBOLS.bullet} SOP Generator`);
  console.log(`  ${SYMBOLS.line.repeat(40)}`);
  console.log();
}

function step(message: string): void {
  console.log(`  ${SYMBOLS.arrow} ${message}`);
}

function success(message: string): void {
  console.log(`  ${SYMBOLS.check} ${message}`);
}

function fail(message: string): void {
  console.log(`  ${SYMBOLS.cross} ${message}`);
}

function warnInsecureKey(): void {
  console.warn('  WARNING: Passing API keys via CLI args is insecure (visible in ps, shell history).');
  console.warn('  Use the GOOGLE_API_KEY env var or a .env file instead.');
  console.warn();
}

/**
 * Load .env and validate configuration, exiting with a user error when the
 * environment is malformed.
 */
function loadConfigOrExit(verbose = false): SopConfig {
  loadDotenv();
  try {
    const config = loadConfig();
    setLogLevel(verbose ? 'debug' : config.logLevel);
    return config;
  } catch (error) {
    fail(errorMessage(error));
    process.exit(EXIT_USER_ERROR);
  }
}

function parseFormats(value: string): ExportFormat[] {
  const formats = value
    .split(',')
    .map((format) => format.trim().toLowerCase())
    .filter(Boolean);

  const valid: ExportFormat[] = [];
  for (const format of formats) {
    if (!isExportFormat(format)) {
      fail(`Unknown format "${format}". Available: ${EXPORT_FORMATS.join(', ')}`);
      process.exit(EXIT_USER_ERROR);
    }
    valid.push(format);
  }
  return valid;
}

function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    fail(`${flag} must be a positive integer (got "${value}")`);
    process.exit(EXIT_USER_ERROR);
  }
  return parsed;
}

// ============================================================================
// Signal handling
// ============================================================================

let activePipeline: SOPPipeline | null = null;

function setupSignalHandlers(): void {
  const handler = () => {
    console.log('\n  Interrupted - stopping...');
    activePipeline?.abort();
    process.exit(EXIT_SIGINT);
  };

  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
}

setupSignalHandlers();

// ============================================================================
// CLI definition
// ============================================================================

const program = new Command();

program
  .name('sopgen')
  .description('Generate Standard Operating Procedures from maintenance videos')
  .version(VERSION, '-v, --version')
  .showHelpAfterError('(use --help for available options)');

// ============================================================================
// generate command
// ============================================================================

program
  .command('generate')
  .description('Generate an SOP from a procedure video')
  .argument('<video-file>', 'Path to the procedure video (mp4, mov, avi, mkv)')
  .option('--notes <text>', "Technician's observations to include in the prompt")
  .option('--notes-file <path>', "File containing the technician's observations")
  .option('--image <file>', 'Observation image (jpg, jpeg, png)')
  .option('--model <name>', 'Model to use (default: SOPGEN_MODEL or best available)')
  .option('--output <dir>', 'Output directory', './sop-output')
  .option('--format <list>', `Comma-separated formats (${EXPORT_FORMATS.join(', ')})`, 'markdown')
  .option('--no-frames', 'Leave [TIMESTAMP] tags as text instead of embedding snapshots')
  .option('--api-key <key>', 'Google AI API key (prefer GOOGLE_API_KEY env var)')
  .option('--poll-timeout <ms>', 'Give up waiting for video processing after this many ms')
  .option('--verbose', 'Verbose output', false)
  .action(async (videoFile: string, options: {
    notes?: string;
    notesFile?: string;
    image?: string;
    model?: string;
    output: string;
    format: string;
    frames: boolean;
    apiKey?: string;
    pollTimeout?: string;
    verbose: boolean;
  }) => {
    banner();
    const config = loadConfigOrExit(options.verbose);

    // Resolve paths
    const videoPath = resolve(videoFile);
    const outputDir = resolve(options.output);
    const imagePath = options.image ? resolve(options.image) : undefined;
    const formats = parseFormats(options.format);

    if (options.apiKey) {
      warnInsecureKey();
    }

    let observationText = options.notes;
    if (options.notesFile) {
      const notesPath = resolve(options.notesFile);
      if (!existsSync(notesPath)) {
        fail(`Notes file not found: ${notesPath}`);
        process.exit(EXIT_USER_ERROR);
      }
      const fileNotes = await readFile(notesPath, 'utf-8');
      observationText = observationText ? `${observationText}\n${fileNotes}` : fileNotes;
    }

    const pollTimeoutMs = options.pollTimeout
      ? parsePositiveInt(options.pollTimeout, '--poll-timeout')
      : config.pollTimeoutMs;

    step(`Video:  ${videoPath}`);
    if (imagePath) {
      step(`Image:  ${imagePath}`);
    }
    step(`Output: ${outputDir}`);
    console.log();

    const pipeline = new SOPPipeline(
      {
        videoPath,
        outputDir,
        model: options.model ?? config.model,
        observationText,
        imagePath,
        formats,
        skipFrames: !options.frames,
        verbose: options.verbose,
        apiKey: options.apiKey ?? config.apiKey,
        pollPolicy: { intervalMs: config.pollIntervalMs, timeoutMs: pollTimeoutMs },
        snapshotMaxWidth: config.snapshotMaxWidth,
        snapshotQuality: config.snapshotQuality,
        ffmpegPath: config.ffmpegPath,
        ffprobePath: config.ffprobePath,
      },
      options.verbose ? step : () => {},
      step, // progress, always visible
    );

    activePipeline = pipeline;

    try {
      step('Starting SOP pipeline...');
      console.log();

      const result = await pipeline.run();

      console.log();
      success('SOP generated!');
      console.log();
      console.log(`  Model:           ${result.model}`);
      console.log(`  Snapshots:       ${result.snapshots}/${result.markers}`);
      console.log(`  Processing time: ${result.durationSeconds.toFixed(1)}s`);
      if (result.unresolvedMarkers.length > 0 && options.frames) {
        console.log(`  ${SYMBOLS.warn} Left as text: ${result.unresolvedMarkers.join(', ')}`);
      }
      for (const exported of result.exports) {
        if (exported.success) {
          success(`${exported.format.toUpperCase()}: ${exported.outputPath}`);
        } else {
          fail(`${exported.format.toUpperCase()} export failed: ${exported.error ?? 'unknown error'}`);
        }
      }
      console.log();
      // Stable prefix for scripts (e.g., `sopgen generate ... | grep '^OUTPUT:'`)
      console.log(`  Output: ${result.outputPath}`);
      console.log(`OUTPUT:${result.outputPath}`);
      console.log();
    } catch (error) {
      console.log();
      fail(`SOP generation failed: ${errorMessage(error)}`);

      if (options.verbose && error instanceof Error && error.stack) {
        console.log();
        console.log(error.stack);
      }

      const exitCode =
        error instanceof SOPPipelineError && error.severity === 'user'
          ? EXIT_USER_ERROR
          : EXIT_SYSTEM_ERROR;
      process.exit(exitCode);
    } finally {
      activePipeline = null;
    }
  });

// ============================================================================
// models command
// ============================================================================

program
  .command('models')
  .description('List models that can generate SOPs')
  .option('--api-key <key>', 'Google AI API key (prefer GOOGLE_API_KEY env var)')
  .action(async (options: { apiKey?: string }) => {
    const config = loadConfigOrExit();

    if (options.apiKey) {
      warnInsecureKey();
    }

    const session = new ModelSession();
    if (!session.configure(options.apiKey ?? config.apiKey)) {
      fail('No Google AI API key configured.');
      console.log('  Set GOOGLE_API_KEY in your environment or .env file, or pass --api-key.');
      process.exit(EXIT_USER_ERROR);
    }

    const models = await session.listGenerationCapableModels();
    if (models.length === 0) {
      fail('No generation-capable models available (check your API key and network).');
      process.exit(EXIT_SYSTEM_ERROR);
    }

    const defaultModel = config.model ?? pickDefaultModel(models);
    for (const model of models) {
      console.log(model === defaultModel ? `${model} (default)` : model);
    }
  });

// ============================================================================
// export command
// ============================================================================

program
  .command('export')
  .description('Export an SOP markdown file to HTML or PDF')
  .argument('<markdown-file>', 'Path to the SOP markdown file')
  .requiredOption('--format <format>', 'Export format (html, pdf)')
  .option('--output <file>', 'Output file (default: beside the markdown file)')
  .option('--title <title>', 'Document title')
  .action(async (markdownFile: string, options: { format: string; output?: string; title?: string }) => {
    loadConfigOrExit();
    const markdownPath = resolve(markdownFile);

    if (!existsSync(markdownPath)) {
      fail(`Markdown file not found: ${markdownPath}`);
      process.exit(EXIT_USER_ERROR);
    }

    const format = options.format.trim().toLowerCase();
    if (format !== 'html' && format !== 'pdf') {
      fail(`Unknown export format "${options.format}". Available: html, pdf`);
      process.exit(EXIT_USER_ERROR);
    }

    const outputPath = options.output
      ? resolve(options.output)
      : exportService.siblingPath(markdownPath, format);

    const markdown = await readFile(markdownPath, 'utf-8');
    const result = await exportService.export(markdown, { format, outputPath, title: options.title });

    if (!result.success) {
      fail(`Export failed: ${result.error ?? 'unknown error'}`);
      process.exit(EXIT_SYSTEM_ERROR);
    }

    success(`${format.toUpperCase()} written (${result.fileSize ?? 0} bytes)`);
    console.log(`OUTPUT:${result.outputPath}`);
  });

// ============================================================================
// doctor command
// ============================================================================

program
  .command('doctor')
  .description('Check that ffmpeg, ffprobe and the API key are set up')
  .action(async () => {
    banner();
    const config = loadConfigOrExit();

    const result = await runDoctorChecks({
      ffmpegPath: config.ffmpegPath,
      ffprobePath: config.ffprobePath,
    });

    for (const check of result.checks) {
      const symbol =
        check.status === 'pass' ? SYMBOLS.check : check.status === 'warn' ? SYMBOLS.warn : SYMBOLS.cross;
      console.log(`  ${symbol} ${check.name}: ${check.message}`);
      if (check.hint && check.status !== 'pass') {
        for (const line of check.hint.split('\n')) {
          console.log(`      ${line}`);
        }
      }
    }

    console.log();
    console.log(`  ${result.passed} passed, ${result.warned} warning(s), ${result.failed} failed`);
    console.log();
    process.exit(result.failed > 0 ? EXIT_USER_ERROR : EXIT_SUCCESS);
  });

// Show help if no command provided
if (process.argv.length <= 2) {
  banner();
  program.outputHelp();
  process.exit(EXIT_SUCCESS);
}

await program.parseAsync();
