/**
 * Tool: generate_sop
 *
 * Run a procedure video through the SOP pipeline and write the document
 * (plus optional HTML/PDF exports) to disk.
 */

import { z } from 'zod';
import { tmpdir } from 'os';
import { join } from 'path';
import { SOPPipeline } from '../../cli/SOPPipeline.js';
import { loadConfig } from '../../main/config.js';
import { errorMessage } from '../../main/errors.js';
import { EXPORT_FORMATS } from '../../main/output/ExportService.js';
import { createLogger } from '../../main/utils/logger.js';
import { errorResult, textResult, type ToolRegistrar } from '../types.js';

const log = createLogger('mcp:generate_sop');

/** Where documents go when the caller names no directory */
export const DEFAULT_MCP_OUTPUT_DIR = join(tmpdir(), 'sopgen-output');

export function register(server: ToolRegistrar): void {
  server.tool(
    'generate_sop',
    'Generate a Standard Operating Procedure from a maintenance video. Timestamp references in the document are replaced with inline video snapshots.',
    {
      videoPath: z.string().describe('Absolute path to the procedure video (mp4, mov, avi, mkv)'),
      notes: z.string().optional().describe("Technician's observations to include in the prompt"),
      imagePath: z.string().optional().describe('Observation image (jpg, jpeg, png)'),
      model: z.string().optional().describe('Model name (default: best available)'),
      outputDir: z.string().optional().describe('Output directory (default: system temp directory)'),
      formats: z
        .array(z.enum(EXPORT_FORMATS))
        .optional()
        .describe('Additional export formats; markdown is always written'),
      skipFrames: z.boolean().optional().default(false).describe('Leave timestamp tags as text'),
    },
    async ({ videoPath, notes, imagePath, model, outputDir, formats, skipFrames }) => {
      try {
        const config = loadConfig();
        log.info(`Generating SOP for ${videoPath}`);

        const pipeline = new SOPPipeline(
          {
            videoPath,
            outputDir: outputDir ?? DEFAULT_MCP_OUTPUT_DIR,
            model: model ?? config.model,
            observationText: notes,
            imagePath,
            formats: formats ?? [],
            skipFrames,
            verbose: false,
            apiKey: config.apiKey,
            pollPolicy: { intervalMs: config.pollIntervalMs, timeoutMs: config.pollTimeoutMs },
            snapshotMaxWidth: config.snapshotMaxWidth,
            snapshotQuality: config.snapshotQuality,
            ffmpegPath: config.ffmpegPath,
            ffprobePath: config.ffprobePath,
          },
          (msg) => log.debug(msg),
          (msg) => log.info(msg),
        );

        const result = await pipeline.run();

        const lines = [
          'SOP generated',
          `  Model: ${result.model}`,
          `  Snapshots: ${result.snapshots}/${result.markers}`,
          `  Processing time: ${result.durationSeconds.toFixed(1)}s`,
        ];
        if (result.unresolvedMarkers.length > 0) {
          lines.push(`  Left as text: ${result.unresolvedMarkers.join(', ')}`);
        }
        for (const exported of result.exports) {
          lines.push(
            exported.success
              ? `  ${exported.format.toUpperCase()}: ${exported.outputPath}`
              : `  ${exported.format.toUpperCase()} export failed: ${exported.error ?? 'unknown error'}`,
          );
        }
        lines.push('', `Document: ${result.outputPath}`, `OUTPUT:${result.outputPath}`);

        return textResult(lines.join('\n'));
      } catch (error) {
        log.error(`generate_sop failed: ${errorMessage(error)}`);
        return errorResult(errorMessage(error));
      }
    },
  );
}
