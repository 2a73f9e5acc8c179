/**
 * Tool: export_sop
 *
 * Render an existing SOP markdown file to HTML or PDF.
 */

import { z } from 'zod';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { errorMessage } from '../../main/errors.js';
import { exportService } from '../../main/output/ExportService.js';
import { errorResult, textResult, type ToolRegistrar } from '../types.js';

export function register(server: ToolRegistrar): void {
  server.tool(
    'export_sop',
    'Export an SOP markdown file to a standalone HTML page or a PDF.',
    {
      markdownPath: z.string().describe('Absolute path to the SOP markdown file'),
      format: z.enum(['html', 'pdf']).describe('Export format'),
      outputPath: z.string().optional().describe('Output file (default: beside the markdown file)'),
    },
    async ({ markdownPath, format, outputPath }) => {
      let markdown: string;
      try {
        markdown = await readFile(markdownPath, 'utf-8');
      } catch (error) {
        return errorResult(`Cannot read markdown file: ${markdownPath} (${errorMessage(error)})`);
      }

      const target = outputPath ? resolve(outputPath) : exportService.siblingPath(markdownPath, format);
      const result = await exportService.export(markdown, { format, outputPath: target });

      if (!result.success) {
        return errorResult(`Export failed: ${result.error ?? 'unknown error'}`);
      }
      return textResult(`${format.toUpperCase()} written (${result.fileSize ?? 0} bytes)\nOUTPUT:${result.outputPath}`);
    },
  );
}
