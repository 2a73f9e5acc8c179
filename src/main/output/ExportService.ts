/**
 * ExportService - Multi-Format Export for generated SOPs
 *
 * Supports:
 * - Markdown (the document as generated, snapshots inline)
 * - HTML (standalone, self-contained)
 * - PDF (pdfkit, titled header on every page)
 *
 * Every export reports success or failure in its result; nothing here
 * throws for I/O or render errors.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { renderPdf } from './PdfRenderer.js';
import { generateHtmlDocument } from './templates/html-template.js';

const log = createLogger('ExportService');

// ============================================================================
// Types
// ============================================================================

export const EXPORT_FORMATS = ['markdown', 'html', 'pdf'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const EXPORT_EXTENSIONS: Record<ExportFormat, string> = {
  markdown: '.md',
  html: '.html',
  pdf: '.pdf',
};

export const EXPORT_MIME_TYPES: Record<ExportFormat, string> = {
  markdown: 'text/markdown',
  html: 'text/html',
  pdf: 'application/pdf',
};

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

export interface ExportOptions {
  format: ExportFormat;
  outputPath: string;
  title?: string;
  theme?: 'dark' | 'light';
  generatedAt?: Date;
  model?: string;
}

export interface ExportResult {
  success: boolean;
  format: ExportFormat;
  outputPath: string;
  fileSize?: number;
  error?: string;
}

// ============================================================================
// Export Service Class
// ============================================================================

class ExportServiceImpl {
  /**
   * Export an SOP document to the specified format
   */
  async export(markdown: string, options: ExportOptions): Promise<ExportResult> {
    const { format, outputPath } = options;

    try {
      const content = await this.render(markdown, options);

      // Ensure output directory exists
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.writeFile(outputPath, content);

      const stats = await fs.stat(outputPath);
      log.info(`${format} exported to ${outputPath} (${stats.size} bytes)`);

      return { success: true, format, outputPath, fileSize: stats.size };
    } catch (error) {
      log.error(`${format} export failed: ${errorMessage(error)}`);
      return { success: false, format, outputPath, error: errorMessage(error) };
    }
  }

  /**
   * Render without writing. Markdown passes through untouched.
   */
  async render(markdown: string, options: Omit<ExportOptions, 'outputPath'>): Promise<string | Buffer> {
    switch (options.format) {
      case 'markdown':
        return markdown;
      case 'html':
        return generateHtmlDocument(markdown, {
          title: options.title,
          theme: options.theme,
          generatedAt: options.generatedAt,
          model: options.model,
        });
      case 'pdf':
        return renderPdf(markdown, { title: options.title });
    }
  }

  /**
   * Path beside `markdownPath` with the extension of `format`
   */
  siblingPath(markdownPath: string, format: ExportFormat): string {
    const parsed = path.parse(markdownPath);
    return path.join(parsed.dir, `${parsed.name}${EXPORT_EXTENSIONS[format]}`);
  }
}

// ============================================================================
// Exports
// ============================================================================

export const exportService = new ExportServiceImpl();
export { ExportServiceImpl as ExportService };
