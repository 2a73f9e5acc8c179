/**
 * ExportService Unit Tests
 *
 * Exports into a real temporary directory:
 * - Markdown written as-is
 * - HTML into a directory that does not exist yet
 * - PDF failures reported in the result, not thrown
 * - Sibling paths and MIME types
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  EXPORT_MIME_TYPES,
  exportService,
  isExportFormat,
} from '../../src/main/output/ExportService.js';

const SAMPLE = '# Pump Seal Replacement\n\n1. Isolate the pump\n2. Drain the casing\n';

describe('ExportService', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sop-export-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes markdown unchanged and reports its size', async () => {
    const outputPath = join(dir, 'pump.md');

    const result = await exportService.export(SAMPLE, { format: 'markdown', outputPath });

    expect(result).toEqual({
      success: true,
      format: 'markdown',
      outputPath,
      fileSize: Buffer.byteLength(SAMPLE),
    });
    await expect(readFile(outputPath, 'utf-8')).resolves.toBe(SAMPLE);
  });

  it('creates missing directories for HTML exports', async () => {
    const outputPath = join(dir, 'nested', 'deeper', 'pump.html');

    const result = await exportService.export(SAMPLE, { format: 'html', outputPath, title: 'Pump SOP' });

    expect(result.success).toBe(true);
    const html = await readFile(outputPath, 'utf-8');
    expect(html).toContain('<title>Pump SOP</title>');
    expect(html).toContain('<li>Isolate the pump</li>');
  });

  it('writes a PDF', async () => {
    const outputPath = join(dir, 'pump.pdf');

    const result = await exportService.export(SAMPLE, { format: 'pdf', outputPath });

    expect(result.success).toBe(true);
    const pdf = await readFile(outputPath);
    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  it('reports a failed PDF render without throwing', async () => {
    const outputPath = join(dir, 'broken.pdf');

    const result = await exportService.export('![bad](data:image/png;base64,AAAA)', {
      format: 'pdf',
      outputPath,
    });

    expect(result.success).toBe(false);
    expect(result.format).toBe('pdf');
    expect(result.error).toContain('Embedded image could not be decoded');
  });

  it('fails a PDF whose text the built-in fonts cannot encode, without writing it', async () => {
    const outputPath = join(dir, 'arrows.pdf');

    const result = await exportService.export('1. Open valve → wait', { format: 'pdf', outputPath });

    expect(result).toEqual({
      success: false,
      format: 'pdf',
      outputPath,
      error: 'PDF generation failed: unsupported characters for the built-in fonts: U+2192',
    });
    await expect(stat(outputPath)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('derives sibling paths by format', () => {
    const markdownPath = join(dir, 'pump-sop-20260304-050607.md');

    expect(exportService.siblingPath(markdownPath, 'html')).toBe(join(dir, 'pump-sop-20260304-050607.html'));
    expect(exportService.siblingPath(markdownPath, 'pdf')).toBe(join(dir, 'pump-sop-20260304-050607.pdf'));
  });

  it('exposes MIME types per format', () => {
    expect(EXPORT_MIME_TYPES).toEqual({
      markdown: 'text/markdown',
      html: 'text/html',
      pdf: 'application/pdf',
    });
  });

  it('recognizes export format names', () => {
    expect(isExportFormat('pdf')).toBe(true);
    expect(isExportFormat('docx')).toBe(false);
  });
});
