/**
 * PdfRenderer - SOP markdown to PDF bytes
 *
 * Renders the parsed document with pdfkit's built-in Helvetica/Courier
 * faces. Every page carries the document title as a centred header.
 * Snapshots are embedded from their data URIs at a fixed width; images are
 * validated with sharp up front so a corrupt snapshot fails the whole render
 * instead of producing a half-written file. The standard faces only encode
 * WinAnsi, so text outside it is rejected before drawing starts.
 */

import PDFDocument from 'pdfkit';
import sharp from 'sharp';
import { SOP_DOCUMENT_TITLE } from '../../shared/sop.js';
import { RenderError, SOPError, errorMessage } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { parseMarkdown, type Block, type Inline, type SopDocument } from './MarkdownParser.js';
import { decodeDataUri } from './templates/helpers.js';

const log = createLogger('PdfRenderer');

// ============================================================================
// Types
// ============================================================================

export interface PdfRenderOptions {
  title?: string;
  /** Width, in points, snapshots are drawn at */
  imageWidth?: number;
  /** Deflate page content streams (pdfkit default: true) */
  compress?: boolean;
}

interface LoadedImage {
  data: Buffer;
  width: number;
  height: number;
}

type ImageTable = Map<string, LoadedImage | null>;

type PdfDoc = PDFKit.PDFDocument;

// ============================================================================
// Layout constants
// ============================================================================

const PAGE_MARGINS = { top: 72, bottom: 56, left: 56, right: 56 };
const HEADER_Y = 30;
const HEADER_FONT_SIZE = 15;
const BODY_FONT_SIZE = 12;
const CODE_FONT_SIZE = 9;
const HEADING_FONT_SIZES: Record<1 | 2 | 3, number> = { 1: 20, 2: 16, 3: 13 };
const DEFAULT_IMAGE_WIDTH = 300;
const LIST_INDENT = 16;

const FONTS = {
  regular: 'Helvetica',
  bold: 'Helvetica-Bold',
  italic: 'Helvetica-Oblique',
  boldItalic: 'Helvetica-BoldOblique',
  mono: 'Courier',
} as const;

// WinAnsi code points outside Latin-1 (0x80-0x9F slots)
const WIN_ANSI_EXTRAS = new Set([
  0x20ac, 0x201a, 0x0192, 0x201e, 0x2026, 0x2020, 0x2021, 0x02c6, 0x2030, 0x0160, 0x2039, 0x0152, 0x017d,
  0x2018, 0x2019, 0x201c, 0x201d, 0x2022, 0x2013, 0x2014, 0x02dc, 0x2122, 0x0161, 0x203a, 0x0153, 0x017e,
  0x0178,
]);

// ============================================================================
// Encoding check
// ============================================================================

function isWinAnsi(codePoint: number): boolean {
  return (
    codePoint === 0x09 ||
    codePoint === 0x0a ||
    codePoint === 0x0d ||
    (codePoint >= 0x20 && codePoint <= 0x7e) ||
    (codePoint >= 0xa0 && codePoint <= 0xff) ||
    WIN_ANSI_EXTRAS.has(codePoint)
  );
}

function formatCodePoint(codePoint: number): string {
  return `U+${codePoint.toString(16).toUpperCase().padStart(4, '0')}`;
}

/**
 * @throws RenderError (`PDF_FAILED`) listing each distinct code point the
 * built-in fonts would print as unrelated glyphs
 */
export function assertEncodable(text: string): void {
  const unsupported = new Set<number>();
  for (const char of text) {
    const codePoint = char.codePointAt(0) ?? 0;
    if (!isWinAnsi(codePoint)) unsupported.add(codePoint);
  }
  if (unsupported.size > 0) {
    throw new RenderError(
      `PDF generation failed: unsupported characters for the built-in fonts: ${[...unsupported].map(formatCodePoint).join(', ')}`,
      'PDF_FAILED',
    );
  }
}

// ============================================================================
// Image preparation
// ============================================================================

function collectImageSources(document: SopDocument): string[] {
  const sources = new Set<string>();

  const visit = (nodes: readonly Inline[]): void => {
    for (const node of nodes) {
      if (node.type === 'image') sources.add(node.src);
      else if (node.type !== 'text') visit(node.children);
    }
  };

  for (const block of document.blocks) {
    switch (block.type) {
      case 'image':
        sources.add(block.src);
        break;
      case 'heading':
        visit(block.content);
        break;
      case 'paragraph':
        block.lines.forEach(visit);
        break;
      case 'list':
        block.items.forEach(visit);
        break;
      default:
        break;
    }
  }

  return [...sources];
}

/**
 * Decode and validate one data URI. pdfkit only embeds JPEG and PNG, so
 * anything else sharp can read is converted to PNG.
 */
async function loadImage(src: string): Promise<LoadedImage | null> {
  const decoded = decodeDataUri(src);
  if (!decoded) {
    return null;
  }

  try {
    const metadata = await sharp(decoded.data).metadata();
    const { width, height, format } = metadata;
    if (!width || !height) {
      throw new Error('image has no dimensions');
    }
    const data =
      format === 'jpeg' || format === 'png' ? decoded.data : await sharp(decoded.data).png().toBuffer();
    return { data, width, height };
  } catch (error) {
    throw new RenderError(`Embedded image could not be decoded: ${errorMessage(error)}`, 'INVALID_IMAGE', error);
  }
}

async function loadImages(document: SopDocument): Promise<ImageTable> {
  const table: ImageTable = new Map();
  for (const src of collectImageSources(document)) {
    table.set(src, await loadImage(src));
  }
  return table;
}

// ============================================================================
// Drawing
// ============================================================================

interface Style {
  bold: boolean;
  italic: boolean;
}

function fontFor(style: Style): string {
  if (style.bold && style.italic) return FONTS.boldItalic;
  if (style.bold) return FONTS.bold;
  if (style.italic) return FONTS.italic;
  return FONTS.regular;
}

type Segment = { kind: 'text'; text: string; style: Style } | { kind: 'image'; src: string; alt: string };

function flatten(nodes: readonly Inline[], style: Style, out: Segment[] = []): Segment[] {
  for (const node of nodes) {
    switch (node.type) {
      case 'text':
        out.push({ kind: 'text', text: node.text, style });
        break;
      case 'bold':
        flatten(node.children, { ...style, bold: true }, out);
        break;
      case 'italic':
        flatten(node.children, { ...style, italic: true }, out);
        break;
      case 'image':
        out.push({ kind: 'image', src: node.src, alt: node.alt });
        break;
    }
  }
  return out;
}

class PdfWriter {
  constructor(
    private readonly doc: PdfDoc,
    private readonly images: ImageTable,
    private readonly imageWidth: number,
  ) {}

  get contentWidth(): number {
    return this.doc.page.width - this.doc.page.margins.left - this.doc.page.margins.right;
  }

  block(block: Block): void {
    switch (block.type) {
      case 'heading': {
        this.doc.moveDown(0.5);
        this.line(block.content, HEADING_FONT_SIZES[block.level], { bold: true, italic: false });
        this.doc.moveDown(0.25);
        break;
      }
      case 'paragraph':
        for (const line of block.lines) {
          this.line(line, BODY_FONT_SIZE);
        }
        this.doc.moveDown(0.5);
        break;
      case 'list':
        block.items.forEach((item, index) => {
          const marker = block.ordered ? `${block.start + index}. ` : '• ';
          this.line(item, BODY_FONT_SIZE, { bold: false, italic: false }, marker);
        });
        this.doc.moveDown(0.5);
        break;
      case 'image':
        this.image(block.src, block.alt);
        break;
      case 'code':
        this.monospace(block.code);
        break;
      case 'diagram':
        this.doc.font(FONTS.bold).fontSize(BODY_FONT_SIZE).text('Process Flow Diagram');
        this.monospace(block.source);
        break;
    }
  }

  /**
   * One logical line of mixed-style runs. Images inside the line break the
   * run and are drawn on their own.
   */
  private line(
    nodes: readonly Inline[],
    fontSize: number,
    base: Style = { bold: false, italic: false },
    marker = '',
  ): void {
    const left = this.doc.page.margins.left;
    const indent = marker ? LIST_INDENT : 0;
    const segments = flatten(nodes, base);
    let pending: Array<{ text: string; style: Style }> = marker ? [{ text: marker, style: base }] : [];

    const flush = () => {
      if (pending.length === 0) return;
      this.doc.x = left + indent;
      pending.forEach((run, index) => {
        this.doc
          .font(fontFor(run.style))
          .fontSize(fontSize)
          .text(run.text, { continued: index < pending.length - 1, width: this.contentWidth - indent });
      });
      pending = [];
    };

    for (const segment of segments) {
      if (segment.kind === 'text') {
        pending.push({ text: segment.text, style: segment.style });
      } else {
        flush();
        this.image(segment.src, segment.alt);
      }
    }
    flush();
    this.doc.x = left;
  }

  private image(src: string, alt: string): void {
    const loaded = this.images.get(src);
    if (!loaded) {
      this.doc.font(FONTS.italic).fontSize(BODY_FONT_SIZE).text(`[${alt || 'image'}]`);
      return;
    }

    const width = Math.min(this.imageWidth, this.contentWidth);
    const height = (loaded.height / loaded.width) * width;
    const bottom = this.doc.page.height - this.doc.page.margins.bottom;
    if (this.doc.y + height > bottom) {
      this.doc.addPage();
    }

    this.doc.image(loaded.data, this.doc.page.margins.left, this.doc.y, { width });
    this.doc.y += height;
    this.doc.moveDown(0.5);
  }

  private monospace(code: string): void {
    this.doc.font(FONTS.mono).fontSize(CODE_FONT_SIZE).text(code, { width: this.contentWidth });
    this.doc.moveDown(0.5);
  }
}

function drawPageHeaders(doc: PdfDoc, title: string): void {
  const range = doc.bufferedPageRange();
  for (let i = range.start; i < range.start + range.count; i++) {
    doc.switchToPage(i);
    const width = doc.page.width - doc.page.margins.left - doc.page.margins.right;
    doc
      .font(FONTS.bold)
      .fontSize(HEADER_FONT_SIZE)
      .text(title, doc.page.margins.left, HEADER_Y, { width, align: 'center', lineBreak: false });
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Render SOP markdown as a PDF.
 *
 * @throws RenderError when the text has characters outside WinAnsi, an
 * embedded image is corrupt or pdfkit fails
 */
export async function renderPdf(markdown: string, options: PdfRenderOptions = {}): Promise<Buffer> {
  const { title = SOP_DOCUMENT_TITLE, imageWidth = DEFAULT_IMAGE_WIDTH, compress } = options;

  assertEncodable(`${title}\n${markdown}`);
  const document = parseMarkdown(markdown);
  const images = await loadImages(document);

  let doc: PdfDoc;
  try {
    doc = new PDFDocument({
      bufferPages: true,
      margins: PAGE_MARGINS,
      info: { Title: title },
      ...(compress !== undefined ? { compress } : {}),
    });
  } catch (error) {
    throw new RenderError(`PDF generation failed: ${errorMessage(error)}`, 'PDF_FAILED', error);
  }

  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];

    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => {
      const pdf = Buffer.concat(chunks);
      log.debug(`Rendered ${doc.bufferedPageRange().count} page(s), ${pdf.length} bytes`);
      resolve(pdf);
    });
    doc.on('error', (error: unknown) => {
      reject(new RenderError(`PDF generation failed: ${errorMessage(error)}`, 'PDF_FAILED', error));
    });

    try {
      const writer = new PdfWriter(doc, images, imageWidth);
      for (const block of document.blocks) {
        writer.block(block);
      }
      drawPageHeaders(doc, title);
      doc.end();
    } catch (error) {
      reject(
        error instanceof SOPError
          ? error
          : new RenderError(`PDF generation failed: ${errorMessage(error)}`, 'PDF_FAILED', error),
      );
    }
  });
}
