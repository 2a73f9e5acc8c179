/**
 * MarkdownParser - The markdown subset an SOP is written in
 *
 * Parses model output into block and inline nodes so each export target
 * (HTML, PDF) renders from the same tree instead of chaining regex
 * substitutions whose order matters.
 *
 * Blocks: headings (levels above 3 clamp to 3), paragraphs (line breaks
 * kept), ordered/unordered lists, standalone images, fenced code, and the
 * mermaid flow diagram. Inlines: **bold**, *italic*, ![alt](src).
 */

import { FLOW_DIAGRAM_LANGUAGE } from '../../shared/sop.js';

// ============================================================================
// Node types
// ============================================================================

export type Inline =
  | { type: 'text'; text: string }
  | { type: 'bold'; children: Inline[] }
  | { type: 'italic'; children: Inline[] }
  | { type: 'image'; alt: string; src: string };

export type HeadingLevel = 1 | 2 | 3;

export type Block =
  | { type: 'heading'; level: HeadingLevel; content: Inline[] }
  | { type: 'paragraph'; lines: Inline[][] }
  | { type: 'list'; ordered: boolean; start: number; items: Inline[][] }
  | { type: 'image'; alt: string; src: string }
  | { type: 'code'; language: string; code: string }
  | { type: 'diagram'; source: string };

export interface SopDocument {
  blocks: Block[];
}

// ============================================================================
// Patterns
// ============================================================================

const FENCE_OPEN = /^\s*```\s*([\w-]*)\s*$/;
const FENCE_CLOSE = /^\s*```\s*$/;
const HEADING = /^(#{1,6})\s+(.*)$/;
const UNORDERED_ITEM = /^\s*[-*+]\s+(.*)$/;
const ORDERED_ITEM = /^\s*(\d+)[.)]\s+(.*)$/;
const IMAGE_LINE = /^\s*!\[([^\]]*)\]\(([^)\s]+)\)\s*$/;
const INLINE_IMAGE = /^!\[([^\]]*)\]\(([^)\s]+)\)/;

// ============================================================================
// Inline parsing
// ============================================================================

function pushText(nodes: Inline[], text: string): void {
  if (!text) return;
  const last = nodes[nodes.length - 1];
  if (last?.type === 'text') {
    last.text += text;
  } else {
    nodes.push({ type: 'text', text });
  }
}

/**
 * Parse emphasis and images in a single line. Unmatched markers stay as
 * literal text.
 */
export function parseInline(source: string): Inline[] {
  const nodes: Inline[] = [];
  let i = 0;

  while (i < source.length) {
    const rest = source.slice(i);

    const image = INLINE_IMAGE.exec(rest);
    if (image) {
      nodes.push({ type: 'image', alt: image[1], src: image[2] });
      i += image[0].length;
      continue;
    }

    // ***x*** is bold wrapping italic
    if (rest.startsWith('***')) {
      const close = source.indexOf('***', i + 3);
      if (close > i + 3) {
        nodes.push({
          type: 'bold',
          children: [{ type: 'italic', children: parseInline(source.slice(i + 3, close)) }],
        });
        i = close + 3;
        continue;
      }
    }

    if (rest.startsWith('**')) {
      const close = source.indexOf('**', i + 2);
      if (close > i + 2) {
        nodes.push({ type: 'bold', children: parseInline(source.slice(i + 2, close)) });
        i = close + 2;
        continue;
      }
      pushText(nodes, '**');
      i += 2;
      continue;
    }

    if (rest.startsWith('*')) {
      const close = source.indexOf('*', i + 1);
      const inner = close > i + 1 ? source.slice(i + 1, close) : '';
      if (inner && inner.trim() === inner) {
        nodes.push({ type: 'italic', children: parseInline(inner) });
        i = close + 1;
        continue;
      }
      pushText(nodes, '*');
      i += 1;
      continue;
    }

    // Plain run up to the next character that could open markup
    const next = rest.slice(1).search(/[*!]/);
    const length = next === -1 ? rest.length : next + 1;
    pushText(nodes, rest.slice(0, length));
    i += length;
  }

  return nodes;
}

/** Visible text of an inline sequence, without markup. */
export function plainText(nodes: readonly Inline[]): string {
  return nodes
    .map((node) => {
      switch (node.type) {
        case 'text':
          return node.text;
        case 'image':
          return node.alt;
        default:
          return plainText(node.children);
      }
    })
    .join('');
}

// ============================================================================
// Block parsing
// ============================================================================

function clampHeadingLevel(hashes: number): HeadingLevel {
  if (hashes <= 1) return 1;
  if (hashes === 2) return 2;
  return 3;
}

/**
 * Parse an SOP markdown document into blocks.
 */
export function parseMarkdown(markdown: string): SopDocument {
  const lines = markdown.replace(/\r\n?/g, '\n').split('\n');
  const blocks: Block[] = [];

  let paragraph: Inline[][] | null = null;
  let list: Extract<Block, { type: 'list' }> | null = null;
  let previousBlank = true;

  const closeParagraph = () => {
    if (paragraph) {
      blocks.push({ type: 'paragraph', lines: paragraph });
      paragraph = null;
    }
  };
  const closeList = () => {
    list = null;
  };
  const closeAll = () => {
    closeParagraph();
    closeList();
  };

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    const fence = FENCE_OPEN.exec(line);
    if (fence) {
      closeAll();
      const language = fence[1].toLowerCase();
      const body: string[] = [];
      i++;
      while (i < lines.length && !FENCE_CLOSE.test(lines[i])) {
        body.push(lines[i]);
        i++;
      }
      const code = body.join('\n');
      blocks.push(
        language === FLOW_DIAGRAM_LANGUAGE
          ? { type: 'diagram', source: code }
          : { type: 'code', language, code },
      );
      previousBlank = false;
      continue;
    }

    if (line.trim() === '') {
      closeParagraph();
      previousBlank = true;
      continue;
    }

    const heading = HEADING.exec(line);
    if (heading) {
      closeAll();
      blocks.push({
        type: 'heading',
        level: clampHeadingLevel(heading[1].length),
        content: parseInline(heading[2].trim()),
      });
      previousBlank = false;
      continue;
    }

    const image = IMAGE_LINE.exec(line);
    if (image) {
      closeAll();
      blocks.push({ type: 'image', alt: image[1], src: image[2] });
      previousBlank = false;
      continue;
    }

    const ordered = ORDERED_ITEM.exec(line);
    const unordered = ordered ? null : UNORDERED_ITEM.exec(line);
    if (ordered || unordered) {
      closeParagraph();
      const isOrdered = ordered !== null;
      const text = ordered ? ordered[2] : (unordered?.[1] ?? '');
      if (!list || list.ordered !== isOrdered) {
        list = {
          type: 'list',
          ordered: isOrdered,
          start: ordered ? Number.parseInt(ordered[1], 10) : 1,
          items: [],
        };
        blocks.push(list);
      }
      list.items.push(parseInline(text));
      previousBlank = false;
      continue;
    }

    // Indented line directly under a list item continues that item
    if (list && !previousBlank && /^\s+\S/.test(line)) {
      const item = list.items[list.items.length - 1];
      item.push({ type: 'text', text: ' ' }, ...parseInline(line.trim()));
      continue;
    }

    closeList();
    if (!paragraph) {
      paragraph = [];
    }
    paragraph.push(parseInline(line));
    previousBlank = false;
  }

  closeParagraph();
  return { blocks };
}
