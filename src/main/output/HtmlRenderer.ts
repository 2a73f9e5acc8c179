/**
 * HtmlRenderer - SOP document tree to HTML fragment
 *
 * Emphasis renders as <b>/<i>, snapshots as fixed-width <img> tags and the
 * mermaid block as <pre class="mermaid"> so the page template can hand it
 * to mermaid.js. All text and attribute values are escaped.
 */

import { parseMarkdown, type Block, type Inline, type SopDocument } from './MarkdownParser.js';
import { escapeHtml } from './templates/helpers.js';

/** Width, in CSS pixels, every embedded image is shown at */
export const HTML_IMAGE_WIDTH = 300;

function renderImage(alt: string, src: string): string {
  return `<img src="${escapeHtml(src)}" alt="${escapeHtml(alt)}" width="${HTML_IMAGE_WIDTH}">`;
}

export function renderInline(nodes: readonly Inline[]): string {
  return nodes
    .map((node) => {
      switch (node.type) {
        case 'text':
          return escapeHtml(node.text);
        case 'bold':
          return `<b>${renderInline(node.children)}</b>`;
        case 'italic':
          return `<i>${renderInline(node.children)}</i>`;
        case 'image':
          return renderImage(node.alt, node.src);
      }
    })
    .join('');
}

function renderBlock(block: Block): string {
  switch (block.type) {
    case 'heading':
      return `<h${block.level}>${renderInline(block.content)}</h${block.level}>`;
    case 'paragraph':
      return `<p>${block.lines.map(renderInline).join('<br>\n')}</p>`;
    case 'list': {
      const items = block.items.map((item) => `  <li>${renderInline(item)}</li>`).join('\n');
      if (!block.ordered) {
        return `<ul>\n${items}\n</ul>`;
      }
      const start = block.start !== 1 ? ` start="${block.start}"` : '';
      return `<ol${start}>\n${items}\n</ol>`;
    }
    case 'image':
      return `<p>${renderImage(block.alt, block.src)}</p>`;
    case 'code': {
      const language = block.language ? ` class="language-${escapeHtml(block.language)}"` : '';
      return `<pre><code${language}>${escapeHtml(block.code)}</code></pre>`;
    }
    case 'diagram':
      return `<pre class="mermaid">${escapeHtml(block.source)}</pre>`;
  }
}

export function renderHtml(document: SopDocument): string {
  return document.blocks.map(renderBlock).join('\n');
}

/** Whether the document contains a flow diagram that needs mermaid.js */
export function hasDiagram(document: SopDocument): boolean {
  return document.blocks.some((block) => block.type === 'diagram');
}

export function markdownToHtml(markdown: string): string {
  return renderHtml(parseMarkdown(markdown));
}
