/**
 * HTML Template for Standalone Export
 *
 * Generates a self-contained HTML document with:
 * - Embedded CSS
 * - Snapshots kept inline as data URIs
 * - mermaid.js loaded only when the SOP has a flow diagram
 * - Print-friendly styles
 */

import { SOP_DOCUMENT_TITLE } from '../../../shared/sop.js';
import { hasDiagram, renderHtml } from '../HtmlRenderer.js';
import { parseMarkdown } from '../MarkdownParser.js';
import { escapeHtml, formatDate } from './helpers.js';

// ============================================================================
// Types
// ============================================================================

export interface HtmlExportOptions {
  title?: string;
  theme?: 'dark' | 'light';
  /** Shown in the header; omitted when absent */
  generatedAt?: Date;
  /** Model that wrote the document, shown in the header */
  model?: string;
}

export const MERMAID_MODULE_URL = 'https://cdn.jsdelivr.net/npm/mermaid@10/dist/mermaid.esm.min.mjs';

// ============================================================================
// CSS Styles
// ============================================================================

function getStyles(theme: 'dark' | 'light'): string {
  const isDark = theme === 'dark';

  return `
    :root {
      --bg: ${isDark ? '#0f172a' : '#ffffff'};
      --bg-secondary: ${isDark ? '#1e293b' : '#f8fafc'};
      --text: ${isDark ? '#e2e8f0' : '#1e293b'};
      --text-secondary: ${isDark ? '#94a3b8' : '#64748b'};
      --border: ${isDark ? '#334155' : '#e2e8f0'};
      --accent: #3b82f6;
    }

    * {
      box-sizing: border-box;
    }

    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, 'Helvetica Neue', Arial, sans-serif;
      background: var(--bg);
      color: var(--text);
      line-height: 1.6;
      margin: 0;
      -webkit-font-smoothing: antialiased;
    }

    .container {
      max-width: 900px;
      margin: 0 auto;
      padding: 2rem;
    }

    header {
      margin-bottom: 2rem;
      padding-bottom: 1rem;
      border-bottom: 2px solid var(--accent);
    }

    header .doc-title {
      font-size: 2rem;
      font-weight: 700;
      margin: 0 0 0.5rem;
      letter-spacing: -0.025em;
    }

    .meta {
      color: var(--text-secondary);
      font-size: 0.875rem;
      display: flex;
      gap: 1rem;
      flex-wrap: wrap;
    }

    h1, h2, h3 {
      line-height: 1.3;
      margin: 1.75rem 0 0.75rem;
    }

    h2 {
      padding-bottom: 0.25rem;
      border-bottom: 1px solid var(--border);
    }

    img {
      border-radius: 6px;
      border: 1px solid var(--border);
      height: auto;
      max-width: 100%;
    }

    pre {
      background: var(--bg-secondary);
      border: 1px solid var(--border);
      border-radius: 8px;
      padding: 1rem;
      overflow-x: auto;
      font-family: ui-monospace, SFMono-Regular, 'SF Mono', monospace;
      font-size: 0.875rem;
    }

    pre.mermaid {
      text-align: center;
    }

    @media print {
      body {
        background: white;
        color: black;
      }

      .container {
        max-width: 100%;
        padding: 1rem;
      }

      img, pre {
        break-inside: avoid;
        page-break-inside: avoid;
      }
    }
  `;
}

// ============================================================================
// Main Export Function
// ============================================================================

export function generateHtmlDocument(markdown: string, options: HtmlExportOptions = {}): string {
  const { title = SOP_DOCUMENT_TITLE, theme = 'light', generatedAt, model } = options;

  const document = parseMarkdown(markdown);
  const meta = [
    generatedAt ? `<span class="meta-item">${formatDate(generatedAt)}</span>` : '',
    model ? `<span class="meta-item">${escapeHtml(model)}</span>` : '',
  ].filter(Boolean);

  const mermaidScript = hasDiagram(document)
    ? `
  <script type="module">
    import mermaid from '${MERMAID_MODULE_URL}';
    mermaid.initialize({ startOnLoad: true });
  </script>`
    : '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>${getStyles(theme)}</style>${mermaidScript}
</head>
<body>
  <div class="container">
    <header>
      <div class="doc-title">${escapeHtml(title)}</div>
      ${meta.length > 0 ? `<div class="meta">${meta.join('')}</div>` : ''}
    </header>

    <main>
${renderHtml(document)}
    </main>
  </div>
</body>
</html>`;
}
