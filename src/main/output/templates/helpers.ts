/**
 * Shared helpers for output templates.
 *
 * Pure utility functions, no side effects.
 */

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#039;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * Deterministic date formatting: "Feb 14, 2026 at 10:30 AM".
 */
export function formatDate(date: Date): string {
  const months = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
  const month = months[date.getMonth()];
  const day = date.getDate();
  const year = date.getFullYear();
  const rawHours = date.getHours();
  const ampm = rawHours >= 12 ? 'PM' : 'AM';
  const hours = rawHours % 12 || 12;
  const minutes = date.getMinutes().toString().padStart(2, '0');
  return `${month} ${day}, ${year} at ${hours}:${minutes} ${ampm}`;
}

/**
 * Decode a `data:<mime>;base64,<payload>` URI. Returns null for anything
 * else (remote URLs, relative paths, non-base64 data URIs).
 */
export function decodeDataUri(uri: string): { mimeType: string; data: Buffer } | null {
  const match = /^data:([\w/+.-]+);base64,([A-Za-z0-9+/=\s]*)$/.exec(uri);
  if (!match) {
    return null;
  }
  return { mimeType: match[1], data: Buffer.from(match[2], 'base64') };
}
