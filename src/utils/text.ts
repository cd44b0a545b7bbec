/**
 * Text helpers shared by the content loader and the page assembler
 */

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

/**
 * Escape text for HTML body content and quoted attribute values
 */
export function escapeHtml(text: string): string {
  return (text ?? '').replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * Split a body field into paragraphs.
 * The content files write newlines as the two characters "\n"; one or more blank
 * lines separate paragraphs.
 */
export function splitParagraphs(text: string): string[] {
  const normalized = (text ?? '').replace(/\\n/g, '\n').trim();
  if (!normalized) {
    return [];
  }
  return normalized
    .split(/\n\s*\n/)
    .map((chunk) => chunk.trim())
    .filter((chunk) => chunk.length > 0);
}

/**
 * Split a pipe-delimited list field
 */
export function splitBullets(text: string): string[] {
  if (!text) {
    return [];
  }
  return text
    .split('|')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Format a date as YYYY-MM-DD in local time
 */
export function formatIsoDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Substitute {{name}} placeholders. Values are inserted as-is, so callers pass
 * already-escaped text or rendered fragments. Unknown placeholders are left untouched.
 */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/{{(\w+)}}/g, (match: string, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match
  );
}
