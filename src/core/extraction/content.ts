import { SIGNATURE_PATTERNS } from './patterns.js';

/**
 * Drop quoted lines (`>` replies, `|` forwarded tables) and signature blocks.
 */
export function cleanContent(content: string): string {
  const kept = content
    .split(/\r?\n/)
    .filter((line) => {
      const trimmed = line.trim();
      return !trimmed.startsWith('>') && !trimmed.startsWith('|');
    })
    .join('\n');

  return SIGNATURE_PATTERNS.reduce((text, pattern) => text.replace(pattern, ''), kept).trim();
}
