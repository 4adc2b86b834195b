import { SenderInfo } from '../../shared/types/index.js';
import { EMAIL_ADDRESS_PATTERN, FROM_LINE_PATTERN } from './patterns.js';

// shares of the confidence, in tenths
const NAME_SHARE = 4;
const EMAIL_SHARE = 6;

/**
 * Sender from the first `From:` line; falls back to the first address in the text.
 */
export function extractSender(content: string): SenderInfo {
  let name: string | null = null;
  let email: string | null = null;

  const fromLine = FROM_LINE_PATTERN.exec(content);
  if (fromLine) {
    const value = fromLine[1].trim();
    email = EMAIL_ADDRESS_PATTERN.exec(value)?.[0] ?? null;

    const displayName = value
      .replace(EMAIL_ADDRESS_PATTERN, '')
      .replace(/[<>()"]/g, '')
      .replace(/\s+/g, ' ')
      .trim();
    name = displayName.length > 0 ? displayName : null;
  } else {
    email = EMAIL_ADDRESS_PATTERN.exec(content)?.[0] ?? null;
  }

  const tenths = (name ? NAME_SHARE : 0) + (email ? EMAIL_SHARE : 0);

  return { name, email, confidence: tenths / 10 };
}
