import { Urgency } from '../../shared/types/index.js';
import { CURRENCY_PATTERN, CURRENCY_SYMBOLS, URGENCY_TIERS } from './patterns.js';

export function extractUrgency(content: string): Urgency | null {
  const tier = URGENCY_TIERS.find(({ pattern }) => pattern.test(content));
  return tier ? tier.level : null;
}

/**
 * First ISO code or currency symbol in the text, by position.
 */
export function extractCurrency(content: string): string | null {
  for (const match of content.matchAll(CURRENCY_PATTERN)) {
    if (match[1]) {
      return match[1];
    }
    const symbol = CURRENCY_SYMBOLS[match[2]];
    if (symbol) {
      return symbol;
    }
  }
  return null;
}
