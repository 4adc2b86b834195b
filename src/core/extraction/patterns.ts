import { Urgency } from '../../shared/types/index.js';

export const EMAIL_ADDRESS_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;

export const FROM_LINE_PATTERN = /^[ \t]*From:[ \t]*(.+)$/im;

/** Header lines that never carry product requests. `Subject:` is scanned. */
export const SKIPPED_HEADER_PATTERN = /^\s*(?:from|to|cc|bcc|date|sent|reply-to):/i;

const UNIT_WORD = 'pcs?|pieces?|units?|kits?|packs?|box(?:es)?|sets?';

/** Digits with optional thousands separators: "12", "1,000", "2.5". */
const NUMBER = '\\d{1,3}(?:,\\d{3})+(?:\\.\\d+)?|\\d+(?:\\.\\d+)?';

/** Not inside a word, price, reference or a longer number */
const NUMBER_START = '(?<![\\w.$€£¥#-]|\\d,)';

/**
 * A number that is not part of a word, price, reference or date, optionally
 * followed by a unit word.
 */
export const QUANTITY_PATTERN = new RegExp(
  `${NUMBER_START}(${NUMBER})\\s*(${UNIT_WORD})?(?!\\w|[.,]\\d)`,
  'gi'
);

/**
 * "12 Hyper Sprocket", "5 x Flux Valve", "20 units of Gear Housing": a quantity
 * followed by a Title Case noun phrase of up to four words.
 */
export const GENERIC_ITEM_PATTERN = new RegExp(
  `${NUMBER_START}(${NUMBER})\\s*(?:x\\s+)?(?:(${UNIT_WORD})\\s+(?:of\\s+)?)?([A-Z][\\w-]*(?:[ \\t]+[A-Z][\\w-]*){0,3})`,
  'g'
);

export const UNIT_ALIASES: ReadonlyArray<[RegExp, string]> = [
  [/^(?:pcs?|pieces?)$/i, 'piece'],
  [/^kits?$/i, 'kit'],
  [/^packs?$/i, 'pack'],
  [/^box(?:es)?$/i, 'box'],
  [/^sets?$/i, 'set'],
  [/^units?$/i, 'unit'],
];

/** A capitalized phrase holding any of these after a number is never an item name. */
export const NON_ITEM_WORDS = new Set([
  'january', 'february', 'march', 'april', 'may', 'june', 'july', 'august',
  'september', 'october', 'november', 'december',
  'jan', 'feb', 'mar', 'apr', 'jun', 'jul', 'aug', 'sep', 'sept', 'oct', 'nov', 'dec',
  'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday',
  'day', 'days', 'week', 'weeks', 'month', 'months', 'year', 'years', 'hour', 'hours',
  'business', 'working', 'calendar', 'weekday', 'weekdays',
  'am', 'pm', 'usd', 'eur', 'gbp', 'cad', 'aud', 'jpy', 'chf',
]);

/** Scanned in order; the first tier with a hit wins. */
export const URGENCY_TIERS: ReadonlyArray<{ level: Urgency; pattern: RegExp }> = [
  {
    level: 'high',
    pattern:
      /(?<!\b(?:not|no)\s+)\b(?:urgent(?:ly)?|asap|rush|immediate(?:ly)?|emergency|as soon as possible)\b/i,
  },
  { level: 'medium', pattern: /\b(?:soon|quick(?:ly)?|fast|priority)\b/i },
  { level: 'low', pattern: /\b(?:no rush|no hurry|whenever|not urgent)\b/i },
];

export const CURRENCY_PATTERN = /\b(USD|EUR|GBP|CAD|AUD|JPY|CHF)\b|([$€£¥])/g;

export const CURRENCY_SYMBOLS: Readonly<Record<string, string>> = {
  $: 'USD',
  '€': 'EUR',
  '£': 'GBP',
  '¥': 'JPY',
};

export const SIGNATURE_PATTERNS: RegExp[] = [
  // "-- " delimiter line and everything after it
  /^--[ \t]*$[\s\S]*/m,
  // sign-off on its own line
  /^[ \t]*(?:best regards|kind regards|regards|sincerely|thank you|thanks),?[ \t]*$[\s\S]*/im,
];

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
