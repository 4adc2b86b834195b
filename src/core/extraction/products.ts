import {
  GENERIC_ITEM_PATTERN,
  NON_ITEM_WORDS,
  QUANTITY_PATTERN,
  SKIPPED_HEADER_PATTERN,
  UNIT_ALIASES,
  escapeRegExp,
} from './patterns.js';

/** How far from a product name a quantity may sit, in characters. */
const QUANTITY_WINDOW = 50;

const MASK = '\u0000';

/**
 * One requested product as found in the text, before scoring. Both confidence
 * scoring and gap detection work from this shape.
 */
export interface ProductMention {
  name: string;
  catalogMatch: boolean;
  quantity: number | null;
  unit: string | null;
  /** Trimmed line of the first mention */
  context: string;
}

interface Span {
  start: number;
  end: number;
}

interface LineMention extends Span {
  name: string;
  catalogMatch: boolean;
  quantity: number | null;
  unit: string | null;
}

interface QuantityMatch extends Span {
  quantity: number;
  unit: string | null;
}

interface CatalogPattern {
  name: string;
  pattern: RegExp;
}

export function normalizeUnit(word: string | undefined): string | null {
  if (!word) return null;
  const alias = UNIT_ALIASES.find(([pattern]) => pattern.test(word));
  return alias ? alias[1] : null;
}

/**
 * Numeric value of a matched quantity with thousands separators removed. Zero
 * is no quantity at all.
 */
export function parseQuantity(raw: string): number | null {
  const value = Number(raw.replace(/,/g, ''));
  return Number.isFinite(value) && value > 0 ? value : null;
}

function overlaps(span: Span, claimed: Span[]): boolean {
  return claimed.some((other) => span.start < other.end && span.end > other.start);
}

/**
 * Known names, longest first, so "Widget Pro" wins over "Widget".
 */
function compileCatalogPatterns(knownProducts: Iterable<string>): CatalogPattern[] {
  return [...new Set(knownProducts)]
    .filter((name) => name.trim().length > 0)
    .sort((a, b) => b.length - a.length || a.localeCompare(b))
    .map((name) => ({
      name,
      pattern: new RegExp(escapeRegExp(name.trim()).replace(/\s+/g, '\\s+'), 'gi'),
    }));
}

function findCatalogMentions(line: string, catalog: CatalogPattern[]): LineMention[] {
  const mentions: LineMention[] = [];

  for (const { name, pattern } of catalog) {
    for (const match of line.matchAll(pattern)) {
      const start = match.index ?? 0;
      const span = { start, end: start + match[0].length };
      if (overlaps(span, mentions)) continue;
      mentions.push({ ...span, name, catalogMatch: true, quantity: null, unit: null });
    }
  }

  return mentions;
}

function findGenericMentions(line: string, claimed: Span[]): LineMention[] {
  let masked = line;
  for (const span of claimed) {
    masked = masked.slice(0, span.start) + MASK.repeat(span.end - span.start) + masked.slice(span.end);
  }

  const mentions: LineMention[] = [];
  for (const match of masked.matchAll(GENERIC_ITEM_PATTERN)) {
    const words = match[3].split(/[ \t]+/);
    if (words.some((word) => NON_ITEM_WORDS.has(word.toLowerCase()))) continue;

    const start = match.index ?? 0;
    mentions.push({
      start,
      end: start + match[0].length,
      name: words.join(' '),
      catalogMatch: false,
      quantity: parseQuantity(match[1]),
      unit: normalizeUnit(match[2]),
    });
  }

  return mentions;
}

/**
 * Give each catalog mention the nearest free quantity: the last one before it,
 * else the first one after it, never crossing a neighbouring mention. A number
 * is handed out once.
 */
function assignQuantities(line: string, mentions: LineMention[]): void {
  const quantities: QuantityMatch[] = [...line.matchAll(QUANTITY_PATTERN)].flatMap((match) => {
    const quantity = parseQuantity(match[1]);
    if (quantity === null) return [];

    const start = match.index ?? 0;
    return [{ start, end: start + match[0].length, quantity, unit: normalizeUnit(match[2]) }];
  });
  const used = new Set<QuantityMatch>();

  mentions.forEach((mention, index) => {
    if (!mention.catalogMatch) return;

    const lower = Math.max(mentions[index - 1]?.end ?? 0, mention.start - QUANTITY_WINDOW);
    const upper = Math.min(mentions[index + 1]?.start ?? line.length, mention.end + QUANTITY_WINDOW);
    const free = quantities.filter((q) => !used.has(q));

    const before = free.filter((q) => q.start >= lower && q.end <= mention.start);
    const after = free.filter((q) => q.start >= mention.end && q.end <= upper);
    const chosen = before.length > 0 ? before[before.length - 1] : after[0];
    if (!chosen) return;

    used.add(chosen);
    mention.quantity = chosen.quantity;
    mention.unit = chosen.unit ?? trailingUnit(line.slice(mention.end));
  });
}

function trailingUnit(rest: string): string | null {
  const match = /^\s*(\w+)/.exec(rest);
  return match ? normalizeUnit(match[1]) : null;
}

function scanLine(line: string, catalog: CatalogPattern[]): LineMention[] {
  const catalogMentions = findCatalogMentions(line, catalog);
  const mentions = [...catalogMentions, ...findGenericMentions(line, catalogMentions)].sort(
    (a, b) => a.start - b.start
  );
  assignQuantities(line, mentions);
  return mentions;
}

/**
 * Find requested products in cleaned email text, in order of first mention.
 * Catalog names are matched case-insensitively and reported under their catalog
 * key; other "quantity + Title Case phrase" items are kept verbatim. A product
 * mentioned more than once is reported once, with the first quantity found.
 */
export function findProductMentions(
  content: string,
  knownProducts: Iterable<string>
): ProductMention[] {
  const catalog = compileCatalogPatterns(knownProducts);
  const merged = new Map<string, ProductMention>();

  for (const line of content.split(/\r?\n/)) {
    if (line.trim().length === 0 || SKIPPED_HEADER_PATTERN.test(line)) continue;

    for (const mention of scanLine(line, catalog)) {
      const key = mention.name.toLowerCase();
      const existing = merged.get(key);

      if (!existing) {
        merged.set(key, {
          name: mention.name,
          catalogMatch: mention.catalogMatch,
          quantity: mention.quantity,
          unit: mention.unit,
          context: line.trim(),
        });
      } else if (existing.quantity === null && mention.quantity !== null) {
        merged.set(key, { ...existing, quantity: mention.quantity, unit: mention.unit });
      }
    }
  }

  return [...merged.values()];
}
