import { createHash } from 'crypto';
import { ExtractedProduct, ParsedEvent } from '../../shared/types/index.js';
import { EmptyInputError } from '../../shared/utils/errors.js';
import { cleanContent } from './content.js';
import { identifyGaps } from './gaps.js';
import { ProductMention, findProductMentions } from './products.js';
import { describeProductMention, scoreProductMention } from './scoring.js';
import { extractSender } from './sender.js';
import { extractCurrency, extractUrgency } from './signals.js';

export interface ExtractionOptions {
  /** Catalog product names; matched mentions are reported under these keys. */
  knownProducts: Iterable<string>;
  /** Defaults to an id derived from the content. */
  emailId?: string;
  now?: Date;
}

/**
 * Stable id for an email: the same text always yields the same id.
 */
export function createEmailId(content: string): string {
  return createHash('md5').update(content, 'utf8').digest('hex').slice(0, 12);
}

function toExtractedProduct(mention: ProductMention): ExtractedProduct {
  return {
    name: mention.name,
    quantity: mention.quantity,
    unit: mention.unit,
    confidence: scoreProductMention(mention),
    notes: describeProductMention(mention),
  };
}

/**
 * Parse free-form email text into a ParsedEvent. Ambiguity lowers confidence or
 * adds gaps; only empty input throws.
 */
export function extract(rawText: string, options: ExtractionOptions): ParsedEvent {
  if (rawText.trim().length === 0) {
    throw new EmptyInputError(options.emailId);
  }

  const content = cleanContent(rawText);
  const products = findProductMentions(content, options.knownProducts).map(toExtractedProduct);

  return {
    email_id: options.emailId ?? createEmailId(rawText),
    timestamp: (options.now ?? new Date()).toISOString(),
    sender: extractSender(content),
    products,
    urgency: extractUrgency(content),
    currency: extractCurrency(content),
    gaps: identifyGaps(products),
    raw_content: rawText,
  };
}
