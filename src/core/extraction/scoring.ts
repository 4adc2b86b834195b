import { ProductMention } from './products.js';

export const COMPLETE_NOTE = 'Complete information extracted';

/**
 * Confidence in a product extraction. A mention with a quantity is complete
 * and scores 1.0. Without one, a catalog product scores 0.9 and a free-text
 * item 0.5, plus 0.1 when its line carries more than the name.
 */
export function scoreProductMention(
  mention: Pick<ProductMention, 'catalogMatch' | 'quantity' | 'context'>
): number {
  if (mention.quantity !== null) return 1;
  if (mention.catalogMatch) return 0.9;

  return mention.context.length > 10 ? 0.6 : 0.5;
}

export function describeProductMention(mention: Pick<ProductMention, 'quantity' | 'unit'>): string {
  const notes: string[] = [];

  if (mention.quantity === null) {
    notes.push('Quantity not specified');
  }
  if (mention.unit === null) {
    notes.push('Unit not specified');
  }

  return notes.length > 0 ? notes.join('; ') : COMPLETE_NOTE;
}
