import { Quote } from '../../shared/types/index.js';
import { QuoteSchema } from '../../shared/schemas/records.schema.js';
import { roundMoney } from './money.js';

/**
 * One-line human summary, e.g. "10 Widget Pro - USD 246.38".
 */
export function summarizeQuote(quote: Quote): string {
  if (quote.status === 'pending') {
    return `Quote pending: ${quote.pending_reasons.join(', ')}`;
  }

  const amount = `${quote.currency} ${quote.total.toFixed(2)}`;
  if (quote.line_items.length === 1) {
    const item = quote.line_items[0];
    return `${item.quantity} ${item.product} - ${amount}`;
  }
  return `${quote.line_items.length} items - ${amount}`;
}

/**
 * Consistency problems in a quote record; empty when the record is sound.
 */
export function validateQuote(candidate: unknown): string[] {
  const parsed = QuoteSchema.safeParse(candidate);
  if (!parsed.success) {
    return parsed.error.errors.map(
      (issue) => `Invalid field ${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
  }

  const quote = parsed.data;
  const errors: string[] = [];

  if (quote.status === 'complete') {
    if (quote.line_items.length === 0) {
      errors.push('Complete quote must have line items');
    }
    if (quote.total <= 0) {
      errors.push('Complete quote must have positive total');
    }
    if (quote.pending_reasons.length > 0) {
      errors.push('Complete quote must not have pending reasons');
    }

    const itemsTotal = roundMoney(quote.line_items.reduce((sum, item) => sum + item.total, 0));
    if (Math.abs(itemsTotal - quote.subtotal) > 0.01) {
      errors.push('Subtotal calculation mismatch');
    }
    if (roundMoney(quote.subtotal - quote.discount + quote.tax) !== quote.total) {
      errors.push('Total calculation mismatch');
    }
  } else {
    if (quote.total !== 0) {
      errors.push('Pending quote must have zero total');
    }
    if (quote.pending_reasons.length === 0) {
      errors.push('Pending quote must have pending reasons');
    }
    if (quote.line_items.length > 0) {
      errors.push('Pending quote must not have line items');
    }
  }

  return errors;
}
