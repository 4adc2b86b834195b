import { describe, it, expect } from 'vitest';
import { summarizeQuote, validateQuote } from './summary.js';
import { Quote } from '../../shared/types/index.js';

const COMPLETE: Quote = {
  email_id: 'a1b2c3d4e5f6',
  timestamp: '2026-06-02T10:00:00.000Z',
  status: 'complete',
  line_items: [{ product: 'Widget Pro', quantity: 10, unit_price: 25, total: 250, unit: 'piece' }],
  subtotal: 250,
  discount: 25,
  tax: 21.38,
  total: 246.38,
  currency: 'USD',
  pending_reasons: [],
  valid_until: '2026-06-09T09:30:00.000Z',
  discount_rate: 10,
};

const PENDING: Quote = {
  ...COMPLETE,
  status: 'pending',
  line_items: [],
  subtotal: 0,
  discount: 0,
  tax: 0,
  total: 0,
  pending_reasons: ['Missing quantity for Tool Kit', 'Unknown product: Hyper Sprocket'],
  discount_rate: 0,
};

describe('summarizeQuote', () => {
  it('should summarize a single item quote', () => {
    expect(summarizeQuote(COMPLETE)).toBe('10 Widget Pro - USD 246.38');
  });

  it('should count items on larger quotes', () => {
    const quote: Quote = {
      ...COMPLETE,
      line_items: [
        ...COMPLETE.line_items,
        { product: 'Tool Kit', quantity: 1, unit_price: 45, total: 45, unit: 'kit' },
      ],
    };

    expect(summarizeQuote(quote)).toBe('2 items - USD 246.38');
  });

  it('should list the reasons of a pending quote', () => {
    expect(summarizeQuote(PENDING)).toBe(
      'Quote pending: Missing quantity for Tool Kit, Unknown product: Hyper Sprocket'
    );
  });
});

describe('validateQuote', () => {
  it('should accept consistent quotes', () => {
    expect(validateQuote(COMPLETE)).toEqual([]);
    expect(validateQuote(PENDING)).toEqual([]);
  });

  it('should flag arithmetic mismatches', () => {
    expect(validateQuote({ ...COMPLETE, subtotal: 260 })).toEqual([
      'Subtotal calculation mismatch',
      'Total calculation mismatch',
    ]);
  });

  it('should flag a pending quote with amounts', () => {
    expect(validateQuote({ ...PENDING, total: 10, pending_reasons: [] })).toEqual([
      'Pending quote must have zero total',
      'Pending quote must have pending reasons',
    ]);
  });

  it('should report malformed records by field', () => {
    expect(validateQuote({ ...COMPLETE, status: 'draft' })).toEqual([
      "Invalid field status: Invalid enum value. Expected 'complete' | 'pending', received 'draft'",
    ]);
  });
});
