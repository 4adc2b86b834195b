import { describe, it, expect } from 'vitest';
import { extractSender } from './sender.js';
import { extractCurrency, extractUrgency } from './signals.js';

describe('extractSender', () => {
  it('should read name and address from the From line', () => {
    expect(extractSender('From: Jane Doe <jane@example.com>\n\nHello')).toEqual({
      name: 'Jane Doe',
      email: 'jane@example.com',
      confidence: 1,
    });
  });

  it('should give a bare address 0.6 confidence', () => {
    expect(extractSender('From: jane@example.com')).toEqual({
      name: null,
      email: 'jane@example.com',
      confidence: 0.6,
    });
  });

  it('should give a name without address 0.4 confidence', () => {
    expect(extractSender('From: Jane Doe\nHello')).toEqual({
      name: 'Jane Doe',
      email: null,
      confidence: 0.4,
    });
  });

  it('should fall back to the first address in the text', () => {
    expect(extractSender('Reach me at bob@example.org or sales@example.org')).toEqual({
      name: null,
      email: 'bob@example.org',
      confidence: 0.6,
    });
  });

  it('should return an empty sender when nothing is found', () => {
    expect(extractSender('Need 3 Tool Kit')).toEqual({ name: null, email: null, confidence: 0 });
  });
});

describe('extractUrgency', () => {
  it('should detect high urgency', () => {
    expect(extractUrgency('We need this ASAP')).toBe('high');
  });

  it('should not treat negated urgency as high', () => {
    expect(extractUrgency('This is not urgent')).toBe('low');
    expect(extractUrgency('No rush, whenever works')).toBe('low');
  });

  it('should detect medium urgency', () => {
    expect(extractUrgency('Please reply soon')).toBe('medium');
  });

  it('should let the highest tier win', () => {
    expect(extractUrgency('We need it urgently but no rush on the invoice')).toBe('high');
  });

  it('should return null without signals', () => {
    expect(extractUrgency('Hello there')).toBeNull();
  });
});

describe('extractCurrency', () => {
  it('should read ISO codes', () => {
    expect(extractCurrency('Budget is 500 EUR')).toBe('EUR');
  });

  it('should map currency symbols', () => {
    expect(extractCurrency('around $300')).toBe('USD');
    expect(extractCurrency('costs ¥1000')).toBe('JPY');
  });

  it('should take the first currency by position', () => {
    expect(extractCurrency('£20 or 30 USD')).toBe('GBP');
  });

  it('should ignore lowercase codes', () => {
    expect(extractCurrency('paid in usd')).toBeNull();
  });
});
