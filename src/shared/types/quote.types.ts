export type QuoteStatus = 'complete' | 'pending';

/**
 * Pricing result for one ParsedEvent, persisted as `quotes/{email_id}.json`.
 */
export interface Quote {
  email_id: string;
  timestamp: string;
  status: QuoteStatus;
  line_items: QuoteLineItem[];
  subtotal: number;
  discount: number;
  tax: number;
  total: number;
  currency: string;
  pending_reasons: string[];
  valid_until: string;
  discount_rate: number;
}

export interface QuoteLineItem {
  product: string;
  quantity: number;
  unit_price: number;
  total: number;
  unit: string;
}

export interface CatalogEntry {
  price: number;
  unit: string;
  description: string;
}

/** Product name -> pricing. Keys are the canonical product names. */
export type Catalog = Readonly<Record<string, Readonly<CatalogEntry>>>;

/**
 * Half-open subtotal range `[minAmount, maxAmount)` with its discount fraction.
 */
export interface DiscountTier {
  minAmount: number;
  maxAmount: number;
  discount: number;
}

export interface QuotingSettings {
  taxRate: number;
  defaultCurrency: string;
  quoteValidityDays: number;
}
