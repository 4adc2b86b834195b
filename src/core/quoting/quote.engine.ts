import { addDays } from 'date-fns';
import {
  Catalog,
  DiscountTier,
  ParsedEvent,
  Quote,
  QuoteLineItem,
  QuotingSettings,
} from '../../shared/types/index.js';
import { missingQuantityGap } from '../extraction/gaps.js';
import { roundMoney } from './money.js';
import { selectDiscountTier } from './tiers.js';

export const NO_PRODUCTS_REASON = 'No products identified in the inquiry';

export function unknownProductReason(productName: string): string {
  return `Unknown product: ${productName}`;
}

function hasCatalogEntry(catalog: Catalog, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(catalog, name);
}

/**
 * Reasons blocking a complete quote, deduplicated in first-seen order.
 */
export function collectPendingReasons(event: ParsedEvent, catalog: Catalog): string[] {
  const reasons: string[] = [];
  const add = (reason: string) => {
    if (!reasons.includes(reason)) reasons.push(reason);
  };

  if (event.products.length === 0) {
    add(NO_PRODUCTS_REASON);
  }

  for (const product of event.products) {
    if (!hasCatalogEntry(catalog, product.name)) {
      add(unknownProductReason(product.name));
    }
    if (product.quantity === null) {
      add(missingQuantityGap(product.name));
    }
  }

  return reasons;
}

/**
 * Price a ParsedEvent. Pure and total: a product without a catalog entry or a
 * quantity yields a pending quote instead of an error.
 */
export function generateQuote(
  event: ParsedEvent,
  catalog: Catalog,
  discountTiers: ReadonlyArray<Readonly<DiscountTier>>,
  settings: Readonly<QuotingSettings>,
  now: Date = new Date()
): Quote {
  const base = {
    email_id: event.email_id,
    timestamp: now.toISOString(),
    currency: event.currency ?? settings.defaultCurrency,
    valid_until: addDays(new Date(event.timestamp), settings.quoteValidityDays).toISOString(),
  };

  const pendingReasons = collectPendingReasons(event, catalog);
  if (pendingReasons.length > 0) {
    return {
      ...base,
      status: 'pending',
      line_items: [],
      subtotal: 0,
      discount: 0,
      tax: 0,
      total: 0,
      pending_reasons: pendingReasons,
      discount_rate: 0,
    };
  }

  const lineItems: QuoteLineItem[] = [];
  for (const product of event.products) {
    const entry = catalog[product.name];
    if (product.quantity === null) continue;

    lineItems.push({
      product: product.name,
      quantity: product.quantity,
      unit_price: entry.price,
      total: roundMoney(product.quantity * entry.price),
      // the catalog unit is what gets billed
      unit: entry.unit,
    });
  }

  const subtotal = roundMoney(lineItems.reduce((sum, item) => sum + item.total, 0));
  const tier = selectDiscountTier(subtotal, discountTiers);
  const fraction = tier?.discount ?? 0;
  const discount = roundMoney(subtotal * fraction);
  const tax = roundMoney((subtotal - discount) * settings.taxRate);
  const total = roundMoney(subtotal - discount + tax);

  return {
    ...base,
    status: 'complete',
    line_items: lineItems,
    subtotal,
    discount,
    tax,
    total,
    pending_reasons: [],
    discount_rate: roundMoney(fraction * 100),
  };
}
