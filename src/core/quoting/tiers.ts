import { DiscountTier } from '../../shared/types/index.js';

/**
 * First tier, in list order, whose half-open range `[min, max)` holds the
 * subtotal. A subtotal equal to a tier's max belongs to the next tier.
 */
export function selectDiscountTier<T extends DiscountTier>(
  subtotal: number,
  tiers: ReadonlyArray<T>
): T | null {
  return tiers.find((tier) => tier.minAmount <= subtotal && subtotal < tier.maxAmount) ?? null;
}
