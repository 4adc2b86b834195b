import { ExtractedProduct } from '../../shared/types/index.js';

export function missingQuantityGap(productName: string): string {
  return `Missing quantity for ${productName}`;
}

/**
 * Gaps depend on the products alone. A missing unit is not a gap.
 */
export function identifyGaps(
  products: ReadonlyArray<Pick<ExtractedProduct, 'name' | 'quantity'>>
): string[] {
  const gaps: string[] = [];

  for (const product of products) {
    if (product.quantity !== null) continue;

    const gap = missingQuantityGap(product.name);
    if (!gaps.includes(gap)) {
      gaps.push(gap);
    }
  }

  return gaps;
}
