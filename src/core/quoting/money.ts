/**
 * Round half-up to cents. Every monetary figure goes through this, line items
 * included, before it is summed.
 */
export function roundMoney(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}
