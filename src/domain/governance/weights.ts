/**
 * Unsigned-integer weight arithmetic.
 *
 * Weights live in persisted state as decimal strings and are bigint while
 * being combined.
 */

export const ZERO_WEIGHT = '0';

export function parseWeight(value: string, field = 'weight'): bigint {
  if (!/^\d+$/.test(value)) {
    throw new Error(`${field} must be an unsigned integer string`);
  }
  return BigInt(value);
}

export function addWeight(current: string, delta: bigint, field = 'weight'): string {
  if (delta < 0n) {
    throw new Error(`${field} delta must be >= 0`);
  }
  return (parseWeight(current, field) + delta).toString();
}

export function compareWeights(a: string, b: string): number {
  const left = parseWeight(a);
  const right = parseWeight(b);
  if (left === right) return 0;
  return left > right ? 1 : -1;
}
