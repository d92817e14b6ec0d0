import fs from 'node:fs/promises';
import { z } from 'zod';

/**
 * External source of raw governance weight (staking, token balance, ...).
 * Queried synchronously and independently for each account, so successive
 * answers for the same account may differ.
 */
export interface WeightSource {
  weightOf(account: string): bigint;
}

const weightValueSchema = z.union([
  z.string().regex(/^\d+$/, 'weight must be an unsigned integer string'),
  z.number().int().nonnegative(),
]).transform((value) => BigInt(value));

const weightSnapshotSchema = z.record(z.string().min(1), weightValueSchema);

/** Weight table held in memory. Accounts without an entry weigh zero. */
export class InMemoryWeightSource implements WeightSource {
  private readonly weights = new Map<string, bigint>();

  constructor(initial: Record<string, bigint> = {}) {
    for (const [account, weight] of Object.entries(initial)) {
      this.setWeight(account, weight);
    }
  }

  weightOf(account: string): bigint {
    return this.weights.get(account) ?? 0n;
  }

  setWeight(account: string, weight: bigint): void {
    if (weight < 0n) {
      throw new Error('weight must be >= 0');
    }
    this.weights.set(account, weight);
  }

  size(): number {
    return this.weights.size;
  }
}

/**
 * Load a `{ account: weight }` JSON snapshot. A missing file yields an
 * empty table; a malformed one is an error.
 */
export async function loadWeightSnapshot(filePath: string): Promise<InMemoryWeightSource> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return new InMemoryWeightSource();
    }
    throw error;
  }

  const parsed = weightSnapshotSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid weight snapshot ${filePath}: ${parsed.error.message}`);
  }
  return new InMemoryWeightSource(parsed.data);
}
