import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InMemoryWeightSource, loadWeightSnapshot } from '../src/domain/governance/weightSource.js';
import { addWeight, compareWeights, parseWeight } from '../src/domain/governance/weights.js';
import { makeTempDir } from './helpers.js';

describe('weights', () => {
  it('parses unsigned integer strings only', () => {
    expect(parseWeight('42')).toBe(42n);
    expect(() => parseWeight('-1', 'tally')).toThrow('tally must be an unsigned integer string');
    expect(() => parseWeight('1.5')).toThrow();
  });

  it('adds and compares beyond the safe integer range', () => {
    expect(addWeight('9007199254740993', 2n)).toBe('9007199254740995');
    expect(compareWeights('9007199254740993', '9007199254740992')).toBe(1);
    expect(compareWeights('7', '7')).toBe(0);
    expect(compareWeights('2', '10')).toBe(-1);
  });

  it('refuses a negative delta', () => {
    expect(() => addWeight('5', -1n)).toThrow('weight delta must be >= 0');
  });
});

describe('InMemoryWeightSource', () => {
  it('weighs unknown accounts as zero', () => {
    const source = new InMemoryWeightSource({ alice: 3n });

    expect(source.weightOf('alice')).toBe(3n);
    expect(source.weightOf('bob')).toBe(0n);
    expect(source.size()).toBe(1);
  });

  it('rejects negative weights', () => {
    const source = new InMemoryWeightSource();

    expect(() => source.setWeight('alice', -1n)).toThrow('weight must be >= 0');
  });
});

describe('loadWeightSnapshot()', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('governance-weights-');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads string and number weights', async () => {
    const file = path.join(dir, 'weights.json');
    await fs.writeFile(file, JSON.stringify({ alice: '12345678901234567890', bob: 7 }));

    const source = await loadWeightSnapshot(file);

    expect(source.weightOf('alice')).toBe(12345678901234567890n);
    expect(source.weightOf('bob')).toBe(7n);
  });

  it('yields an empty table when the file is missing', async () => {
    const source = await loadWeightSnapshot(path.join(dir, 'absent.json'));

    expect(source.size()).toBe(0);
  });

  it('rejects malformed weights', async () => {
    const file = path.join(dir, 'weights.json');
    await fs.writeFile(file, JSON.stringify({ alice: -4 }));

    await expect(loadWeightSnapshot(file)).rejects.toThrow(/Invalid weight snapshot/);
  });
});
