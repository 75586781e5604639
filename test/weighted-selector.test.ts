import { describe, it, expect } from 'vitest';
import { InvalidWeightError, weightedSelect } from '../src/services/weighted-selector.js';
import { shuffle } from '../src/utils/shuffle.js';
import { createSeededRandom, randomInt } from '../src/utils/random.js';

interface Item {
  id: string;
  weight: number;
}

const byWeight = (item: Item) => item.weight;

function countingRandom(value: number) {
  const source = () => {
    source.draws++;
    return value;
  };
  source.draws = 0;
  return source;
}

describe('weightedSelect', () => {
  it('returns an empty ordering for no items', () => {
    expect(weightedSelect(byWeight, [])).toEqual([]);
  });

  it('returns a single item without drawing', () => {
    const random = countingRandom(0.5);
    expect(weightedSelect(byWeight, [{ id: 'a', weight: 3 }], random)).toEqual([{ id: 'a', weight: 3 }]);
    expect(random.draws).toBe(0);
  });

  it('picks the element whose cumulative weight covers the draw', () => {
    const items = [
      { id: 'a', weight: 3 },
      { id: 'b', weight: 1 },
    ];
    // 0.5: shuffle keeps [a, b]; target floor(0.5 * 4) = 2 falls inside a
    expect(weightedSelect(byWeight, items, () => 0.5).map((i) => i.id)).toEqual(['a', 'b']);
    // 0: shuffle swaps to [b, a]; target 0 falls inside b
    expect(weightedSelect(byWeight, items, () => 0).map((i) => i.id)).toEqual(['b', 'a']);
  });

  it('keeps the pre-shuffled order once only zero weights remain', () => {
    const items = ['w', 'x', 'y', 'z'].map((id) => ({ id, weight: 0 }));
    const seeded = createSeededRandom(8);
    let draws = 0;
    const counting = () => {
      draws++;
      return seeded();
    };

    const result = weightedSelect(byWeight, items, counting);

    expect(result).toEqual(shuffle(items, createSeededRandom(8)));
    expect(draws).toBe(3);
  });

  it('does not modify the input', () => {
    const items = [
      { id: 'a', weight: 1 },
      { id: 'b', weight: 2 },
      { id: 'c', weight: 0 },
    ];
    weightedSelect(byWeight, items, createSeededRandom(4));
    expect(items.map((i) => i.id)).toEqual(['a', 'b', 'c']);
  });

  it('is a permutation of its input, duplicates included', () => {
    const random = createSeededRandom(17);
    for (let trial = 0; trial < 200; trial++) {
      const items = Array.from({ length: 12 }, (_, i) => ({ id: `t${i % 9}`, weight: randomInt(random, 5) }));
      const result = weightedSelect(byWeight, items, random);

      expect(result).toHaveLength(items.length);
      expect([...result].sort((a, b) => a.id.localeCompare(b.id) || a.weight - b.weight)).toEqual(
        [...items].sort((a, b) => a.id.localeCompare(b.id) || a.weight - b.weight),
      );
    }
  });

  it('always puts zero weights after every positive weight', () => {
    for (let seed = 1; seed <= 1000; seed++) {
      const random = createSeededRandom(seed);
      const items = Array.from({ length: 10 }, (_, i) => ({ id: `t${i}`, weight: randomInt(random, 3) * 7 }));

      const weights = weightedSelect(byWeight, items, random).map((i) => i.weight);
      const firstZero = weights.indexOf(0);
      if (firstZero !== -1) {
        expect(weights.slice(firstZero).every((w) => w === 0)).toBe(true);
      }
    }
  });

  it('favours a much heavier element', () => {
    const random = createSeededRandom(31);
    const items = [
      { id: 'light', weight: 1 },
      { id: 'heavy', weight: 1000 },
    ];
    let heavyFirst = 0;
    const trials = 1000;

    for (let i = 0; i < trials; i++) {
      if (weightedSelect(byWeight, items, random)[0].id === 'heavy') heavyFirst++;
    }

    expect(heavyFirst / trials).toBeGreaterThan(0.9);
  });

  it('orders equal weights 50/50', () => {
    const random = createSeededRandom(57);
    const items = [
      { id: 'a', weight: 5 },
      { id: 'b', weight: 5 },
    ];
    let aFirst = 0;
    const trials = 4000;

    for (let i = 0; i < trials; i++) {
      if (weightedSelect(byWeight, items, random)[0].id === 'a') aFirst++;
    }

    expect(aFirst / trials).toBeGreaterThan(0.45);
    expect(aFirst / trials).toBeLessThan(0.55);
  });

  it('repeats itself for the same seed', () => {
    const items = Array.from({ length: 20 }, (_, i) => ({ id: `t${i}`, weight: (i * 37) % 11 }));
    expect(weightedSelect(byWeight, items, createSeededRandom(123))).toEqual(
      weightedSelect(byWeight, items, createSeededRandom(123)),
    );
  });

  it.each([-1, 1.5, Number.NaN, Number.POSITIVE_INFINITY])('rejects weight %s before drawing', (bad) => {
    const random = countingRandom(0.5);
    const items = [
      { id: 'a', weight: 2 },
      { id: 'b', weight: bad },
    ];

    let caught: unknown;
    try {
      weightedSelect(byWeight, items, random);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidWeightError);
    expect(caught).toMatchObject({ name: 'InvalidWeightError', index: 1 });
    expect(random.draws).toBe(0);
  });

  it('rejects weights whose total is not a safe integer', () => {
    const random = countingRandom(0.5);
    const items = [
      { id: 'a', weight: Number.MAX_SAFE_INTEGER },
      { id: 'b', weight: 1 },
    ];

    expect(() => weightedSelect(byWeight, items, random)).toThrow(
      'Invalid weight 1 for item at index 1: total weight exceeds Number.MAX_SAFE_INTEGER',
    );
    expect(random.draws).toBe(0);
  });
});
