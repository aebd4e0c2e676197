import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { choice, coin, createRandom, randomInt, sample, weightEntries, weightedChoice } from '../../src/random.js';
import { scriptedRandom } from '../helpers.js';

describe('createRandom', () => {
  it('replays the same sequence for the same seed', () => {
    const a = createRandom(42);
    const b = createRandom(42);
    const first = Array.from({ length: 20 }, () => a.next());
    const second = Array.from({ length: 20 }, () => b.next());
    expect(first).toEqual(second);
  });

  it('differs between seeds', () => {
    expect(createRandom(1).next()).not.toBe(createRandom(2).next());
  });

  it('stays within [0, 1)', () => {
    fc.assert(
      fc.property(fc.integer(), (seed) => {
        const random = createRandom(seed);
        for (let i = 0; i < 50; i++) {
          const value = random.next();
          if (value < 0 || value >= 1) return false;
        }
        return true;
      }),
    );
  });
});

describe('coin', () => {
  it('is true below one half', () => {
    expect(coin(scriptedRandom([0.49]))).toBe(true);
    expect(coin(scriptedRandom([0.5]))).toBe(false);
  });
});

describe('randomInt', () => {
  it('covers both bounds', () => {
    expect(randomInt(scriptedRandom([0]), 3, 9)).toBe(3);
    expect(randomInt(scriptedRandom([0.9999]), 3, 9)).toBe(9);
  });

  it('maps the unit interval evenly', () => {
    expect(randomInt(scriptedRandom([0.5]), 1, 6)).toBe(4);
  });
});

describe('choice', () => {
  it('indexes by the drawn value', () => {
    expect(choice(scriptedRandom([0.5]), ['a', 'b', 'c', 'd'])).toBe('c');
  });

  it('throws on an empty list', () => {
    expect(() => choice(scriptedRandom([0.5]), [])).toThrow('choice called with an empty list');
  });
});

describe('weightedChoice', () => {
  const entries = [['a', 1], ['b', 3]] as const;

  it('picks proportionally to weight', () => {
    expect(weightedChoice(scriptedRandom([0.2]), entries)).toBe('a');
    expect(weightedChoice(scriptedRandom([0.5]), entries)).toBe('b');
  });

  it('treats the boundary as belonging to the next entry', () => {
    expect(weightedChoice(scriptedRandom([0.25]), entries)).toBe('b');
  });

  it('throws with no entries', () => {
    expect(() => weightedChoice(scriptedRandom([0.1]), [])).toThrow('weightedChoice called with no entries');
  });

  it('throws when every weight is zero', () => {
    expect(() => weightedChoice(scriptedRandom([0.1]), [['a', 0], ['b', 0]])).toThrow(
      'weightedChoice called with a non-positive total weight (0)',
    );
  });
});

describe('weightEntries', () => {
  it('lists present keys with their weights', () => {
    expect(weightEntries({ eq: 0.3, ne: 0.7 })).toEqual([['eq', 0.3], ['ne', 0.7]]);
  });
});

describe('sample', () => {
  it('swaps picked items to the front', () => {
    expect(sample(scriptedRandom([0.9, 0]), ['a', 'b', 'c'], 2)).toEqual(['c', 'b']);
  });

  it('clamps the count to the list size', () => {
    const picked = sample(createRandom(5), ['a', 'b', 'c'], 10);
    expect([...picked].sort()).toEqual(['a', 'b', 'c']);
    expect(sample(createRandom(5), ['a', 'b'], -1)).toEqual([]);
  });

  it('never repeats an item', () => {
    fc.assert(
      fc.property(fc.integer(), fc.integer({ min: 0, max: 12 }), (seed, k) => {
        const items = Array.from({ length: 10 }, (_, i) => i);
        const picked = sample(createRandom(seed), items, k);
        return new Set(picked).size === picked.length && picked.length === Math.min(k, 10);
      }),
    );
  });
});
