import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  bracketLayersFor,
  clampWeight,
  createTag,
  decreaseWeight,
  formatWeight,
  increaseWeight,
  isDefaultWeight,
  MAX_WEIGHT,
  MIN_WEIGHT,
  nextTagId,
  weightForLayers,
} from './prompt-tag';
import { makeTags } from './test-helpers';

describe('clampWeight', () => {
  it('keeps weights inside the range', () => {
    expect(clampWeight(1.3)).toBe(1.3);
  });

  it('clamps to the bounds', () => {
    expect(clampWeight(5)).toBe(MAX_WEIGHT);
    expect(clampWeight(0)).toBe(MIN_WEIGHT);
    expect(clampWeight(-2)).toBe(MIN_WEIGHT);
  });

  it('maps NaN to the default weight', () => {
    expect(clampWeight(NaN)).toBe(1);
  });
});

describe('createTag', () => {
  it('trims text and fills defaults', () => {
    expect(createTag('  cat ', { id: 't0' })).toEqual({
      id: 't0',
      text: 'cat',
      weight: 1,
      enabled: true,
      selected: false,
      syntax: 'none',
    });
  });

  it('keeps the id it is given', () => {
    const tags = [createTag('a', { id: 't0' }), createTag('b', { id: 't1' })];
    expect(tags.map(t => t.id)).toEqual(['t0', 't1']);
  });

  it('clamps the requested weight', () => {
    expect(createTag('cat', { id: 't0', weight: 9 }).weight).toBe(3);
  });
});

describe('nextTagId', () => {
  it('counts up from the list length', () => {
    expect(nextTagId([])).toBe('t0');
    expect(nextTagId(makeTags('a', 'b'))).toBe('t2');
  });

  it('skips ids already in use', () => {
    const tags = makeTags('a', 'b');
    tags[1] = { ...tags[1], id: 't2' };
    expect(nextTagId(tags)).toBe('t3');
  });
});

describe('weight stepping', () => {
  it('steps by 0.05 without drift', () => {
    const tag = createTag('cat', { id: 't0', weight: 1.1 });
    expect(increaseWeight(tag).weight).toBe(1.15);
    expect(decreaseWeight(tag).weight).toBe(1.05);
  });

  it('returns the same tag at the bounds', () => {
    const top = createTag('cat', { id: 't0', weight: MAX_WEIGHT });
    const bottom = createTag('cat', { id: 't0', weight: MIN_WEIGHT });
    expect(increaseWeight(top)).toBe(top);
    expect(decreaseWeight(bottom)).toBe(bottom);
  });

  it('Property: weights stay within bounds after any number of steps', () => {
    fc.assert(
      fc.property(fc.array(fc.boolean(), { maxLength: 80 }), (steps) => {
        let tag = createTag('cat', { id: 't0' });
        for (const up of steps) tag = up ? increaseWeight(tag) : decreaseWeight(tag);
        expect(tag.weight).toBeGreaterThanOrEqual(MIN_WEIGHT);
        expect(tag.weight).toBeLessThanOrEqual(MAX_WEIGHT);
      }),
      { numRuns: 100 }
    );
  });
});

describe('bracketLayersFor', () => {
  it('finds exact layer multiples', () => {
    expect(bracketLayersFor(1.05)).toBe(1);
    expect(bracketLayersFor(1.1025)).toBe(2);
    expect(bracketLayersFor(1 / 1.05)).toBe(-1);
    expect(bracketLayersFor(weightForLayers(-3))).toBe(-3);
  });

  it('returns 0 for neutral and inexact weights', () => {
    expect(bracketLayersFor(1)).toBe(0);
    expect(bracketLayersFor(1.5)).toBe(0);
  });

  it('returns 0 beyond the layer cap', () => {
    expect(bracketLayersFor(weightForLayers(11))).toBe(0);
    expect(bracketLayersFor(weightForLayers(10))).toBe(10);
  });
});

describe('formatWeight', () => {
  it('drops trailing zeros', () => {
    expect(formatWeight(2)).toBe('2');
    expect(formatWeight(1.5)).toBe('1.5');
    expect(formatWeight(1.05)).toBe('1.05');
  });

  it('rounds to two places', () => {
    expect(formatWeight(0.954)).toBe('0.95');
    expect(formatWeight(1.999)).toBe('2');
  });
});

describe('isDefaultWeight', () => {
  it('tolerates rounding noise', () => {
    expect(isDefaultWeight(1.0004)).toBe(true);
    expect(isDefaultWeight(1.05)).toBe(false);
  });
});
