import { describe, expect, it } from 'vitest';
import { defaultConcurrency, mapCooperatively } from '../../src/utils/pool';

describe('mapCooperatively', () => {
  it('keeps results in input order', async () => {
    const results = await mapCooperatively([1, 2, 3, 4, 5], 2, (value, index) => `${index}:${value * 10}`);
    expect(results).toEqual(['0:10', '1:20', '2:30', '3:40', '4:50']);
  });

  it('returns an empty list for no items', async () => {
    expect(await mapCooperatively([], 4, () => 1)).toEqual([]);
  });

  it('yields to the caller before running any item', async () => {
    const order: string[] = [];
    const pending = mapCooperatively([1, 2], 2, value => {
      order.push(`task ${value}`);
    });
    order.push('caller');
    await pending;
    expect(order).toEqual(['caller', 'task 1', 'task 2']);
  });

  it('never runs more lanes than items', async () => {
    const seen: number[] = [];
    await mapCooperatively(['x'], 8, (_item, index) => seen.push(index));
    expect(seen).toEqual([0]);
  });
});

describe('defaultConcurrency', () => {
  it('stays between 2 and 8', () => {
    const lanes = defaultConcurrency();
    expect(lanes).toBeGreaterThanOrEqual(2);
    expect(lanes).toBeLessThanOrEqual(8);
  });
});
