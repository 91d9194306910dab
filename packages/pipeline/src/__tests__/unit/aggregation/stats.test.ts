import { describe, it, expect } from 'vitest';
import { latestBy, max, mean, min, mode, percentage } from '../../../aggregation/stats.js';

describe('aggregate helpers', () => {
  it('ignore nulls', () => {
    expect(mean([1, null, 2])).toBe(1.5);
    expect(min([null, 3, 1])).toBe(1);
    expect(max([null, 3, 1])).toBe(3);
  });

  it('yield null for an all-null group, never zero', () => {
    expect(mean([null, null])).toBeNull();
    expect(min([])).toBeNull();
    expect(max([null])).toBeNull();
    expect(mode([null])).toBeNull();
  });

  it('break mode ties toward the smallest value', () => {
    expect(mode(['b', 'a', 'b', 'a'])).toBe('a');
    expect(mode(['x', null, 'x', 'y'])).toBe('x');
  });

  it('take the latest non-null value', () => {
    const items = [
      { time: '2024-03-01T10:00:00Z', value: 1 },
      { time: '2024-03-01T12:00:00Z', value: null },
      { time: '2024-03-01T11:00:00Z', value: 2 },
    ];
    expect(latestBy(items, (i) => i.time, (i) => i.value)).toBe(2);
  });

  it('compute percentages', () => {
    expect(percentage(1, 3, 1)).toBe(33.3);
    expect(percentage(2, 3, 2)).toBe(66.67);
    expect(percentage(0, 0, 1)).toBe(0);
  });
});
