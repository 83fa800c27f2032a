import { describe, it, expect } from 'vitest';
import { segmentLines, splitOn } from '../../src/services/fill.service.segment';
import { ClassifiedLine } from '../../src/core/types';

const marker = (capacity: number): ClassifiedLine => ({ kind: 'inventory', capacity });
const stack = (itemId: number, quantity: number): ClassifiedLine => ({ kind: 'stack', itemId, quantity });
const other = (text: string): ClassifiedLine => ({ kind: 'other', text });

describe('splitOn', () => {
  it('should drop boundaries and keep empty groups', () => {
    expect(splitOn([0, 1, 2, 0, 0, 3], (n) => n === 0)).toEqual([[], [1, 2], [], [3]]);
  });

  it('should yield a single group without boundaries', () => {
    expect(splitOn([1, 2], () => false)).toEqual([[1, 2]]);
    expect(splitOn([], () => false)).toEqual([[]]);
  });
});

describe('segmentLines', () => {
  it('should split before and after every marker', () => {
    const lines = [other('header'), marker(5), stack(1, 3), other(''), marker(10), stack(2, 1)];

    expect(segmentLines(lines)).toEqual([
      [other('header')],
      [stack(1, 3), other('')],
      [stack(2, 1)],
    ]);
  });

  it('should return the whole input as one segment when there are no markers', () => {
    const lines = [stack(1, 3), stack(2, 4)];
    expect(segmentLines(lines)).toEqual([lines]);
  });

  it('should yield empty segments for adjacent and trailing markers', () => {
    expect(segmentLines([marker(1), marker(2)])).toEqual([[], [], []]);
  });

  it('should not modify its input', () => {
    const lines = [marker(5), stack(1, 3)];
    const copy = [...lines];
    segmentLines(lines);
    expect(lines).toEqual(copy);
  });
});
