import { describe, it, expect } from 'vitest';
import { BoundsError, getTilemapIndex, isInBounds } from './grid-index.js';

describe('getTilemapIndex', () => {
  it('returns 0 for the origin', () => {
    expect(getTilemapIndex(0, 0, 4, 3)).toBe(0);
  });

  it('uses row-major order', () => {
    expect(getTilemapIndex(1, 0, 4, 3)).toBe(1);
    expect(getTilemapIndex(0, 1, 4, 3)).toBe(4);
    expect(getTilemapIndex(3, 2, 4, 3)).toBe(11);
  });

  it('throws a BoundsError when x equals width', () => {
    expect(() => getTilemapIndex(4, 0, 4, 3)).toThrow(BoundsError);
  });

  it('throws a BoundsError when y equals height', () => {
    expect(() => getTilemapIndex(0, 3, 4, 3)).toThrow(BoundsError);
  });

  it('throws a BoundsError for negative coordinates', () => {
    expect(() => getTilemapIndex(-1, 0, 4, 3)).toThrow(BoundsError);
    expect(() => getTilemapIndex(0, -1, 4, 3)).toThrow(BoundsError);
  });

  it('throws a BoundsError for fractional coordinates', () => {
    expect(() => getTilemapIndex(0.5, 0, 4, 3)).toThrow(BoundsError);
  });

  it('reports the offending coordinate and grid size', () => {
    try {
      getTilemapIndex(5, 1, 4, 3);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(BoundsError);
      if (err instanceof BoundsError) {
        expect(err.name).toBe('BoundsError');
        expect(err.message).toBe('Cell (5, 1) is out of bounds for a 4x3 grid');
        expect({ x: err.x, y: err.y, width: err.width, height: err.height }).toEqual({
          x: 5,
          y: 1,
          width: 4,
          height: 3,
        });
      }
    }
  });
});

describe('isInBounds', () => {
  it('accepts every corner', () => {
    expect(isInBounds(0, 0, 4, 3)).toBe(true);
    expect(isInBounds(3, 0, 4, 3)).toBe(true);
    expect(isInBounds(0, 2, 4, 3)).toBe(true);
    expect(isInBounds(3, 2, 4, 3)).toBe(true);
  });

  it('rejects coordinates just outside', () => {
    expect(isInBounds(-1, 0, 4, 3)).toBe(false);
    expect(isInBounds(0, -1, 4, 3)).toBe(false);
    expect(isInBounds(4, 0, 4, 3)).toBe(false);
    expect(isInBounds(0, 3, 4, 3)).toBe(false);
  });
});
