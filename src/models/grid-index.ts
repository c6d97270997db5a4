/**
 * Grid indexing — map (x, y) cell coordinates to a flat row-major index.
 *
 * Shared by the tile grid, the occupancy grid and the ruleset matcher.
 * Index formula: y * width + x.
 */

/** Thrown when a cell coordinate falls outside [0, width) x [0, height). */
export class BoundsError extends Error {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;

  constructor(x: number, y: number, width: number, height: number) {
    super(`Cell (${x}, ${y}) is out of bounds for a ${width}x${height} grid`);
    this.name = 'BoundsError';
    this.x = x;
    this.y = y;
    this.width = width;
    this.height = height;
  }
}

/** Whether (x, y) addresses a cell of a width x height grid. */
export function isInBounds(
  x: number,
  y: number,
  width: number,
  height: number,
): boolean {
  return (
    Number.isInteger(x) &&
    Number.isInteger(y) &&
    x >= 0 &&
    y >= 0 &&
    x < width &&
    y < height
  );
}

/**
 * Get the flat index of (x, y).
 *
 * Throws a BoundsError for negative, fractional or out-of-range coordinates.
 */
export function getTilemapIndex(
  x: number,
  y: number,
  width: number,
  height: number,
): number {
  if (!isInBounds(x, y, width, height)) {
    throw new BoundsError(x, y, width, height);
  }
  return y * width + x;
}
