/**
 * Autotile Ruleset — neighbourhood patterns and the matcher that tests them.
 *
 * A ruleset is a 5x5 pattern centred on the cell being evaluated plus the
 * tile id it produces. Patterns are indexed grid[row][col], so a pattern
 * literal reads the way it looks on the map: row 0 is two cells above the
 * centre, col 0 two cells to its left. The centre entry grid[2][2] is never
 * read; the evaluated cell itself must be occupied. Patterns written
 * column-first as grid[x][y] must be transposed before use here.
 *
 * Most rulesets only care about the 3x3 ring around the centre. Fill the
 * outer ring with 'any' for those.
 */

import { isInBounds } from './grid-index.js';
import { assertTileId, type TileId } from './tilemap-model.js';

/** Occupancy marker stored for every cell of an autotile map. */
export type AutotileOccupancy = 'none' | 'tile';

/** Expected neighbour state inside a ruleset pattern. 'any' is a wildcard. */
export type AutotileRulesetValue = 'none' | 'tile' | 'any';

/** Side length of a ruleset pattern. */
export const RULESET_GRID_SIZE = 5;

/** Row/column of the pattern entry that stands for the evaluated cell. */
export const RULESET_CENTER = 2;

/** One row of a ruleset pattern. */
export type RulesetRow = readonly [
  AutotileRulesetValue,
  AutotileRulesetValue,
  AutotileRulesetValue,
  AutotileRulesetValue,
  AutotileRulesetValue,
];

/** Fixed 5x5 ruleset pattern, indexed grid[row][col]. */
export type RulesetGrid = readonly [
  RulesetRow,
  RulesetRow,
  RulesetRow,
  RulesetRow,
  RulesetRow,
];

/** A pattern plus the tile id shown where it matches. */
export interface AutotileRuleset {
  readonly tileId: TileId;
  readonly grid: RulesetGrid;
}

/** Thrown for malformed pattern rows passed to parseRulesetPattern. */
export class RulesetPatternError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RulesetPatternError';
  }
}

// ── Grid construction ──────────────────────────────────────────────────

/** Build a pattern by asking `cell` for each (col, row). */
export function buildRulesetGrid(
  cell: (col: number, row: number) => AutotileRulesetValue,
): RulesetGrid {
  const row = (r: number): RulesetRow => [
    cell(0, r),
    cell(1, r),
    cell(2, r),
    cell(3, r),
    cell(4, r),
  ];
  return [row(0), row(1), row(2), row(3), row(4)];
}

/** Create a pattern with every entry set to `fill`. */
export function createRulesetGrid(
  fill: AutotileRulesetValue = 'any',
): RulesetGrid {
  return buildRulesetGrid(() => fill);
}

// ── Pattern shorthand ──────────────────────────────────────────────────

const SYMBOL_VALUES: Readonly<Record<string, AutotileRulesetValue>> = {
  '#': 'tile',
  '.': 'none',
  '?': 'any',
  '*': 'any',
};

const VALUE_SYMBOLS: Readonly<Record<AutotileRulesetValue, string>> = {
  tile: '#',
  none: '.',
  any: '?',
};

/**
 * Parse pattern rows written in shorthand.
 *
 * `#` = tile, `.` = none, `?` or `*` = any. Whitespace is ignored and the
 * centre symbol may be anything. Accepts five rows of five symbols, or
 * three rows of three, which are padded with 'any' to 5x5.
 *
 * @example
 * parseRulesetPattern([
 *   '?.?',
 *   '.X.',
 *   '?.?',
 * ]); // isolated tile: no orthogonal neighbours
 */
export function parseRulesetPattern(rows: readonly string[]): RulesetGrid {
  const size = rows.length;
  if (size !== RULESET_GRID_SIZE && size !== 3) {
    throw new RulesetPatternError(
      `Pattern must have 3 or ${RULESET_GRID_SIZE} rows, got ${size}`,
    );
  }

  const cleaned = rows.map((r) => r.replace(/\s+/g, ''));
  cleaned.forEach((r, i) => {
    if (r.length !== size) {
      throw new RulesetPatternError(
        `Pattern row ${i} must have ${size} symbols, got ${r.length}`,
      );
    }
  });

  const offset = (RULESET_GRID_SIZE - size) / 2;
  const centre = (size - 1) / 2;

  return buildRulesetGrid((col, row) => {
    const c = col - offset;
    const r = row - offset;
    if (c < 0 || r < 0 || c >= size || r >= size) return 'any';
    if (c === centre && r === centre) return 'any';

    const symbol = cleaned[r].charAt(c);
    const value = SYMBOL_VALUES[symbol];
    if (value === undefined) {
      throw new RulesetPatternError(
        `Unknown pattern symbol '${symbol}' at row ${r}, column ${c}`,
      );
    }
    return value;
  });
}

/** Format a pattern as five shorthand rows, with `X` at the centre. */
export function formatRulesetPattern(grid: RulesetGrid): string[] {
  return grid.map((row, r) =>
    row
      .map((value, c) =>
        r === RULESET_CENTER && c === RULESET_CENTER ? 'X' : VALUE_SYMBOLS[value],
      )
      .join(''),
  );
}

/**
 * Create a ruleset from a pattern grid or shorthand rows.
 *
 * Throws a RangeError for a negative or fractional tile id.
 */
export function createRuleset(
  tileId: TileId,
  pattern: RulesetGrid | readonly string[],
): AutotileRuleset {
  assertTileId(tileId);
  return {
    tileId,
    grid: isPatternRows(pattern) ? parseRulesetPattern(pattern) : pattern,
  };
}

function isPatternRows(
  pattern: RulesetGrid | readonly string[],
): pattern is readonly string[] {
  return !Array.isArray(pattern[0]);
}

// ── Matching ───────────────────────────────────────────────────────────

/**
 * Resolve the value a neighbour contributes to a match.
 *
 * Cells outside the map resolve to 'any', so they only satisfy pattern
 * entries that are themselves 'any'.
 */
export function resolveRulesetValue(
  autotiles: readonly AutotileOccupancy[],
  width: number,
  height: number,
  x: number,
  y: number,
): AutotileRulesetValue {
  if (!isInBounds(x, y, width, height)) {
    return 'any';
  }
  return autotiles[y * width + x] === 'tile' ? 'tile' : 'none';
}

/**
 * Test whether `ruleset` applies to the cell at (x, y).
 *
 * The cell must be in bounds and occupied. Every non-centre pattern entry
 * other than 'any' must then equal the resolved neighbour value. 'any'
 * entries are skipped without a lookup.
 */
export function matchesRuleset(
  ruleset: AutotileRuleset,
  autotiles: readonly AutotileOccupancy[],
  width: number,
  height: number,
  x: number,
  y: number,
): boolean {
  if (!isInBounds(x, y, width, height) || autotiles[y * width + x] !== 'tile') {
    return false;
  }

  for (let row = 0; row < RULESET_GRID_SIZE; row++) {
    for (let col = 0; col < RULESET_GRID_SIZE; col++) {
      if (row === RULESET_CENTER && col === RULESET_CENTER) continue;

      const expected = ruleset.grid[row][col];
      if (expected === 'any') continue;

      const actual = resolveRulesetValue(
        autotiles,
        width,
        height,
        x + col - RULESET_CENTER,
        y + row - RULESET_CENTER,
      );
      if (expected !== actual) {
        return false;
      }
    }
  }

  return true;
}
