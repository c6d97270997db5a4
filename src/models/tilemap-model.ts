import { getTilemapIndex } from './grid-index.js';

/** Index of a tile within a tilesheet. */
export type TileId = number;

/**
 * Options for constructing a TilemapModel.
 */
export interface TilemapOptions {
  /** Key of the tilesheet the tile ids index into. */
  tilesheet: string;
  /** Map width in tiles. */
  width: number;
  /** Map height in tiles. */
  height: number;
  /** Tile width in pixels. */
  tileWidth: number;
  /** Tile height in pixels. */
  tileHeight: number;
}

/** Throw a RangeError unless `value` is a positive integer. */
export function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/** Throw a RangeError unless `tileId` is a non-negative integer. */
export function assertTileId(tileId: TileId): void {
  if (!Number.isInteger(tileId) || tileId < 0) {
    throw new RangeError(`Tile id must be a non-negative integer, got ${tileId}`);
  }
}

/**
 * Storage grid of final tile ids.
 *
 * Hold map dimensions, tile size and the tilesheet key, plus one optional
 * tile id per cell in row-major order. `null` marks an empty cell. Cell
 * access throws a BoundsError outside the map.
 */
export class TilemapModel {
  readonly tilesheet: string;
  readonly width: number;
  readonly height: number;
  readonly tileWidth: number;
  readonly tileHeight: number;

  private _tiles: Array<TileId | null>;

  constructor(options: TilemapOptions) {
    assertPositiveInteger('Map width', options.width);
    assertPositiveInteger('Map height', options.height);
    assertPositiveInteger('Tile width', options.tileWidth);
    assertPositiveInteger('Tile height', options.tileHeight);

    this.tilesheet = options.tilesheet;
    this.width = options.width;
    this.height = options.height;
    this.tileWidth = options.tileWidth;
    this.tileHeight = options.tileHeight;
    this._tiles = new Array<TileId | null>(this.width * this.height).fill(null);
  }

  // ── Cell access ───────────────────────────────────────────────────

  /** Flat tile array (row-major, index = y * width + x). */
  get tiles(): readonly (TileId | null)[] {
    return this._tiles;
  }

  /** Get the tile id at (x, y), or null for an empty cell. */
  getTile(x: number, y: number): TileId | null {
    const index = getTilemapIndex(x, y, this.width, this.height);
    return this._tiles[index] ?? null;
  }

  /** Set or clear (with null) the tile id at (x, y). */
  setTile(x: number, y: number, tileId: TileId | null): void {
    const index = getTilemapIndex(x, y, this.width, this.height);
    if (tileId !== null) {
      assertTileId(tileId);
    }
    this._tiles[index] = tileId;
  }

  /** Clear every cell. */
  clear(): void {
    this._tiles.fill(null);
  }
}
