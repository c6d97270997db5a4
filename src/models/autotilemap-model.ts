import {
  type AutotileOccupancy,
  type AutotileRuleset,
  RULESET_CENTER,
  matchesRuleset,
} from './autotile-ruleset.js';
import { type CellCoord, DirtyTracker } from './dirty-tracker.js';
import { getTilemapIndex } from './grid-index.js';
import { type TileId, TilemapModel } from './tilemap-model.js';

/**
 * Options for constructing an AutotilemapModel.
 */
export interface AutotilemapOptions {
  /** Key of the tilesheet the produced tile ids index into. */
  tilesheet: string;
  /** Map width in tiles. */
  width: number;
  /** Map height in tiles. */
  height: number;
  /** Tile width in pixels. */
  tileWidth: number;
  /** Tile height in pixels. */
  tileHeight: number;
  /** Initial rulesets, highest priority first. */
  rulesets?: readonly AutotileRuleset[];
}

/**
 * Tile map whose tiles are derived from per-cell occupancy.
 *
 * Callers mark cells as occupied or empty, then call bake() to pick a tile
 * for every cell. Each occupied cell takes the tile id of the first ruleset,
 * in insertion order, whose pattern matches its neighbourhood; cells with no
 * match, and empty cells, get no tile. Order rulesets from most to least
 * specific.
 *
 * Occupancy edits are not reflected in the tile grid until the next bake.
 */
export class AutotilemapModel {
  private _tilemap: TilemapModel;
  private _rulesets: AutotileRuleset[];
  private _autotiles: AutotileOccupancy[];
  private _dirty = new DirtyTracker();

  constructor(options: AutotilemapOptions) {
    this._tilemap = new TilemapModel(options);
    this._rulesets = [...(options.rulesets ?? [])];
    this._autotiles = new Array<AutotileOccupancy>(
      this._tilemap.width * this._tilemap.height,
    ).fill('none');
  }

  // ── Dimensions ────────────────────────────────────────────────────

  get width(): number {
    return this._tilemap.width;
  }

  get height(): number {
    return this._tilemap.height;
  }

  get tilesheet(): string {
    return this._tilemap.tilesheet;
  }

  /** Tile size in pixels. */
  get tileSize(): { width: number; height: number } {
    return { width: this._tilemap.tileWidth, height: this._tilemap.tileHeight };
  }

  // ── Occupancy ─────────────────────────────────────────────────────

  /** Flat occupancy array (row-major, index = y * width + x). */
  get autotiles(): readonly AutotileOccupancy[] {
    return this._autotiles;
  }

  getAutotile(x: number, y: number): AutotileOccupancy {
    return this._autotiles[getTilemapIndex(x, y, this.width, this.height)];
  }

  /** Mark (x, y) as occupied. */
  setTile(x: number, y: number): void {
    this.setAutotile(x, y, 'tile');
  }

  /** Mark (x, y) as empty. */
  setNone(x: number, y: number): void {
    this.setAutotile(x, y, 'none');
  }

  setAutotile(x: number, y: number, value: AutotileOccupancy): void {
    const index = getTilemapIndex(x, y, this.width, this.height);
    if (this._autotiles[index] === value) return;
    this._autotiles[index] = value;
    this._dirty.markArea(x, y, RULESET_CENTER, this.width, this.height);
  }

  /** Set every cell to the same occupancy. */
  fillAutotiles(value: AutotileOccupancy): void {
    this._autotiles.fill(value);
    this._dirty.markFull();
  }

  // ── Rulesets ──────────────────────────────────────────────────────

  /** Rulesets in priority order (index 0 = checked first). */
  get rulesets(): readonly AutotileRuleset[] {
    return this._rulesets;
  }

  /** Append a ruleset at the lowest priority. */
  addRuleset(ruleset: AutotileRuleset): void {
    this._rulesets.push(ruleset);
    this._dirty.markFull();
  }

  /** Remove and return the first ruleset producing `tileId`. */
  removeRuleset(tileId: TileId): AutotileRuleset | undefined {
    const idx = this._rulesets.findIndex((r) => r.tileId === tileId);
    if (idx === -1) {
      return undefined;
    }
    this._dirty.markFull();
    return this._rulesets.splice(idx, 1)[0];
  }

  /** Get the first ruleset producing `tileId`. */
  getRuleset(tileId: TileId): AutotileRuleset | undefined {
    return this._rulesets.find((r) => r.tileId === tileId);
  }

  // ── Tile computation ──────────────────────────────────────────────

  /**
   * Compute the tile id for (x, y) from current occupancy and rulesets.
   *
   * Return null for an empty cell or when no ruleset matches. Throw a
   * BoundsError outside the map.
   */
  computeTileId(x: number, y: number): TileId | null {
    getTilemapIndex(x, y, this.width, this.height);
    const match = this._rulesets.find((r) =>
      matchesRuleset(r, this._autotiles, this.width, this.height, x, y),
    );
    return match ? match.tileId : null;
  }

  /** Get the baked tile id at (x, y). */
  getTileId(x: number, y: number): TileId | null {
    return this._tilemap.getTile(x, y);
  }

  /** Baked tile array (row-major). */
  get tiles(): readonly (TileId | null)[] {
    return this._tilemap.tiles;
  }

  /** Whether occupancy or rulesets changed since the last bake. */
  get needsBake(): boolean {
    return this._dirty.isDirty;
  }

  /**
   * Recompute every cell and write the results into the tile grid.
   *
   * Occupancy is only read, so repeated bakes without edits in between
   * produce the same tiles.
   */
  bake(): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        this._tilemap.setTile(x, y, this.computeTileId(x, y));
      }
    }
    this._dirty.flush();
  }

  /**
   * Recompute only the cells that edits since the last bake can affect.
   *
   * Falls back to a full sweep after a ruleset change, a fill, or when
   * nothing has been baked yet. The resulting tile grid equals what bake()
   * would produce. Return the cells whose tile id changed.
   */
  bakeDirty(): CellCoord[] {
    const { full, cells } = this._dirty.flush();
    const targets: CellCoord[] = full ? this._allCells() : cells;

    const changed: CellCoord[] = [];
    for (const { x, y } of targets) {
      const tileId = this.computeTileId(x, y);
      if (this._tilemap.getTile(x, y) !== tileId) {
        this._tilemap.setTile(x, y, tileId);
        changed.push({ x, y });
      }
    }
    return changed;
  }

  private _allCells(): CellCoord[] {
    const cells: CellCoord[] = [];
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        cells.push({ x, y });
      }
    }
    return cells;
  }
}
