/** A cell coordinate. */
export interface CellCoord {
  x: number;
  y: number;
}

/**
 * Track cells whose tile id may have changed since the last bake, so a
 * rebake can revisit only those instead of sweeping the whole map.
 */
export class DirtyTracker {
  private _cells = new Set<string>();
  private _full = true; // Nothing has been baked yet

  /** Mark a single cell as dirty. */
  markCell(x: number, y: number): void {
    this._cells.add(`${x},${y}`);
  }

  /**
   * Mark every cell within `radius` of (x, y), clamped to the map.
   *
   * An occupancy edit can change the match result of any cell whose
   * pattern reaches it, i.e. the square of side 2 * radius + 1 around it.
   */
  markArea(
    x: number,
    y: number,
    radius: number,
    width: number,
    height: number,
  ): void {
    const minX = Math.max(0, x - radius);
    const maxX = Math.min(width - 1, x + radius);
    const minY = Math.max(0, y - radius);
    const maxY = Math.min(height - 1, y + radius);
    for (let cy = minY; cy <= maxY; cy++) {
      for (let cx = minX; cx <= maxX; cx++) {
        this.markCell(cx, cy);
      }
    }
  }

  /** Mark the entire map as needing a full rebake. */
  markFull(): void {
    this._full = true;
  }

  /** Whether anything at all is pending. */
  get isDirty(): boolean {
    return this._full || this._cells.size > 0;
  }

  /** Get all dirty cells and clear them. */
  flush(): { full: boolean; cells: CellCoord[] } {
    const result = {
      full: this._full,
      cells: [...this._cells].map((key) => {
        const [x, y] = key.split(',').map(Number);
        return { x, y };
      }),
    };
    this._cells.clear();
    this._full = false;
    return result;
  }
}
