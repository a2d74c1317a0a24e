// ============================================================================
// MAP DEFINITION - Immutable tile grid (the maze)
// ============================================================================

import type { Position } from './position';

export type Tile = 'WALL' | 'FLOOR' | 'GOAL';

export interface MapDef {
  readonly width: number;
  readonly height: number;
  /** Tile grid in row-major order [row][col] */
  readonly tiles: ReadonlyArray<ReadonlyArray<Tile>>;
}

/**
 * Create a map definition from a tile grid.
 * Rows are copied; the grid must be rectangular (checked by the codecs before this).
 */
export function createMapDef(tiles: ReadonlyArray<ReadonlyArray<Tile>>): MapDef {
  const rows = tiles.map(row => Object.freeze([...row]));
  return {
    width: rows[0]?.length ?? 0,
    height: rows.length,
    tiles: Object.freeze(rows),
  };
}

/** Check if a position is within map bounds */
export function isInBounds(map: MapDef, position: Position): boolean {
  return (
    position.row >= 0 &&
    position.row < map.height &&
    position.col >= 0 &&
    position.col < map.width
  );
}

/** Tile at a position, or undefined when out of bounds */
export function getTile(map: MapDef, position: Position): Tile | undefined {
  if (!isInBounds(map, position)) {
    return undefined;
  }
  return map.tiles[position.row]?.[position.col];
}

/**
 * Check if a tile is blocked by static terrain.
 * Returns true if out of bounds or if the tile is a wall.
 */
export function isTileBlocked(map: MapDef, position: Position): boolean {
  const tile = getTile(map, position);
  return tile === undefined || tile === 'WALL';
}

/** All goal positions, top-to-bottom then left-to-right */
export function getGoalPositions(map: MapDef): Position[] {
  const goals: Position[] = [];
  map.tiles.forEach((row, rowIndex) => {
    row.forEach((tile, colIndex) => {
      if (tile === 'GOAL') {
        goals.push({ row: rowIndex, col: colIndex });
      }
    });
  });
  return goals;
}
