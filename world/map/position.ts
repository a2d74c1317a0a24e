// ============================================================================
// POSITIONS & DIRECTIONS - Grid addressing shared by every layer
// ============================================================================

export interface Position {
  readonly row: number;
  readonly col: number;
}

export type Direction = 'UP' | 'DOWN' | 'LEFT' | 'RIGHT';

export const DIRECTIONS: readonly Direction[] = ['UP', 'DOWN', 'LEFT', 'RIGHT'];

/** Unit offsets per direction, row-major (row grows downward) */
export const DIRECTION_VECTORS: Readonly<Record<Direction, Position>> = {
  UP: { row: -1, col: 0 },
  DOWN: { row: 1, col: 0 },
  LEFT: { row: 0, col: -1 },
  RIGHT: { row: 0, col: 1 },
};

export function isDirection(value: unknown): value is Direction {
  return typeof value === 'string' && (DIRECTIONS as readonly string[]).includes(value);
}

/** Position one cell away in the given direction (may be out of bounds) */
export function step(position: Position, direction: Direction): Position {
  const vector = DIRECTION_VECTORS[direction];
  return { row: position.row + vector.row, col: position.col + vector.col };
}

/** Registry key for a position, "row,col" */
export function positionKey(position: Position): string {
  return `${position.row},${position.col}`;
}

export function parsePositionKey(key: string): Position | undefined {
  const match = /^(-?\d+),(-?\d+)$/.exec(key);
  if (!match) {
    return undefined;
  }
  return { row: Number(match[1]), col: Number(match[2]) };
}

export function samePosition(a: Position, b: Position): boolean {
  return a.row === b.row && a.col === b.col;
}
