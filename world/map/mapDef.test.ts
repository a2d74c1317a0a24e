import { describe, it, expect } from 'vitest';
import { createMapDef, getGoalPositions, getTile, isInBounds, isTileBlocked } from './mapDef';
import { parsePositionKey, positionKey, step } from './position';

const map = createMapDef([
  ['WALL', 'GOAL', 'FLOOR'],
  ['GOAL', 'FLOOR', 'WALL'],
]);

describe('mapDef', () => {
  it('derives dimensions from the grid', () => {
    expect(map.width).toBe(3);
    expect(map.height).toBe(2);
  });

  it('blocks walls and everything out of bounds', () => {
    expect(isTileBlocked(map, { row: 0, col: 0 })).toBe(true);
    expect(isTileBlocked(map, { row: 0, col: 2 })).toBe(false);
    expect(isTileBlocked(map, { row: -1, col: 1 })).toBe(true);
    expect(isTileBlocked(map, { row: 1, col: 3 })).toBe(true);
    expect(isInBounds(map, { row: 2, col: 0 })).toBe(false);
    expect(getTile(map, { row: 5, col: 5 })).toBeUndefined();
  });

  it('lists goals in row-major order', () => {
    expect(getGoalPositions(map)).toEqual([
      { row: 0, col: 1 },
      { row: 1, col: 0 },
    ]);
  });
});

describe('positions', () => {
  it('steps one cell per direction', () => {
    const origin = { row: 3, col: 3 };
    expect(step(origin, 'UP')).toEqual({ row: 2, col: 3 });
    expect(step(origin, 'DOWN')).toEqual({ row: 4, col: 3 });
    expect(step(origin, 'LEFT')).toEqual({ row: 3, col: 2 });
    expect(step(origin, 'RIGHT')).toEqual({ row: 3, col: 4 });
  });

  it('round-trips registry keys', () => {
    expect(positionKey({ row: 4, col: 11 })).toBe('4,11');
    expect(parsePositionKey('4,11')).toEqual({ row: 4, col: 11 });
    expect(parsePositionKey('nope')).toBeUndefined();
  });
});
