// ============================================================================
// BOARD TEXT - Grid grammar shared by level files and saves
// ============================================================================
//
//   <header>
//   <row 0>            one character per cell, every row the same width
//   ...
//   [goals: r,c r,c]   goal cells hidden under the player or an entity
//

import type { Entity } from '../entities/entity';
import type { GameState } from '../state/gameState';
import type { BoardFormatError } from './errors';
import { type Tile, type MapDef, createMapDef } from '../map/mapDef';
import { type Position, positionKey, samePosition } from '../map/position';
import { type PotionKind, POTION_KINDS } from '../entities/potion';
import { createCoin, createCrate, createPotion } from '../entities/entity';

export const MARKERS = {
  WALL: 'W',
  FLOOR: ' ',
  GOAL: 'G',
  PLAYER: 'P',
  COIN: '$',
} as const;

export const POTION_MARKERS: Readonly<Record<PotionKind, string>> = {
  STRENGTH_POTION: 'S',
  MOVE_POTION: 'M',
  FANCY_POTION: 'F',
};

export const GOALS_PREFIX = 'goals:';

/** Builds the error thrown for a malformed input, so levels and saves keep their own types */
export type FormatErrorFactory = (message: string, line?: number) => BoardFormatError;

export interface ParsedBoard {
  map: MapDef;
  entities: Map<string, Entity>;
  playerPosition: Position;
}

/**
 * Split into lines, accepting \r\n and dropping trailing empty lines.
 * Whitespace-only lines are kept: they are all-floor grid rows.
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Parse a header of space-separated non-negative integers.
 * Returns undefined unless the count is one of `allowedCounts` and every
 * value is a safe integer.
 */
export function parseHeaderNumbers(line: string, allowedCounts: readonly number[]): number[] | undefined {
  const parts = line.trim().split(/\s+/);
  const isExact = (part: string) => /^\d+$/.test(part) && Number.isSafeInteger(Number(part));
  if (!allowedCounts.includes(parts.length) || !parts.every(isExact)) {
    return undefined;
  }
  return parts.map(Number);
}

/**
 * Parse the grid rows and optional goals trailer.
 * `lines` excludes the header; `firstLine` is the 1-based number of lines[0].
 */
export function parseBoard(lines: readonly string[], firstLine: number, fail: FormatErrorFactory): ParsedBoard {
  const last = lines[lines.length - 1];
  const hasTrailer = last !== undefined && last.startsWith(GOALS_PREFIX);
  const rows = hasTrailer ? lines.slice(0, -1) : lines;

  const firstRow = rows[0];
  if (firstRow === undefined || firstRow.length === 0) {
    throw fail('Board has no grid rows', firstLine);
  }
  const width = firstRow.length;

  const tiles: Tile[][] = [];
  const entities = new Map<string, Entity>();
  let playerPosition: Position | undefined;

  for (const [row, text] of rows.entries()) {
    const lineNumber = firstLine + row;
    if (text.length !== width) {
      throw fail(`Row has width ${text.length}, expected ${width}`, lineNumber);
    }
    const tileRow: Tile[] = [];
    for (const [col, char] of [...text].entries()) {
      const position = { row, col };
      const cell = decodeCell(char);
      if (!cell) {
        throw fail(`Unknown cell character ${JSON.stringify(char)} at column ${col}`, lineNumber);
      }
      tileRow.push(cell.tile);
      if (cell.player) {
        if (playerPosition) {
          throw fail('Board has more than one player', lineNumber);
        }
        playerPosition = position;
      }
      if (cell.entity) {
        entities.set(positionKey(position), cell.entity);
      }
    }
    tiles.push(tileRow);
  }

  if (!playerPosition) {
    throw fail('Board has no player', firstLine);
  }

  if (hasTrailer) {
    const trailerLine = firstLine + rows.length;
    for (const goal of parseGoalsTrailer(last, trailerLine, fail)) {
      const tileRow = tiles[goal.row];
      if (!tileRow || goal.col >= width) {
        throw fail(`Goal ${goal.row},${goal.col} is out of bounds`, trailerLine);
      }
      if (tileRow[goal.col] === 'WALL') {
        throw fail(`Goal ${goal.row},${goal.col} is on a wall`, trailerLine);
      }
      tileRow[goal.col] = 'GOAL';
    }
  }

  return { map: createMapDef(tiles), entities, playerPosition };
}

interface DecodedCell {
  tile: Tile;
  entity?: Entity;
  player?: boolean;
}

function decodeCell(char: string): DecodedCell | undefined {
  switch (char) {
    case MARKERS.WALL:
      return { tile: 'WALL' };
    case MARKERS.FLOOR:
      return { tile: 'FLOOR' };
    case MARKERS.GOAL:
      return { tile: 'GOAL' };
    case MARKERS.PLAYER:
      return { tile: 'FLOOR', player: true };
    case MARKERS.COIN:
      return { tile: 'FLOOR', entity: createCoin() };
  }
  const potion = POTION_KINDS.find(kind => POTION_MARKERS[kind] === char);
  if (potion) {
    return { tile: 'FLOOR', entity: createPotion(potion) };
  }
  if (/^[1-9]$/.test(char)) {
    return { tile: 'FLOOR', entity: createCrate(Number(char)) };
  }
  return undefined;
}

function parseGoalsTrailer(line: string, lineNumber: number, fail: FormatErrorFactory): Position[] {
  const body = line.slice(GOALS_PREFIX.length).trim();
  if (body === '') {
    return [];
  }
  return body.split(/\s+/).map(token => {
    const match = /^(\d+),(\d+)$/.exec(token);
    if (!match) {
      throw fail(`Malformed goal position ${JSON.stringify(token)}`, lineNumber);
    }
    return { row: Number(match[1]), col: Number(match[2]) };
  });
}

// ============================================================================
// PRINTING
// ============================================================================

/** Grid rows plus the goals trailer when any goal is covered */
export function printBoard(state: GameState): string[] {
  const lines: string[] = [];
  const hiddenGoals: Position[] = [];

  state.map.tiles.forEach((tileRow, row) => {
    let text = '';
    tileRow.forEach((tile, col) => {
      const position = { row, col };
      const char = encodeCell(state, tile, position);
      if (tile === 'GOAL' && char !== MARKERS.GOAL) {
        hiddenGoals.push(position);
      }
      text += char;
    });
    lines.push(text);
  });

  if (hiddenGoals.length > 0) {
    lines.push(`${GOALS_PREFIX} ${hiddenGoals.map(goal => `${goal.row},${goal.col}`).join(' ')}`);
  }
  return lines;
}

function encodeCell(state: GameState, tile: Tile, position: Position): string {
  if (samePosition(position, state.player.position)) {
    return MARKERS.PLAYER;
  }
  if (tile === 'WALL') {
    return MARKERS.WALL;
  }
  const entity = state.entities.get(positionKey(position));
  if (entity) {
    return encodeEntity(entity);
  }
  return tile === 'GOAL' ? MARKERS.GOAL : MARKERS.FLOOR;
}

function encodeEntity(entity: Entity): string {
  switch (entity.kind) {
    case 'CRATE':
      return String(entity.strength);
    case 'COIN':
      return MARKERS.COIN;
    case 'STRENGTH_POTION':
    case 'MOVE_POTION':
    case 'FANCY_POTION':
      return POTION_MARKERS[entity.kind];
  }
}
