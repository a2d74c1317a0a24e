// ============================================================================
// GAME STATE - The single source of truth for one puzzle session
// ============================================================================

import type { Entity } from '../entities/entity';
import type { PlayerState } from '../entities/player';
import type { MapDef } from '../map/mapDef';
import { type Position, positionKey, parsePositionKey } from '../map/position';

export interface GameState {
  readonly map: MapDef;
  /** Map of "row,col" -> Entity for O(1) lookups */
  readonly entities: Map<string, Entity>;
  /** Replaced wholesale on every change */
  player: PlayerState;
}

export interface PlacedEntity {
  readonly position: Position;
  readonly entity: Entity;
}

/** Create game state; the entity map is copied */
export function createGameState(
  map: MapDef,
  entities: ReadonlyMap<string, Entity>,
  player: PlayerState
): GameState {
  return {
    map,
    entities: new Map(entities),
    player,
  };
}

/**
 * Independent copy for reset and atomic replacement.
 * Map, entities and player records are immutable, so sharing them is safe.
 */
export function cloneGameState(state: GameState): GameState {
  return createGameState(state.map, state.entities, state.player);
}

/** Get entity at a position (returns undefined if the cell is empty) */
export function getEntityAt(state: GameState, position: Position): Entity | undefined {
  return state.entities.get(positionKey(position));
}

/** Check if a cell holds any entity */
export function hasEntityAt(state: GameState, position: Position): boolean {
  return state.entities.has(positionKey(position));
}

/** Get all entities with their positions, in row-major order */
export function getAllEntities(state: GameState): PlacedEntity[] {
  const placed: PlacedEntity[] = [];
  for (const [key, entity] of state.entities) {
    const position = parsePositionKey(key);
    if (position) {
      placed.push({ position, entity });
    }
  }
  return placed.sort((a, b) => a.position.row - b.position.row || a.position.col - b.position.col);
}
