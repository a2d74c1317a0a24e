// ============================================================================
// ACTION PIPELINE - Every move and purchase goes through this pipeline
// ============================================================================

import { type GameState, hasEntityAt } from '../state/gameState';
import type { Collectible } from '../entities/entity';
import type { PlayerState } from '../entities/player';
import type { ShopCatalogue } from '../economy/shop';
import type { GameAction, GameEvent, Result } from './types';
import { ok, err } from './types';
import { type Direction, isDirection, positionKey, step } from '../map/position';
import { isTileBlocked } from '../map/mapDef';
import { isCollectible } from '../entities/entity';
import { applyEffect } from '../entities/player';
import { POTION_EFFECTS } from '../entities/potion';
import { purchase } from '../economy/shop';
import { GAME_CONFIG } from '../config';

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Structural checks only; actions may come straight off a socket.
 * Illegal but well-formed moves and purchases pass here and are rejected
 * silently during application.
 */
export function validateAction(action: GameAction): Result<void> {
  switch (action.type) {
    case 'MOVE':
      if (!isDirection(action.direction)) {
        return err('INVALID_ACTION', `Unknown direction: ${String(action.direction)}`);
      }
      return ok(undefined);
    case 'PURCHASE':
      if (typeof action.itemId !== 'string') {
        return err('INVALID_ACTION', 'itemId must be a string');
      }
      return ok(undefined);
    default:
      return assertNever(action);
  }
}

function assertNever(action: never): Result<void> {
  return err('INVALID_ACTION', `Unknown action: ${JSON.stringify(action)}`);
}

// ============================================================================
// APPLICATION
// ============================================================================

export function applyAction(
  state: GameState,
  action: GameAction,
  catalogue: ShopCatalogue
): GameEvent[] {
  switch (action.type) {
    case 'MOVE':
      return applyMoveAction(state, action.direction);
    case 'PURCHASE':
      return applyPurchaseAction(state, action.itemId, catalogue);
  }
}

function applyMoveAction(state: GameState, direction: Direction): GameEvent[] {
  const player = state.player;
  if (player.movesRemaining <= 0) {
    return [];
  }

  const target = step(player.position, direction);
  if (isTileBlocked(state.map, target)) {
    return []; // Wall or edge of the maze
  }

  const events: GameEvent[] = [];
  const targetKey = positionKey(target);
  const occupant = state.entities.get(targetKey);

  if (occupant?.kind === 'CRATE') {
    const beyond = step(target, direction);
    const beyondKey = positionKey(beyond);
    // Push distance is always 1: any entity beyond blocks, crates never chain
    if (isTileBlocked(state.map, beyond) || hasEntityAt(state, beyond)) {
      return [];
    }
    if (player.strength < occupant.strength) {
      return [];
    }
    state.entities.delete(targetKey);
    state.entities.set(beyondKey, occupant);
    events.push({
      type: 'CRATE_PUSHED',
      from: target,
      to: beyond,
      strength: occupant.strength,
    });
  }

  state.player = {
    ...player,
    position: target,
    movesRemaining: player.movesRemaining - 1,
  };
  events.push({
    type: 'PLAYER_MOVED',
    from: player.position,
    to: target,
    direction,
    movesRemaining: state.player.movesRemaining,
  });

  if (occupant && isCollectible(occupant)) {
    state.entities.delete(targetKey);
    state.player = collect(state.player, occupant);
    events.push({
      type: 'ITEM_COLLECTED',
      position: target,
      item: occupant.kind,
      strength: state.player.strength,
      movesRemaining: state.player.movesRemaining,
      money: state.player.money,
    });
  }

  return events;
}

/** Effect of walking over a collectible */
function collect(player: PlayerState, item: Collectible): PlayerState {
  switch (item.kind) {
    case 'COIN':
      return { ...player, money: player.money + GAME_CONFIG.COIN_VALUE };
    case 'STRENGTH_POTION':
    case 'MOVE_POTION':
    case 'FANCY_POTION':
      return applyEffect(player, POTION_EFFECTS[item.kind]);
  }
}

function applyPurchaseAction(
  state: GameState,
  itemId: string,
  catalogue: ShopCatalogue
): GameEvent[] {
  const outcome = purchase(state.player, catalogue, itemId);
  if (!outcome) {
    return []; // Unknown item or not enough money
  }
  state.player = outcome.player;
  return [
    {
      type: 'ITEM_PURCHASED',
      itemId: outcome.itemId,
      price: outcome.price,
      strength: outcome.player.strength,
      movesRemaining: outcome.player.movesRemaining,
      money: outcome.player.money,
    },
  ];
}

// ============================================================================
// UNIFIED PIPELINE ENTRY POINT
// ============================================================================

export function processAction(
  state: GameState,
  action: GameAction,
  catalogue: ShopCatalogue
): Result<GameEvent[]> {
  const validationResult = validateAction(action);
  if (!validationResult.ok) {
    return validationResult;
  }
  return ok(applyAction(state, action, catalogue));
}
