// ============================================================================
// WORLD MODULE - Single source of truth for the crate puzzle simulation
// ============================================================================

// Core engine
export { Game } from './engine';
export type { GameSnapshot, GameOptions } from './engine';
export { GAME_CONFIG } from './config';

// Entities
export {
  createCrate,
  createCoin,
  createPotion,
  isCrate,
  isCollectible,
  getEntityStrength,
} from './entities/entity';
export type { Entity, EntityKind, Crate, Coin, Potion, Collectible } from './entities/entity';
export { createPlayer, applyEffect } from './entities/player';
export type { PlayerState, PlayerStats } from './entities/player';
export { POTION_KINDS, POTION_EFFECTS, POTION_NAMES, isPotionKind } from './entities/potion';
export type { PotionKind, PotionEffect } from './entities/potion';

// Map
export {
  createMapDef,
  isInBounds,
  getTile,
  isTileBlocked,
  getGoalPositions,
  DIRECTIONS,
  DIRECTION_VECTORS,
  isDirection,
  step,
  positionKey,
  parsePositionKey,
  samePosition,
} from './map';
export type { MapDef, Tile, Position, Direction } from './map';

// Actions & Events
export type {
  GameAction,
  MoveAction,
  PurchaseAction,
  GameEvent,
  PlayerMovedEvent,
  CratePushedEvent,
  ItemCollectedEvent,
  ItemPurchasedEvent,
  GameResetEvent,
  StateRestoredEvent,
  Result,
  ResultOk,
  ResultErr,
} from './actions/types';
export { ok, err } from './actions/types';

// Pipeline (exposed for testing/advanced use)
export { validateAction, applyAction, processAction } from './actions/pipeline';

// Economy
export { DEFAULT_CATALOGUE, createCatalogue, getShopItems, getPrice, purchase } from './economy/shop';
export type { ShopCatalogue, ShopItem, PurchaseOutcome } from './economy/shop';

// Win/loss
export { hasWon, hasLost, getGameStatus } from './rules/outcome';
export type { GameStatus } from './rules/outcome';

// Codecs
export { parseLevel } from './codec/levelFormat';
export { serializeGame, deserializeGame } from './codec/saveFormat';
export { BoardFormatError, LevelFormatError, CorruptSaveError } from './codec/errors';

// State (exposed for testing/advanced use)
export type { GameState, PlacedEntity } from './state/gameState';
export { createGameState, cloneGameState, getEntityAt, hasEntityAt, getAllEntities } from './state/gameState';
