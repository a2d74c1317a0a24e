// ============================================================================
// GAME ENGINE - The main API for playing one puzzle session
// ============================================================================

import type { Entity } from '../entities/entity';
import type { PlayerState } from '../entities/player';
import type { MapDef, Tile } from '../map/mapDef';
import type { Position, Direction } from '../map/position';
import type { GameState, PlacedEntity } from '../state/gameState';
import type { GameAction, GameEvent, Result } from '../actions/types';
import type { PotionKind } from '../entities/potion';
import type { GameStatus } from '../rules/outcome';
import { type ShopCatalogue, type ShopItem, createCatalogue, getShopItems } from '../economy/shop';
import { ok, err } from '../actions/types';
import { processAction } from '../actions/pipeline';
import { cloneGameState, getAllEntities, getEntityAt } from '../state/gameState';
import { getTile } from '../map/mapDef';
import { getGameStatus, hasLost, hasWon } from '../rules/outcome';
import { parseLevel } from '../codec/levelFormat';
import { deserializeGame, serializeGame } from '../codec/saveFormat';
import { CorruptSaveError } from '../codec/errors';

// ============================================================================
// SNAPSHOT TYPE
// ============================================================================

export interface GameSnapshot {
  readonly map: MapDef;
  readonly entities: readonly PlacedEntity[];
  readonly player: PlayerState;
  readonly status: GameStatus;
}

export interface GameOptions {
  /** Per-kind price overrides; unspecified kinds keep the default price */
  prices?: Partial<Record<PotionKind, number>>;
}

// ============================================================================
// GAME CLASS
// ============================================================================

/**
 * Game is the SINGLE OWNER of a session's mutable state.
 *
 * Invariants:
 * - All operations are synchronous and deterministic
 * - Illegal moves and purchases change nothing and return ok([])
 * - Actions never throw; structural problems come back as Result errors
 * - Callers only ever receive copies or immutable records
 */
export class Game {
  private state: GameState;
  private readonly initialState: GameState;
  private readonly catalogue: ShopCatalogue;

  constructor(initialState: GameState, options: GameOptions = {}) {
    this.initialState = cloneGameState(initialState);
    this.state = cloneGameState(initialState);
    this.catalogue = createCatalogue(options.prices);
  }

  /**
   * Build a game from level file text.
   * @throws LevelFormatError when the level cannot be parsed
   */
  static fromLevel(source: string, options: GameOptions = {}): Game {
    return new Game(parseLevel(source), options);
  }

  // --------------------------------------------------------------------------
  // Mutators
  // --------------------------------------------------------------------------

  /** Submit an action through the validation -> apply pipeline */
  submitAction(action: GameAction): Result<GameEvent[]> {
    return processAction(this.state, action, this.catalogue);
  }

  attemptMove(direction: Direction): Result<GameEvent[]> {
    return this.submitAction({ type: 'MOVE', direction });
  }

  attemptPurchase(itemId: string): Result<GameEvent[]> {
    return this.submitAction({ type: 'PURCHASE', itemId });
  }

  /** Restore the state the level was constructed with (never a loaded save) */
  reset(): GameEvent[] {
    this.state = cloneGameState(this.initialState);
    return [{ type: 'GAME_RESET' }];
  }

  /**
   * Replace the live state with a decoded save.
   * Decoding finishes before anything is swapped, so a corrupt save leaves
   * the running game exactly as it was.
   */
  loadSave(text: string): Result<GameEvent[]> {
    let decoded: GameState;
    try {
      decoded = deserializeGame(text);
    } catch (e) {
      if (e instanceof CorruptSaveError) {
        return err('CORRUPT_SAVE', e.message);
      }
      throw e;
    }
    this.state = decoded;
    return ok([{ type: 'STATE_RESTORED' }]);
  }

  serialize(): string {
    return serializeGame(this.state);
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  hasWon(): boolean {
    return hasWon(this.state);
  }

  hasLost(): boolean {
    return hasLost(this.state);
  }

  getStatus(): GameStatus {
    return getGameStatus(this.state);
  }

  getDimensions(): { rows: number; cols: number } {
    return { rows: this.state.map.height, cols: this.state.map.width };
  }

  /** The tile grid is frozen, so it is shared rather than copied */
  getMaze(): MapDef {
    return this.state.map;
  }

  getTile(position: Position): Tile | undefined {
    return getTile(this.state.map, position);
  }

  /** Copy of the entity registry keyed by "row,col" */
  getEntities(): ReadonlyMap<string, Entity> {
    return new Map(this.state.entities);
  }

  getEntityAt(position: Position): Entity | undefined {
    return getEntityAt(this.state, position);
  }

  getPlayer(): PlayerState {
    return this.state.player;
  }

  getPlayerPosition(): Position {
    return this.state.player.position;
  }

  getPlayerStrength(): number {
    return this.state.player.strength;
  }

  getPlayerMovesRemaining(): number {
    return this.state.player.movesRemaining;
  }

  getPlayerMoney(): number {
    return this.state.player.money;
  }

  getShopItems(): ShopItem[] {
    return getShopItems(this.catalogue);
  }

  /** Get a read-only snapshot of the session */
  getSnapshot(): GameSnapshot {
    return {
      map: this.state.map,
      entities: getAllEntities(this.state),
      player: this.state.player,
      status: getGameStatus(this.state),
    };
  }
}
