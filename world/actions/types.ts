import type { Position, Direction } from '../map/position';
import type { Collectible } from '../entities/entity';
import type { PotionKind } from '../entities/potion';

// ============================================================================
// GAME ACTIONS - The ONLY way to mutate game state during play
// ============================================================================

/** Move the player one cell, pushing a crate if one is in the way */
export interface MoveAction {
  readonly type: 'MOVE';
  readonly direction: Direction;
}

/** Buy a potion from the shop; its effect applies immediately */
export interface PurchaseAction {
  readonly type: 'PURCHASE';
  readonly itemId: string;
}

/** Discriminated union of all possible actions */
export type GameAction = MoveAction | PurchaseAction;

// ============================================================================
// GAME EVENTS - Outputs returned by the engine (never mutate external systems)
// ============================================================================

/** Emitted when the player relocates (one move consumed) */
export interface PlayerMovedEvent {
  readonly type: 'PLAYER_MOVED';
  readonly from: Position;
  readonly to: Position;
  readonly direction: Direction;
  readonly movesRemaining: number;
}

/** Emitted before PLAYER_MOVED when the move pushed a crate */
export interface CratePushedEvent {
  readonly type: 'CRATE_PUSHED';
  readonly from: Position;
  readonly to: Position;
  readonly strength: number;
}

/** Emitted when the player walks over a coin or potion */
export interface ItemCollectedEvent {
  readonly type: 'ITEM_COLLECTED';
  readonly position: Position;
  readonly item: Collectible['kind'];
  readonly strength: number;
  readonly movesRemaining: number;
  readonly money: number;
}

/** Emitted on a successful shop purchase */
export interface ItemPurchasedEvent {
  readonly type: 'ITEM_PURCHASED';
  readonly itemId: PotionKind;
  readonly price: number;
  readonly strength: number;
  readonly movesRemaining: number;
  readonly money: number;
}

/** Emitted when the session returns to the level's initial state */
export interface GameResetEvent {
  readonly type: 'GAME_RESET';
}

/** Emitted when a decoded save replaces the live state */
export interface StateRestoredEvent {
  readonly type: 'STATE_RESTORED';
}

/** Discriminated union of all game events */
export type GameEvent =
  | PlayerMovedEvent
  | CratePushedEvent
  | ItemCollectedEvent
  | ItemPurchasedEvent
  | GameResetEvent
  | StateRestoredEvent;

// ============================================================================
// RESULT TYPE - Engine never throws from actions, returns Result instead
// ============================================================================

export interface ResultOk<T> {
  readonly ok: true;
  readonly value: T;
}

export interface ResultErr {
  readonly ok: false;
  readonly error: {
    readonly code: string;
    readonly message: string;
  };
}

export type Result<T> = ResultOk<T> | ResultErr;

/** Helper to create success result */
export function ok<T>(value: T): ResultOk<T> {
  return { ok: true, value };
}

/** Helper to create error result */
export function err(code: string, message: string): ResultErr {
  return { ok: false, error: { code, message } };
}
