import type { Position } from '../map/position';
import type { PotionEffect } from './potion';
import { GAME_CONFIG } from '../config';

export interface PlayerState {
  readonly position: Position;
  readonly strength: number;
  readonly movesRemaining: number;
  readonly money: number;
}

export interface PlayerStats {
  strength: number;
  movesRemaining: number;
  money?: number;
}

/** Create a player with validated fields */
export function createPlayer(position: Position, stats: PlayerStats): PlayerState {
  return {
    position: { row: position.row, col: position.col },
    strength: Math.max(1, Math.floor(stats.strength)),
    movesRemaining: Math.max(0, Math.floor(stats.movesRemaining)),
    money: Math.max(0, Math.floor(stats.money ?? GAME_CONFIG.STARTING_MONEY)),
  };
}

/** Apply a potion effect. Floor pickups and shop purchases both go through here. */
export function applyEffect(player: PlayerState, effect: PotionEffect): PlayerState {
  return {
    ...player,
    strength: player.strength + effect.strength,
    movesRemaining: player.movesRemaining + effect.moves,
  };
}
