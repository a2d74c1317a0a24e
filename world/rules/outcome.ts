import type { GameState } from '../state/gameState';
import { getGoalPositions } from '../map/mapDef';
import { getEntityAt } from '../state/gameState';

export type GameStatus = 'PLAYING' | 'WON' | 'LOST';

/**
 * Every goal tile holds a crate. Extra crates elsewhere do not matter,
 * and a maze without goals is won.
 */
export function hasWon(state: GameState): boolean {
  return getGoalPositions(state.map).every(goal => getEntityAt(state, goal)?.kind === 'CRATE');
}

/** Out of moves with at least one goal uncovered */
export function hasLost(state: GameState): boolean {
  return state.player.movesRemaining === 0 && !hasWon(state);
}

export function getGameStatus(state: GameState): GameStatus {
  if (hasWon(state)) {
    return 'WON';
  }
  return hasLost(state) ? 'LOST' : 'PLAYING';
}
