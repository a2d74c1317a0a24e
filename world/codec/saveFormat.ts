// ============================================================================
// SAVE FORMAT - Pure text <-> GameState codec for persisted sessions
// ============================================================================

import type { GameState } from '../state/gameState';
import { createGameState } from '../state/gameState';
import { createPlayer } from '../entities/player';
import { GAME_CONFIG } from '../config';
import { CorruptSaveError } from './errors';
import { parseBoard, parseHeaderNumbers, printBoard, splitLines } from './board';

const saveError = (message: string, line?: number) => new CorruptSaveError(message, line);

/**
 * Encode the full mutable state.
 * Header is `strength moves money`; coins, goals and hidden goals are kept.
 */
export function serializeGame(state: GameState): string {
  const { strength, movesRemaining, money } = state.player;
  const lines = [`${strength} ${movesRemaining} ${money}`, ...printBoard(state)];
  return `${lines.join('\n')}\n`;
}

/**
 * Decode a save into a brand-new state. Never touches a live game.
 *
 * Also accepts the older two-number header (`strength moves`); money then
 * falls back to STARTING_MONEY.
 *
 * @throws CorruptSaveError
 */
export function deserializeGame(text: string): GameState {
  const [header, ...rest] = splitLines(text);
  if (header === undefined) {
    throw saveError('Save is empty');
  }
  const stats = parseHeaderNumbers(header, [2, 3]);
  if (!stats) {
    throw saveError('Header must be "<strength> <moves> [money]"', 1);
  }
  const [strength = 0, movesRemaining = 0, money = GAME_CONFIG.STARTING_MONEY] = stats;
  if (strength < 1) {
    throw saveError('Strength must be at least 1', 1);
  }

  const board = parseBoard(rest, 2, saveError);
  return createGameState(
    board.map,
    board.entities,
    createPlayer(board.playerPosition, { strength, movesRemaining, money })
  );
}
