import type { GameState } from '../state/gameState';
import { createGameState } from '../state/gameState';
import { createPlayer } from '../entities/player';
import { GAME_CONFIG } from '../config';
import { LevelFormatError } from './errors';
import { parseBoard, parseHeaderNumbers, splitLines } from './board';

const levelError = (message: string, line?: number) => new LevelFormatError(message, line);

/**
 * Parse a level file into a fresh game state.
 *
 * Line 1 is `strength moves`; money always starts at STARTING_MONEY.
 * Throws LevelFormatError on malformed input.
 */
export function parseLevel(text: string): GameState {
  const [header, ...rest] = splitLines(text);
  if (header === undefined) {
    throw levelError('Level is empty');
  }
  const stats = parseHeaderNumbers(header, [2]);
  if (!stats) {
    throw levelError('Header must be "<strength> <moves>"', 1);
  }
  const [strength = 0, movesRemaining = 0] = stats;
  if (strength < 1) {
    throw levelError('Strength must be at least 1', 1);
  }

  const board = parseBoard(rest, 2, levelError);
  return createGameState(
    board.map,
    board.entities,
    createPlayer(board.playerPosition, {
      strength,
      movesRemaining,
      money: GAME_CONFIG.STARTING_MONEY,
    })
  );
}
