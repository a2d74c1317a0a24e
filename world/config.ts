// ============================================================================
// GAME CONFIG - Fixed rule constants for a session
// ============================================================================

export const GAME_CONFIG = {
  /** Money added when the player walks over a coin */
  COIN_VALUE: 5,
  /** Strength gained from a strength (or fancy) potion */
  STRENGTH_INCREMENT: 2,
  /** Moves gained from a move (or fancy) potion */
  MOVE_INCREMENT: 5,
  /** Money on construction, and on loading a save that does not carry it */
  STARTING_MONEY: 0,
  /** Crate strengths are written as a single digit */
  MAX_CRATE_STRENGTH: 9,
  /** Default shop prices */
  PRICES: {
    STRENGTH_POTION: 5,
    MOVE_POTION: 5,
    FANCY_POTION: 10,
  },
} as const;
