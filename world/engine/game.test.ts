import { describe, it, expect } from 'vitest';
import type { GameAction } from '../actions/types';
import { Game } from './game';
import { LevelFormatError } from '../codec/errors';

const LEVEL = ['1 6', 'WWWWWW', 'WP$1GW', 'W    W', 'WWWWWW'].join('\n');

describe('Game', () => {
  it('exposes the constructed level through its accessors', () => {
    const game = Game.fromLevel(LEVEL);
    expect(game.getDimensions()).toEqual({ rows: 4, cols: 6 });
    expect(game.getTile({ row: 1, col: 4 })).toBe('GOAL');
    expect(game.getPlayerPosition()).toEqual({ row: 1, col: 1 });
    expect(game.getPlayerStrength()).toBe(1);
    expect(game.getPlayerMovesRemaining()).toBe(6);
    expect(game.getPlayerMoney()).toBe(0);
    expect(game.getEntityAt({ row: 1, col: 3 })).toEqual({ kind: 'CRATE', strength: 1 });
    expect(game.getStatus()).toBe('PLAYING');
  });

  it('throws on a malformed level', () => {
    expect(() => Game.fromLevel('1 6\nWWW\nW')).toThrow(LevelFormatError);
  });

  it('wins by pushing the crate onto the goal', () => {
    const game = Game.fromLevel(LEVEL);
    game.attemptMove('RIGHT');
    const result = game.attemptMove('RIGHT');
    expect(result.ok && result.value.map(e => e.type)).toEqual(['CRATE_PUSHED', 'PLAYER_MOVED']);
    expect(game.hasWon()).toBe(true);
    expect(game.hasLost()).toBe(false);
    expect(game.getSnapshot().status).toBe('WON');
  });

  it('buys a potion with collected money, then refuses once broke', () => {
    const game = Game.fromLevel(LEVEL);
    game.attemptMove('RIGHT');
    expect(game.getPlayerMoney()).toBe(5);

    const bought = game.attemptPurchase('STRENGTH_POTION');
    expect(bought).toEqual({
      ok: true,
      value: [
        { type: 'ITEM_PURCHASED', itemId: 'STRENGTH_POTION', price: 5, strength: 3, movesRemaining: 5, money: 0 },
      ],
    });

    expect(game.attemptPurchase('STRENGTH_POTION')).toEqual({ ok: true, value: [] });
    expect(game.getPlayerStrength()).toBe(3);
    expect(game.getPlayerMoney()).toBe(0);
  });

  it('uses configured shop prices', () => {
    const game = Game.fromLevel(LEVEL, { prices: { STRENGTH_POTION: 2 } });
    expect(game.getShopItems().map(item => item.price)).toEqual([2, 5, 10]);
  });

  it('returns an error for malformed actions', () => {
    const game = Game.fromLevel(LEVEL);
    const action: GameAction = JSON.parse('{"type":"MOVE","direction":"SIDEWAYS"}');
    const result = game.submitAction(action);
    expect(result.ok).toBe(false);
    expect(game.getPlayerMovesRemaining()).toBe(6);
  });

  it('hands out copies of the entity registry', () => {
    const game = Game.fromLevel(LEVEL);
    const before = game.getEntities();
    game.attemptMove('RIGHT');
    expect(before.size).toBe(2);
    expect(game.getEntities().size).toBe(1);
  });

  it('snapshots entities in row-major order', () => {
    const game = Game.fromLevel(LEVEL);
    expect(game.getSnapshot().entities).toEqual([
      { position: { row: 1, col: 2 }, entity: { kind: 'COIN' } },
      { position: { row: 1, col: 3 }, entity: { kind: 'CRATE', strength: 1 } },
    ]);
  });

  describe('reset', () => {
    it('restores the constructed state', () => {
      const game = Game.fromLevel(LEVEL);
      const initial = game.serialize();
      game.attemptMove('RIGHT');
      game.attemptMove('RIGHT');
      expect(game.reset()).toEqual([{ type: 'GAME_RESET' }]);
      expect(game.serialize()).toBe(initial);
      expect(game.getStatus()).toBe('PLAYING');
    });

    it('goes back to the level, not to the last loaded save', () => {
      const game = Game.fromLevel(LEVEL);
      const initial = game.serialize();
      game.loadSave('9 1 40\nWWWWWW\nW  P W\nW    W\nWWWWWW\n');
      game.reset();
      expect(game.serialize()).toBe(initial);
    });
  });

  describe('loadSave', () => {
    it('replaces the live state with the decoded save', () => {
      const game = Game.fromLevel(LEVEL);
      const save = '4 2 15\nWWWWWW\nW  P1W\nW    W\nWWWWWW\ngoals: 1,4\n';
      expect(game.loadSave(save)).toEqual({ ok: true, value: [{ type: 'STATE_RESTORED' }] });
      expect(game.getPlayer()).toEqual({ position: { row: 1, col: 3 }, strength: 4, movesRemaining: 2, money: 15 });
      expect(game.hasWon()).toBe(true);
      expect(game.serialize()).toBe(save);
    });

    it('leaves the game untouched when the save is corrupt', () => {
      const game = Game.fromLevel(LEVEL);
      game.attemptMove('DOWN');
      const before = game.serialize();

      const result = game.loadSave('4 2 15\nWWWWWW\nW  P1W\nW  \n');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('CORRUPT_SAVE');
        expect(result.error.message).toBe('Line 4: Row has width 3, expected 6');
      }
      expect(game.serialize()).toBe(before);
    });

    it('plays on identically after a save round-trip', () => {
      const played = Game.fromLevel(LEVEL);
      played.attemptMove('RIGHT');
      const restored = Game.fromLevel(LEVEL);
      restored.loadSave(played.serialize());

      played.attemptMove('RIGHT');
      restored.attemptMove('RIGHT');
      expect(restored.serialize()).toBe(played.serialize());
      expect(restored.hasWon()).toBe(played.hasWon());
    });
  });
});
