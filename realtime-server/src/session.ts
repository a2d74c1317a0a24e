import type { Game, GameEvent, GameStatus, Result } from '../../world';
import type { ServerMessage } from './types';

/**
 * One player's run through a level. Each connection owns its own session;
 * sessions never share a Game.
 */
export class PlaySession {
  private lastStatus: GameStatus;

  constructor(
    readonly sessionId: string,
    readonly levelId: string,
    readonly userId: string,
    readonly game: Game
  ) {
    this.lastStatus = game.getStatus();
  }

  /**
   * Turn an engine result into the replies for the client.
   * GAME_OVER goes out once, on the transition out of PLAYING.
   */
  toMessages(result: Result<GameEvent[]>): ServerMessage[] {
    if (!result.ok) {
      return [{ type: 'ERROR', error: result.error.message }];
    }

    const messages: ServerMessage[] = [
      { type: 'EVENTS', events: result.value, snapshot: this.game.getSnapshot() },
    ];

    const status = this.game.getStatus();
    if (status !== this.lastStatus && status !== 'PLAYING') {
      console.log(`[Session] ${this.sessionId} finished ${this.levelId}: ${status}`);
      messages.push({ type: 'GAME_OVER', status });
    }
    this.lastStatus = status;
    return messages;
  }
}
