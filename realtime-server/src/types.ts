import type { WebSocket } from 'ws';
import type { Direction, GameEvent, GameSnapshot, ShopItem } from '../../world';
import type { PlaySession } from './session';
import type { SaveStore } from './saves';

// The parts of a socket the handlers touch
export type ClientSocket = Pick<WebSocket, 'send' | 'close' | 'readyState'>;

export interface Client {
  ws: ClientSocket;
  connectionId: string;
  session: PlaySession | null;
}

export interface ServerContext {
  levelsDir: string;
  defaultLevel: string;
  saves: SaveStore;
}

export type ClientMessage =
  | { type: 'JOIN'; levelId?: string; userId?: string }
  | { type: 'MOVE'; direction: Direction }
  | { type: 'PURCHASE'; itemId: string }
  | { type: 'RESET' }
  | { type: 'SAVE'; slot: string }
  | { type: 'LOAD'; slot: string }
  | { type: 'LIST_LEVELS' };

export type ServerMessage =
  | { type: 'WELCOME'; sessionId: string; levelId: string; shop: ShopItem[] }
  | { type: 'SNAPSHOT'; snapshot: GameSnapshot }
  | { type: 'EVENTS'; events: GameEvent[]; snapshot: GameSnapshot }
  | { type: 'GAME_OVER'; status: 'WON' | 'LOST' }
  | { type: 'SAVED'; slot: string }
  | { type: 'LEVELS'; levels: string[] }
  | { type: 'ERROR'; error: string };
