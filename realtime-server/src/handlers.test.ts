import { afterAll, afterEach, beforeAll, beforeEach, describe, it, expect, vi } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { WebSocket } from 'ws';
import { dispatchMessage, handleDisconnect } from './handlers';
import type { SaveStore } from './saves';
import type { Client, ServerContext, ServerMessage } from './types';

class FakeSocket {
  readonly readyState = WebSocket.OPEN;
  readonly sent: ServerMessage[] = [];

  send(data: string) {
    this.sent.push(JSON.parse(data));
  }

  close() {}

  /** Messages sent since the last call */
  take(): ServerMessage[] {
    return this.sent.splice(0, this.sent.length);
  }
}

class MemorySaveStore implements SaveStore {
  readonly slots = new Map<string, string>();
  failing = false;

  async save(userId: string, slot: string, payload: string): Promise<void> {
    if (this.failing) throw new Error('store offline');
    this.slots.set(`${userId}/${slot}`, payload);
  }

  async load(userId: string, slot: string): Promise<string | null> {
    if (this.failing) throw new Error('store offline');
    return this.slots.get(`${userId}/${slot}`) ?? null;
  }
}

// One push wins: the crate sits between the player and the only goal
const TINY_LEVEL = '1 3\nWWWWW\nWP1GW\nWWWWW\n';
const BROKEN_LEVEL = '1 3\nWW\nW\n';

describe('play session handlers', () => {
  let levelsDir: string;
  let saves: MemorySaveStore;
  let ctx: ServerContext;
  let socket: FakeSocket;
  let client: Client;

  const dispatch = (message: object | string) =>
    dispatchMessage(ctx, client, typeof message === 'string' ? message : JSON.stringify(message));

  beforeAll(async () => {
    levelsDir = await fs.mkdtemp(path.join(os.tmpdir(), 'crate-levels-'));
    await fs.writeFile(path.join(levelsDir, 'tiny.txt'), TINY_LEVEL);
    await fs.writeFile(path.join(levelsDir, 'broken.txt'), BROKEN_LEVEL);
  });

  afterAll(async () => {
    await fs.rm(levelsDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    saves = new MemorySaveStore();
    ctx = { levelsDir, defaultLevel: 'tiny', saves };
    socket = new FakeSocket();
    client = { ws: socket, connectionId: 'conn-test', session: null };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('rejects frames that are not client messages', async () => {
    await dispatch('not json');
    await dispatch({ type: 'MOVE', direction: 'NORTH' });
    expect(socket.take()).toEqual([
      { type: 'ERROR', error: 'Invalid message format' },
      { type: 'ERROR', error: 'Invalid message format' },
    ]);
  });

  it('requires a JOIN before game messages', async () => {
    await dispatch({ type: 'MOVE', direction: 'RIGHT' });
    await dispatch({ type: 'SAVE', slot: 'one' });
    expect(socket.take()).toEqual([
      { type: 'ERROR', error: 'Join a level first' },
      { type: 'ERROR', error: 'Join a level first' },
    ]);
  });

  describe('JOIN', () => {
    it('starts the default level and sends the shop and a snapshot', async () => {
      await dispatch({ type: 'JOIN' });
      const [welcome, snapshot] = socket.take();

      expect(welcome.type).toBe('WELCOME');
      if (welcome.type === 'WELCOME') {
        expect(welcome.levelId).toBe('tiny');
        expect(welcome.sessionId).toMatch(/^session-\d+$/);
        expect(welcome.shop.map(item => [item.id, item.price])).toEqual([
          ['STRENGTH_POTION', 5],
          ['MOVE_POTION', 5],
          ['FANCY_POTION', 10],
        ]);
      }

      expect(snapshot.type).toBe('SNAPSHOT');
      if (snapshot.type === 'SNAPSHOT') {
        expect(snapshot.snapshot.player).toEqual({ position: { row: 1, col: 1 }, strength: 1, movesRemaining: 3, money: 0 });
        expect(snapshot.snapshot.status).toBe('PLAYING');
      }
      expect(client.session?.userId).toBe('anonymous');
    });

    it('reports unknown levels', async () => {
      await dispatch({ type: 'JOIN', levelId: 'missing' });
      await dispatch({ type: 'JOIN', levelId: '../tiny' });
      expect(socket.take()).toEqual([
        { type: 'ERROR', error: 'Unknown level: missing' },
        { type: 'ERROR', error: 'Unknown level: ../tiny' },
      ]);
      expect(client.session).toBeNull();
    });

    it('reports malformed levels', async () => {
      await dispatch({ type: 'JOIN', levelId: 'broken' });
      expect(socket.take()).toEqual([
        { type: 'ERROR', error: 'Level broken is malformed: Line 3: Row has width 1, expected 2' },
      ]);
    });

    it('rejects user ids that cannot name a save directory', async () => {
      await dispatch({ type: 'JOIN', userId: '../root' });
      expect(socket.take()).toEqual([{ type: 'ERROR', error: 'Invalid user id' }]);
    });
  });

  describe('play', () => {
    beforeEach(async () => {
      await dispatch({ type: 'JOIN' });
      socket.take();
    });

    it('sends events with a snapshot and announces the win once', async () => {
      await dispatch({ type: 'MOVE', direction: 'RIGHT' });
      const messages = socket.take();
      expect(messages.map(m => m.type)).toEqual(['EVENTS', 'GAME_OVER']);

      const [events, gameOver] = messages;
      if (events.type === 'EVENTS') {
        expect(events.events.map(e => e.type)).toEqual(['CRATE_PUSHED', 'PLAYER_MOVED']);
        expect(events.snapshot.status).toBe('WON');
      }
      expect(gameOver).toEqual({ type: 'GAME_OVER', status: 'WON' });

      await dispatch({ type: 'MOVE', direction: 'LEFT' });
      expect(socket.take().map(m => m.type)).toEqual(['EVENTS']);
    });

    it('answers illegal moves and unaffordable purchases with no events', async () => {
      await dispatch({ type: 'MOVE', direction: 'UP' });
      await dispatch({ type: 'PURCHASE', itemId: 'FANCY_POTION' });
      const messages = socket.take();
      expect(messages.map(m => (m.type === 'EVENTS' ? m.events : m.type))).toEqual([[], []]);
    });

    it('resets to the level', async () => {
      await dispatch({ type: 'MOVE', direction: 'RIGHT' });
      socket.take();

      await dispatch({ type: 'RESET' });
      const [reset] = socket.take();
      expect(reset.type).toBe('EVENTS');
      if (reset.type === 'EVENTS') {
        expect(reset.events).toEqual([{ type: 'GAME_RESET' }]);
        expect(reset.snapshot.status).toBe('PLAYING');
        expect(reset.snapshot.player.position).toEqual({ row: 1, col: 1 });
      }
    });

    it('lists levels', async () => {
      await dispatch({ type: 'LIST_LEVELS' });
      expect(socket.take()).toEqual([{ type: 'LEVELS', levels: ['broken', 'tiny'] }]);
    });
  });

  describe('SAVE and LOAD', () => {
    beforeEach(async () => {
      await dispatch({ type: 'JOIN' });
      socket.take();
    });

    it('saves the serialized game under the user and slot', async () => {
      await dispatch({ type: 'MOVE', direction: 'RIGHT' });
      socket.take();

      await dispatch({ type: 'SAVE', slot: 'slot1' });
      expect(socket.take()).toEqual([{ type: 'SAVED', slot: 'slot1' }]);
      expect(saves.slots.get('anonymous/slot1')).toBe('1 2 0\nWWWWW\nW P1W\nWWWWW\ngoals: 1,3\n');
    });

    it('restores a save and re-announces the win', async () => {
      await dispatch({ type: 'MOVE', direction: 'RIGHT' });
      await dispatch({ type: 'SAVE', slot: 'slot1' });
      await dispatch({ type: 'RESET' });
      socket.take();

      await dispatch({ type: 'LOAD', slot: 'slot1' });
      const messages = socket.take();
      expect(messages.map(m => m.type)).toEqual(['EVENTS', 'GAME_OVER']);
      if (messages[0].type === 'EVENTS') {
        expect(messages[0].events).toEqual([{ type: 'STATE_RESTORED' }]);
        expect(messages[0].snapshot.player.movesRemaining).toBe(2);
      }
    });

    it('reports an empty slot', async () => {
      await dispatch({ type: 'LOAD', slot: 'nope' });
      expect(socket.take()).toEqual([{ type: 'ERROR', error: 'No save in slot nope' }]);
    });

    it('reports a corrupt save and keeps playing the current game', async () => {
      saves.slots.set('anonymous/bad', '1 3\nP\nWW\n');
      await dispatch({ type: 'LOAD', slot: 'bad' });
      expect(socket.take()).toEqual([
        { type: 'ERROR', error: 'Save is corrupt: Line 3: Row has width 2, expected 1' },
      ]);
      expect(client.session?.game.getPlayerPosition()).toEqual({ row: 1, col: 1 });
    });

    it('rejects slot names outside the pattern', async () => {
      await dispatch({ type: 'SAVE', slot: 'a/b' });
      await dispatch({ type: 'LOAD', slot: '' });
      expect(socket.take()).toEqual([
        { type: 'ERROR', error: 'Invalid save slot' },
        { type: 'ERROR', error: 'Invalid save slot' },
      ]);
      expect(saves.slots.size).toBe(0);
    });

    it('reports store failures', async () => {
      saves.failing = true;
      await dispatch({ type: 'SAVE', slot: 'slot1' });
      await dispatch({ type: 'LOAD', slot: 'slot1' });
      expect(socket.take()).toEqual([
        { type: 'ERROR', error: 'Failed to save game' },
        { type: 'ERROR', error: 'Failed to load game' },
      ]);
    });

    it('keeps each user in their own slots', async () => {
      await dispatch({ type: 'JOIN', userId: 'alice' });
      await dispatch({ type: 'SAVE', slot: 'one' });
      expect([...saves.slots.keys()]).toEqual(['alice/one']);
    });
  });

  it('drops the session on disconnect', async () => {
    await dispatch({ type: 'JOIN' });
    handleDisconnect(client);
    expect(client.session).toBeNull();
  });
});
