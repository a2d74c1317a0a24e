import { Game, LevelFormatError, ok, type Direction } from '../../world';
import { DEFAULT_USER_ID, SAVE_SLOT_PATTERN, USER_ID_PATTERN } from './config';
import { listLevels, readLevel } from './levels';
import { send, sendAll } from './network';
import { parseClientMessage } from './protocol';
import { PlaySession } from './session';
import { generateSessionId } from './state';
import type { Client, ClientMessage, ServerContext } from './types';

function requireSession(client: Client): PlaySession | null {
  if (!client.session) {
    send(client.ws, { type: 'ERROR', error: 'Join a level first' });
    return null;
  }
  return client.session;
}

export async function handleJoin(
  ctx: ServerContext,
  client: Client,
  msg: Extract<ClientMessage, { type: 'JOIN' }>
): Promise<void> {
  const levelId = msg.levelId ?? ctx.defaultLevel;
  const userId = msg.userId ?? DEFAULT_USER_ID;

  if (!USER_ID_PATTERN.test(userId)) {
    send(client.ws, { type: 'ERROR', error: 'Invalid user id' });
    return;
  }

  const source = await readLevel(ctx.levelsDir, levelId);
  if (source === null) {
    send(client.ws, { type: 'ERROR', error: `Unknown level: ${levelId}` });
    return;
  }

  let game: Game;
  try {
    game = Game.fromLevel(source);
  } catch (e) {
    if (e instanceof LevelFormatError) {
      console.error(`[Levels] ${levelId} is malformed:`, e.message);
      send(client.ws, { type: 'ERROR', error: `Level ${levelId} is malformed: ${e.message}` });
      return;
    }
    throw e;
  }

  // Re-joining replaces the previous session
  const session = new PlaySession(generateSessionId(), levelId, userId, game);
  client.session = session;
  console.log(`[Session] ${session.sessionId} (${client.connectionId}) joined ${levelId} as ${userId}`);

  send(client.ws, {
    type: 'WELCOME',
    sessionId: session.sessionId,
    levelId,
    shop: game.getShopItems(),
  });
  send(client.ws, { type: 'SNAPSHOT', snapshot: game.getSnapshot() });
}

export function handleMove(client: Client, direction: Direction) {
  const session = requireSession(client);
  if (!session) return;
  sendAll(client.ws, session.toMessages(session.game.attemptMove(direction)));
}

export function handlePurchase(client: Client, itemId: string) {
  const session = requireSession(client);
  if (!session) return;
  sendAll(client.ws, session.toMessages(session.game.attemptPurchase(itemId)));
}

export function handleReset(client: Client) {
  const session = requireSession(client);
  if (!session) return;
  console.log(`[Session] ${session.sessionId} reset ${session.levelId}`);
  sendAll(client.ws, session.toMessages(ok(session.game.reset())));
}

export async function handleSave(ctx: ServerContext, client: Client, slot: string): Promise<void> {
  const session = requireSession(client);
  if (!session) return;

  if (!SAVE_SLOT_PATTERN.test(slot)) {
    send(client.ws, { type: 'ERROR', error: 'Invalid save slot' });
    return;
  }

  const payload = session.game.serialize();
  try {
    await ctx.saves.save(session.userId, slot, payload);
  } catch (e) {
    console.error(`[Saves] Failed to save ${session.userId}/${slot}:`, e);
    send(client.ws, { type: 'ERROR', error: 'Failed to save game' });
    return;
  }

  console.log(`[Saves] ${session.sessionId} saved to ${session.userId}/${slot}`);
  send(client.ws, { type: 'SAVED', slot });
}

export async function handleLoad(ctx: ServerContext, client: Client, slot: string): Promise<void> {
  const session = requireSession(client);
  if (!session) return;

  if (!SAVE_SLOT_PATTERN.test(slot)) {
    send(client.ws, { type: 'ERROR', error: 'Invalid save slot' });
    return;
  }

  let payload: string | null;
  try {
    payload = await ctx.saves.load(session.userId, slot);
  } catch (e) {
    console.error(`[Saves] Failed to load ${session.userId}/${slot}:`, e);
    send(client.ws, { type: 'ERROR', error: 'Failed to load game' });
    return;
  }

  if (payload === null) {
    send(client.ws, { type: 'ERROR', error: `No save in slot ${slot}` });
    return;
  }

  const result = session.game.loadSave(payload);
  if (!result.ok) {
    console.warn(`[Saves] ${session.userId}/${slot} is corrupt:`, result.error.message);
    send(client.ws, { type: 'ERROR', error: `Save is corrupt: ${result.error.message}` });
    return;
  }

  console.log(`[Saves] ${session.sessionId} restored ${session.userId}/${slot}`);
  sendAll(client.ws, session.toMessages(result));
}

export async function handleListLevels(ctx: ServerContext, client: Client): Promise<void> {
  const levels = await listLevels(ctx.levelsDir);
  send(client.ws, { type: 'LEVELS', levels });
}

export function handleDisconnect(client: Client) {
  if (client.session) {
    console.log(`[Session] ${client.session.sessionId} (${client.connectionId}) disconnected`);
  }
  client.session = null;
}

/** Route one raw frame to its handler */
export async function dispatchMessage(ctx: ServerContext, client: Client, raw: string): Promise<void> {
  const msg = parseClientMessage(raw);
  if (!msg) {
    send(client.ws, { type: 'ERROR', error: 'Invalid message format' });
    return;
  }

  switch (msg.type) {
    case 'JOIN':
      return handleJoin(ctx, client, msg);
    case 'MOVE':
      return handleMove(client, msg.direction);
    case 'PURCHASE':
      return handlePurchase(client, msg.itemId);
    case 'RESET':
      return handleReset(client);
    case 'SAVE':
      return handleSave(ctx, client, msg.slot);
    case 'LOAD':
      return handleLoad(ctx, client, msg.slot);
    case 'LIST_LEVELS':
      return handleListLevels(ctx, client);
  }
}
