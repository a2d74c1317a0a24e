import { WebSocketServer } from 'ws';
import { DEFAULT_LEVEL, LEVELS_DIR, PLAY_PORT } from './config';
import { dispatchMessage, handleDisconnect } from './handlers';
import { send } from './network';
import { createSaveStore } from './saves';
import { clients, generateConnectionId } from './state';
import type { Client, ServerContext } from './types';

const context: ServerContext = {
  levelsDir: LEVELS_DIR,
  defaultLevel: DEFAULT_LEVEL,
  saves: createSaveStore(),
};

// ============================================================================
// PLAY SERVER - One independent game session per connection
// ============================================================================

const playWss = new WebSocketServer({ port: PLAY_PORT });
console.log(`Play server running on ws://localhost:${PLAY_PORT}`);
console.log(`Serving levels from ${LEVELS_DIR}`);

playWss.on('connection', (ws) => {
  const client: Client = { ws, connectionId: generateConnectionId(), session: null };
  clients.set(client.connectionId, client);

  // Frames are handled strictly in arrival order
  let pending = Promise.resolve();

  ws.on('message', (data) => {
    const raw = data.toString();
    pending = pending
      .then(() => dispatchMessage(context, client, raw))
      .catch((e) => {
        console.error(`[Session] Error handling message from ${client.connectionId}:`, e);
        send(ws, { type: 'ERROR', error: 'Internal server error' });
      });
  });

  ws.on('close', () => {
    handleDisconnect(client);
    clients.delete(client.connectionId);
  });

  ws.on('error', (e) => {
    console.error(`[Session] Socket error on ${client.connectionId}:`, e);
  });
});

// ============================================================================
// GRACEFUL SHUTDOWN
// ============================================================================

function shutdown() {
  console.log('Shutting down play server...');

  playWss.close(() => {
    console.log('Play server closed');
  });

  // Force exit if it takes too long
  setTimeout(() => {
    console.error('Forcing shutdown...');
    process.exit(1);
  }, 1000).unref();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
