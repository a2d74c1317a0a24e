import { WebSocket } from 'ws';
import type { ClientSocket, ServerMessage } from './types';

export function send(ws: ClientSocket, message: ServerMessage) {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

export function sendAll(ws: ClientSocket, messages: ServerMessage[]) {
  for (const message of messages) {
    send(ws, message);
  }
}
