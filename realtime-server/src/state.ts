import type { Client } from './types';

// Map connectionId -> Client
export const clients = new Map<string, Client>();

// Connection ID counter
let nextConnectionId = 1;
export function generateConnectionId(): string {
  return `conn-${nextConnectionId++}`;
}

let nextSessionId = 1;
export function generateSessionId(): string {
  return `session-${nextSessionId++}`;
}
