import { isDirection } from '../../world';
import type { ClientMessage } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

interface OptionalString {
  valid: boolean;
  value?: string;
}

function readOptionalString(value: unknown): OptionalString {
  if (value === undefined) return { valid: true };
  if (typeof value === 'string') return { valid: true, value };
  return { valid: false };
}

/**
 * Decode a raw frame into a client message.
 * Returns null for invalid JSON and for any shape the server does not know.
 */
export function parseClientMessage(raw: string): ClientMessage | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(data)) return null;

  switch (data.type) {
    case 'JOIN': {
      const levelId = readOptionalString(data.levelId);
      const userId = readOptionalString(data.userId);
      if (!levelId.valid || !userId.valid) return null;
      return { type: 'JOIN', levelId: levelId.value, userId: userId.value };
    }
    case 'MOVE': {
      const direction = data.direction;
      if (!isDirection(direction)) return null;
      return { type: 'MOVE', direction };
    }
    case 'PURCHASE': {
      const itemId = data.itemId;
      if (typeof itemId !== 'string') return null;
      return { type: 'PURCHASE', itemId };
    }
    case 'SAVE':
    case 'LOAD': {
      const slot = data.slot;
      if (typeof slot !== 'string') return null;
      return data.type === 'SAVE' ? { type: 'SAVE', slot } : { type: 'LOAD', slot };
    }
    case 'RESET':
      return { type: 'RESET' };
    case 'LIST_LEVELS':
      return { type: 'LIST_LEVELS' };
    default:
      return null;
  }
}
