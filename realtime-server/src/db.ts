import { createClient } from '@supabase/supabase-js';
import type { SaveStore } from './saves';

const SAVE_TABLE = 'save_games';

export function createSupabaseClient(url: string, key: string) {
  return createClient(url, key, {
    db: {
      schema: 'public'
    },
    auth: {
      persistSession: false,
      autoRefreshToken: false
    }
  });
}

export interface QueryResult<T> {
  data: T | null;
  error: { message: string } | null;
}

// Retry wrapper for Supabase queries
export async function withRetry<T>(
  operation: () => PromiseLike<QueryResult<T>>,
  maxRetries: number = 3,
  delayMs: number = 1000
): Promise<QueryResult<T>> {
  let lastError: QueryResult<T>['error'] = null;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    const result = await operation();

    if (!result.error) {
      return result;
    }

    lastError = result.error;
    console.warn(`[DB] Query attempt ${attempt}/${maxRetries} failed:`, result.error.message);

    if (attempt < maxRetries) {
      await new Promise(resolve => setTimeout(resolve, delayMs * attempt));
    }
  }

  return { data: null, error: lastError };
}

function readPayload(row: unknown): string | null {
  if (typeof row !== 'object' || row === null || !('payload' in row)) {
    return null;
  }
  return typeof row.payload === 'string' ? row.payload : null;
}

/** Save slots in the save_games table, unique on (user_id, slot) */
export class SupabaseSaveStore implements SaveStore {
  private readonly client: ReturnType<typeof createSupabaseClient>;

  constructor(url: string, key: string) {
    this.client = createSupabaseClient(url, key);
  }

  async save(userId: string, slot: string, payload: string): Promise<void> {
    const { error } = await withRetry<unknown>(() =>
      this.client
        .from(SAVE_TABLE)
        .upsert(
          { user_id: userId, slot, payload, updated_at: new Date().toISOString() },
          { onConflict: 'user_id,slot' }
        )
    );

    if (error) {
      console.error('[DB] save error:', error.message);
      throw new Error(`Failed to save slot ${slot}: ${error.message}`);
    }
  }

  async load(userId: string, slot: string): Promise<string | null> {
    const { data, error } = await withRetry<unknown>(() =>
      this.client
        .from(SAVE_TABLE)
        .select('payload')
        .eq('user_id', userId)
        .eq('slot', slot)
        .maybeSingle()
    );

    if (error) {
      console.error('[DB] load error:', error.message);
      throw new Error(`Failed to load slot ${slot}: ${error.message}`);
    }

    return readPayload(data);
  }
}
