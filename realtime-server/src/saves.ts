import { promises as fs } from 'fs';
import path from 'path';
import { SAVES_DIR, SUPABASE_SERVICE_KEY, SUPABASE_URL } from './config';
import { SupabaseSaveStore } from './db';
import { isMissingFile } from './levels';

// ============================================================================
// SAVE STORES - Named save slots per user, holding serialized games
// ============================================================================

export interface SaveStore {
  save(userId: string, slot: string, payload: string): Promise<void>;
  /** Resolves to null when the slot is empty */
  load(userId: string, slot: string): Promise<string | null>;
}

/** One text file per slot: <dir>/<userId>/<slot>.txt */
export class FileSaveStore implements SaveStore {
  constructor(private readonly dir: string) {}

  private slotPath(userId: string, slot: string): string {
    return path.join(this.dir, userId, `${slot}.txt`);
  }

  async save(userId: string, slot: string, payload: string): Promise<void> {
    await fs.mkdir(path.join(this.dir, userId), { recursive: true });
    await fs.writeFile(this.slotPath(userId, slot), payload, 'utf-8');
  }

  async load(userId: string, slot: string): Promise<string | null> {
    try {
      return await fs.readFile(this.slotPath(userId, slot), 'utf-8');
    } catch (e) {
      if (isMissingFile(e)) return null;
      throw e;
    }
  }
}

export function createSaveStore(): SaveStore {
  if (SUPABASE_URL && SUPABASE_SERVICE_KEY) {
    console.log('[Saves] Using Supabase table save_games');
    return new SupabaseSaveStore(SUPABASE_URL, SUPABASE_SERVICE_KEY);
  }
  console.warn(`[Saves] Supabase credentials not set, saving to ${SAVES_DIR}`);
  return new FileSaveStore(SAVES_DIR);
}
