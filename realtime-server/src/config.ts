import 'dotenv/config';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const REPO_ROOT = path.resolve(__dirname, '../..');

export const PLAY_PORT = parseInt(process.env.PLAY_PORT || '3001', 10);

export const LEVELS_DIR = process.env.LEVELS_DIR || path.join(REPO_ROOT, 'levels');
export const SAVES_DIR = process.env.SAVES_DIR || path.join(REPO_ROOT, 'saves');
export const DEFAULT_LEVEL = process.env.DEFAULT_LEVEL || 'coin_maze';

export const SUPABASE_URL = process.env.SUPABASE_URL || '';
export const SUPABASE_SERVICE_KEY = process.env.SUPABASE_SERVICE_KEY || '';

// Level ids and save slots end up in file paths
export const LEVEL_ID_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;
export const SAVE_SLOT_PATTERN = /^[A-Za-z0-9_-]{1,32}$/;
export const USER_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;
export const DEFAULT_USER_ID = 'anonymous';
