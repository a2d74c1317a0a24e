import { promises as fs } from 'fs';
import path from 'path';
import { LEVEL_ID_PATTERN } from './config';

const LEVEL_EXTENSION = '.txt';

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Ids of every level file in the directory, sorted */
export async function listLevels(levelsDir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(levelsDir);
  } catch (e) {
    if (isMissingFile(e)) {
      console.warn(`[Levels] Directory ${levelsDir} does not exist`);
      return [];
    }
    throw e;
  }

  return names
    .filter(name => name.endsWith(LEVEL_EXTENSION))
    .map(name => name.slice(0, -LEVEL_EXTENSION.length))
    .filter(id => LEVEL_ID_PATTERN.test(id))
    .sort();
}

/**
 * Read a level's text. Returns null for an unknown or ill-formed id;
 * ids that fail the pattern never reach the filesystem.
 */
export async function readLevel(levelsDir: string, levelId: string): Promise<string | null> {
  if (!LEVEL_ID_PATTERN.test(levelId)) {
    return null;
  }
  try {
    return await fs.readFile(path.join(levelsDir, `${levelId}${LEVEL_EXTENSION}`), 'utf-8');
  } catch (e) {
    if (isMissingFile(e)) return null;
    throw e;
  }
}
