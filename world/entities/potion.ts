import { GAME_CONFIG } from '../config';

export type PotionKind = 'STRENGTH_POTION' | 'MOVE_POTION' | 'FANCY_POTION';

export const POTION_KINDS: readonly PotionKind[] = ['STRENGTH_POTION', 'MOVE_POTION', 'FANCY_POTION'];

/** Stat deltas applied to the player when a potion is consumed */
export interface PotionEffect {
  readonly strength: number;
  readonly moves: number;
}

export const POTION_EFFECTS: Readonly<Record<PotionKind, PotionEffect>> = {
  STRENGTH_POTION: { strength: GAME_CONFIG.STRENGTH_INCREMENT, moves: 0 },
  MOVE_POTION: { strength: 0, moves: GAME_CONFIG.MOVE_INCREMENT },
  FANCY_POTION: { strength: GAME_CONFIG.STRENGTH_INCREMENT, moves: GAME_CONFIG.MOVE_INCREMENT },
};

export const POTION_NAMES: Readonly<Record<PotionKind, string>> = {
  STRENGTH_POTION: 'Strength Potion',
  MOVE_POTION: 'Move Potion',
  FANCY_POTION: 'Fancy Potion',
};

export function isPotionKind(value: unknown): value is PotionKind {
  return typeof value === 'string' && (POTION_KINDS as readonly string[]).includes(value);
}

export function describeEffect(effect: PotionEffect): string {
  const parts: string[] = [];
  if (effect.strength !== 0) {
    parts.push(`+${effect.strength} strength`);
  }
  if (effect.moves !== 0) {
    parts.push(`+${effect.moves} moves`);
  }
  return parts.length > 0 ? parts.join(', ') : 'no effect';
}
