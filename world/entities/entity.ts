import type { PotionKind } from './potion';
import { GAME_CONFIG } from '../config';

export type EntityKind = 'CRATE' | 'COIN' | PotionKind;

export interface Crate {
  readonly kind: 'CRATE';
  /** Minimum player strength needed to push this crate */
  readonly strength: number;
}

export interface Coin {
  readonly kind: 'COIN';
}

export interface Potion {
  readonly kind: PotionKind;
}

export type Collectible = Coin | Potion;

export type Entity = Crate | Collectible;

/** Strength is floored and clamped to 1..MAX_CRATE_STRENGTH, the range one grid digit holds */
export function createCrate(strength: number): Crate {
  const clamped = Math.min(GAME_CONFIG.MAX_CRATE_STRENGTH, Math.max(1, Math.floor(strength)));
  return { kind: 'CRATE', strength: clamped };
}

export function createCoin(): Coin {
  return { kind: 'COIN' };
}

export function createPotion(kind: PotionKind): Potion {
  return { kind };
}

export function isCrate(entity: Entity): entity is Crate {
  return entity.kind === 'CRATE';
}

export function isCollectible(entity: Entity): entity is Collectible {
  return entity.kind !== 'CRATE';
}

/** Crate strength; other kinds carry none */
export function getEntityStrength(entity: Entity): number | undefined {
  return isCrate(entity) ? entity.strength : undefined;
}
