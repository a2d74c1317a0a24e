// ─── Shop ───
// Potion catalogue and purchases. Bought potions are consumed on the spot.

import type { PlayerState } from '../entities/player';
import { applyEffect } from '../entities/player';
import {
  type PotionKind,
  type PotionEffect,
  POTION_KINDS,
  POTION_EFFECTS,
  POTION_NAMES,
  describeEffect,
  isPotionKind,
} from '../entities/potion';
import { GAME_CONFIG } from '../config';

/** Price per potion kind, fixed for a session */
export type ShopCatalogue = Readonly<Record<PotionKind, number>>;

export interface ShopItem {
  id: PotionKind;
  name: string;
  price: number;
  description: string;
  effect: PotionEffect;
}

export const DEFAULT_CATALOGUE: ShopCatalogue = GAME_CONFIG.PRICES;

/** Build a catalogue from the defaults plus per-kind price overrides */
export function createCatalogue(prices: Partial<Record<PotionKind, number>> = {}): ShopCatalogue {
  const catalogue: Record<PotionKind, number> = { ...DEFAULT_CATALOGUE };
  for (const kind of POTION_KINDS) {
    const price = prices[kind];
    if (price !== undefined) {
      catalogue[kind] = Math.max(0, Math.floor(price));
    }
  }
  return Object.freeze(catalogue);
}

export function getShopItems(catalogue: ShopCatalogue): ShopItem[] {
  return POTION_KINDS.map(id => ({
    id,
    name: POTION_NAMES[id],
    price: catalogue[id],
    description: describeEffect(POTION_EFFECTS[id]),
    effect: POTION_EFFECTS[id],
  }));
}

/** Price for an item id, or undefined for ids not in the catalogue */
export function getPrice(catalogue: ShopCatalogue, itemId: string): number | undefined {
  return isPotionKind(itemId) ? catalogue[itemId] : undefined;
}

export interface PurchaseOutcome {
  player: PlayerState;
  itemId: PotionKind;
  price: number;
}

/**
 * Debit the price and apply the potion's effect.
 * Returns undefined for unknown ids and insufficient funds; the player is untouched.
 */
export function purchase(
  player: PlayerState,
  catalogue: ShopCatalogue,
  itemId: string
): PurchaseOutcome | undefined {
  if (!isPotionKind(itemId)) {
    return undefined;
  }
  const price = catalogue[itemId];
  if (player.money < price) {
    return undefined;
  }
  const debited: PlayerState = { ...player, money: player.money - price };
  return {
    player: applyEffect(debited, POTION_EFFECTS[itemId]),
    itemId,
    price,
  };
}
