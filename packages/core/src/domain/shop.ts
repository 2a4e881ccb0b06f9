import { ShopCategory, ShopItemId } from './enums';
import type { PowerUpId } from './enums';

export interface PowerUpCatalogEntry {
  displayName: string;
  cost: number;
  maxStack: number;
}

export type PowerUpCatalog = Record<PowerUpId, PowerUpCatalogEntry>;

export interface PowerUpInventory {
  coins: number;
  catalog: PowerUpCatalog;
  owned: Record<PowerUpId, number>;
}

export interface PurchaseResult {
  message: string;
  coinsRemaining: number;
  newQuantity: number;
}

/** Outcome of activating or spending a power-up the learner already owns. */
export interface PowerUpActivation {
  message: string;
  remaining: number;
  expiresAt?: Date;
}

export interface ShopItem {
  id: ShopItemId;
  name: string;
  description: string;
  cost: number;
  category: ShopCategory;
}

export const POWER_UP_CATALOG: PowerUpCatalog = {
  [ShopItemId.STREAK_FREEZE]: { displayName: 'Streak Freeze', cost: 100, maxStack: 5 },
  [ShopItemId.XP_BOOST_2X]: { displayName: '2x XP Boost', cost: 150, maxStack: 10 },
  [ShopItemId.HINT_REVEAL]: { displayName: 'Hint Reveal', cost: 50, maxStack: 99 },
  [ShopItemId.TIME_WARP]: { displayName: 'Time Warp', cost: 100, maxStack: 99 },
};

export const SHOP_ITEMS: readonly ShopItem[] = [
  {
    id: ShopItemId.XP_BOOST_2X,
    name: '2x XP Boost',
    description: 'Double XP for 30 minutes',
    cost: 150,
    category: ShopCategory.POWER_UP,
  },
  {
    id: ShopItemId.HINT_REVEAL,
    name: 'Hint Reveal',
    description: 'Get a hint for any tricky exercise',
    cost: 50,
    category: ShopCategory.POWER_UP,
  },
  {
    id: ShopItemId.TIME_WARP,
    name: 'Time Warp',
    description: 'Skip a difficult question and mark it correct',
    cost: 100,
    category: ShopCategory.POWER_UP,
  },
  {
    id: ShopItemId.STREAK_FREEZE,
    name: 'Streak Freeze',
    description: 'Protect your streak if you miss a day',
    cost: 100,
    category: ShopCategory.STREAK,
  },
  {
    id: ShopItemId.STREAK_REPAIR,
    name: 'Streak Repair',
    description: 'Restore a broken streak within 48 hours',
    cost: 200,
    category: ShopCategory.STREAK,
  },
  {
    id: ShopItemId.AVATAR_BORDER,
    name: 'Gold Avatar Border',
    description: 'A gold frame around your profile picture',
    cost: 500,
    category: ShopCategory.CUSTOMIZATION,
  },
  {
    id: ShopItemId.PREMIUM_THEME,
    name: 'Premium Dark Theme',
    description: 'Unlock exclusive dark theme colors',
    cost: 300,
    category: ShopCategory.CUSTOMIZATION,
  },
];
