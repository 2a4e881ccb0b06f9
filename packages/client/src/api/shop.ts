import {
  POWER_UP_CATALOG,
  ShopItemId,
  toCanonicalProgress,
  inventoryFromProgress,
  toPowerUpActivation,
  toPurchaseResult,
} from '@scholia/core';
import type {
  PowerUpActivation,
  PowerUpCatalog,
  PowerUpInventory,
  PurchaseResult,
} from '@scholia/core';
import type { ApiPipeline } from '../http/api-pipeline';
import { createChildLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';
import { PROGRESS_PATH } from './progress';

export const ShopFeature = {
  SHOP: 'use the power-up shop',
  ACTIVATE: 'activate power-ups',
  USE: 'use your power-ups',
} as const;

interface PurchaseRoute {
  path: string;
  fallbackMessage: string;
}

export const PURCHASE_ROUTES: Record<ShopItemId, PurchaseRoute> = {
  [ShopItemId.STREAK_FREEZE]: {
    path: `${PROGRESS_PATH}/streak-freeze/buy`,
    fallbackMessage: 'Failed to purchase streak freeze',
  },
  [ShopItemId.XP_BOOST_2X]: {
    path: `${PROGRESS_PATH}/power-ups/xp-boost/buy`,
    fallbackMessage: 'Failed to purchase XP Boost',
  },
  [ShopItemId.HINT_REVEAL]: {
    path: `${PROGRESS_PATH}/power-ups/hint-reveal/buy`,
    fallbackMessage: 'Failed to purchase Hint Reveal',
  },
  [ShopItemId.TIME_WARP]: {
    path: `${PROGRESS_PATH}/power-ups/time-warp/buy`,
    fallbackMessage: 'Failed to purchase Time Warp',
  },
  [ShopItemId.STREAK_REPAIR]: {
    path: `${PROGRESS_PATH}/shop/streak-repair/buy`,
    fallbackMessage: 'Failed to purchase Streak Repair',
  },
  [ShopItemId.AVATAR_BORDER]: {
    path: `${PROGRESS_PATH}/shop/avatar-border/buy`,
    fallbackMessage: 'Failed to purchase Avatar Border',
  },
  [ShopItemId.PREMIUM_THEME]: {
    path: `${PROGRESS_PATH}/shop/theme-premium/buy`,
    fallbackMessage: 'Failed to purchase Premium Theme',
  },
};

/**
 * Coin shop and power-up usage.
 *
 * The inventory is derived from the progress endpoint plus the local catalog;
 * there is no separate inventory resource on the service.
 */
export class ShopApi {
  constructor(
    private readonly pipeline: ApiPipeline,
    private readonly log: Logger = createChildLogger({ module: 'shop' }),
    private readonly catalog: PowerUpCatalog = POWER_UP_CATALOG
  ) {}

  async getInventory(): Promise<PowerUpInventory> {
    const progress = await this.pipeline.request({
      method: 'GET',
      path: PROGRESS_PATH,
      feature: ShopFeature.SHOP,
      fallbackMessage: 'Failed to load user progress',
      reconcile: toCanonicalProgress,
      logger: this.log,
    });
    return inventoryFromProgress(progress, this.catalog);
  }

  async purchase(itemId: ShopItemId): Promise<PurchaseResult> {
    const route = PURCHASE_ROUTES[itemId];
    const result = await this.pipeline.request({
      method: 'POST',
      path: route.path,
      feature: ShopFeature.SHOP,
      fallbackMessage: route.fallbackMessage,
      reconcile: toPurchaseResult,
      logger: this.log,
    });
    this.log.info({ itemId, coinsRemaining: result.coinsRemaining }, 'Shop purchase completed');
    return result;
  }

  purchaseStreakFreeze(): Promise<PurchaseResult> {
    return this.purchase(ShopItemId.STREAK_FREEZE);
  }

  purchaseXpBoost(): Promise<PurchaseResult> {
    return this.purchase(ShopItemId.XP_BOOST_2X);
  }

  purchaseHintReveal(): Promise<PurchaseResult> {
    return this.purchase(ShopItemId.HINT_REVEAL);
  }

  purchaseTimeWarp(): Promise<PurchaseResult> {
    return this.purchase(ShopItemId.TIME_WARP);
  }

  purchaseStreakRepair(): Promise<PurchaseResult> {
    return this.purchase(ShopItemId.STREAK_REPAIR);
  }

  purchaseAvatarBorder(): Promise<PurchaseResult> {
    return this.purchase(ShopItemId.AVATAR_BORDER);
  }

  purchasePremiumTheme(): Promise<PurchaseResult> {
    return this.purchase(ShopItemId.PREMIUM_THEME);
  }

  async activateXpBoost(): Promise<PowerUpActivation> {
    return this.pipeline.request({
      method: 'POST',
      path: `${PROGRESS_PATH}/power-ups/xp-boost/activate`,
      feature: ShopFeature.ACTIVATE,
      fallbackMessage: 'Failed to activate XP Boost',
      reconcile: toPowerUpActivation,
      logger: this.log,
    });
  }

  async useHint(): Promise<PowerUpActivation> {
    return this.pipeline.request({
      method: 'POST',
      path: `${PROGRESS_PATH}/power-ups/hint/use`,
      feature: ShopFeature.USE,
      fallbackMessage: 'Failed to use hint',
      reconcile: toPowerUpActivation,
      logger: this.log,
    });
  }

  async useSkip(): Promise<PowerUpActivation> {
    return this.pipeline.request({
      method: 'POST',
      path: `${PROGRESS_PATH}/power-ups/skip/use`,
      feature: ShopFeature.USE,
      fallbackMessage: 'Failed to use skip',
      reconcile: toPowerUpActivation,
      logger: this.log,
    });
  }
}
