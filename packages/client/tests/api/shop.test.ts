import { describe, it, expect } from 'vitest';
import { AuthRequiredError, ClientError, ShopItemId } from '@scholia/core';
import { createTestClient } from '../helpers/test-client';

describe('ShopApi', () => {
  describe('getInventory', () => {
    it('should derive the inventory from progress', async () => {
      const { scholia, requests } = createTestClient([
        {
          status: 200,
          body: {
            coins: 640,
            perfect_protection: 4,
            streak_freezes: 1,
            xp_boost_2x: 0,
            time_warp: 2,
          },
        },
      ]);

      const inventory = await scholia.shop.getInventory();

      expect(requests[0].url).toBe('http://scholia.test/api/v1/progress/me');
      expect(inventory.coins).toBe(640);
      expect(inventory.owned).toEqual({
        streak_freeze: 1,
        xp_boost_2x: 0,
        hint_reveal: 4,
        time_warp: 2,
      });
      expect(inventory.catalog.hint_reveal.cost).toBe(50);
    });

    it('should require sign-in', async () => {
      const { scholia, requests } = createTestClient([], null);

      await expect(scholia.shop.getInventory()).rejects.toThrow(
        new AuthRequiredError('use the power-up shop')
      );
      expect(requests).toHaveLength(0);
    });
  });

  describe('purchases', () => {
    it.each([
      ['purchaseStreakFreeze', '/api/v1/progress/me/streak-freeze/buy', { streak_freezes: 2 }],
      ['purchaseXpBoost', '/api/v1/progress/me/power-ups/xp-boost/buy', { xp_boosts: 3 }],
      [
        'purchaseHintReveal',
        '/api/v1/progress/me/power-ups/hint-reveal/buy',
        { hints_available: 6 },
      ],
      ['purchaseTimeWarp', '/api/v1/progress/me/power-ups/time-warp/buy', { skips_available: 1 }],
    ] as const)('%s should post to %s', async (method, path, quantity) => {
      const { scholia, requests } = createTestClient([
        { status: 200, body: { coins_remaining: 500, ...quantity } },
      ]);

      const result = await scholia.shop[method]();

      expect(requests[0].method).toBe('POST');
      expect(requests[0].url).toBe(`http://scholia.test${path}`);
      expect(result.coinsRemaining).toBe(500);
      expect(result.newQuantity).toBe(Object.values(quantity)[0]);
    });

    it.each([
      ['purchaseStreakRepair', '/api/v1/progress/me/shop/streak-repair/buy'],
      ['purchaseAvatarBorder', '/api/v1/progress/me/shop/avatar-border/buy'],
      ['purchasePremiumTheme', '/api/v1/progress/me/shop/theme-premium/buy'],
    ] as const)('%s should post to %s', async (method, path) => {
      const { scholia, requests } = createTestClient([
        { status: 200, body: { success: true, coins_remaining: 120 } },
      ]);

      const result = await scholia.shop[method]();

      expect(requests[0].url).toBe(`http://scholia.test${path}`);
      expect(result).toEqual({
        message: 'Purchase successful',
        coinsRemaining: 120,
        newQuantity: 0,
      });
    });

    it('should dispatch purchases by catalog id', async () => {
      const { scholia, requests } = createTestClient([
        { status: 200, body: { coins_remaining: 850, hints_available: 6, message: 'ok' } },
      ]);

      const result = await scholia.shop.purchase(ShopItemId.HINT_REVEAL);

      expect(requests[0].url).toBe(
        'http://scholia.test/api/v1/progress/me/power-ups/hint-reveal/buy'
      );
      expect(result).toEqual({ message: 'ok', coinsRemaining: 850, newQuantity: 6 });
    });

    it('should surface insufficient coins without retrying', async () => {
      const { scholia, requests } = createTestClient([
        { status: 400, body: { detail: 'Not enough coins. Need 150, have 40' } },
      ]);

      const failure = await scholia.shop.purchaseXpBoost().catch((e) => e);

      expect(failure).toBeInstanceOf(ClientError);
      expect(failure.message).toBe('Not enough coins. Need 150, have 40');
      expect(requests).toHaveLength(1);
    });

    it('should fall back to the item message', async () => {
      const { scholia } = createTestClient([{ status: 400, body: {} }]);

      await expect(scholia.shop.purchaseTimeWarp()).rejects.toThrow('Failed to purchase Time Warp');
    });

    it('should require sign-in for every purchase', async () => {
      const { scholia, requests } = createTestClient([], null);

      await expect(scholia.shop.purchaseStreakFreeze()).rejects.toThrow(
        'Sign in to use the power-up shop.'
      );
      await expect(scholia.shop.purchasePremiumTheme()).rejects.toBeInstanceOf(AuthRequiredError);
      expect(requests).toHaveLength(0);
    });
  });

  describe('power-up usage', () => {
    it('should activate an XP boost', async () => {
      const { scholia, requests } = createTestClient([
        {
          status: 200,
          body: {
            success: true,
            expires_at: '2026-04-02T19:00:00Z',
            xp_boosts_remaining: 2,
            message: '2x XP Boost activated! Expires in 30 minutes',
          },
        },
      ]);

      const activation = await scholia.shop.activateXpBoost();

      expect(requests[0].url).toBe(
        'http://scholia.test/api/v1/progress/me/power-ups/xp-boost/activate'
      );
      expect(activation).toEqual({
        message: '2x XP Boost activated! Expires in 30 minutes',
        remaining: 2,
        expiresAt: new Date('2026-04-02T19:00:00Z'),
      });
    });

    it('should use a hint', async () => {
      const { scholia, requests } = createTestClient([
        { status: 200, body: { success: true, hints_remaining: 3, message: 'Hint revealed!' } },
      ]);

      const activation = await scholia.shop.useHint();

      expect(requests[0].url).toBe('http://scholia.test/api/v1/progress/me/power-ups/hint/use');
      expect(activation.remaining).toBe(3);
    });

    it('should use a skip', async () => {
      const { scholia, requests } = createTestClient([
        { status: 200, body: { success: true, skips_remaining: 0 } },
      ]);

      const activation = await scholia.shop.useSkip();

      expect(requests[0].url).toBe('http://scholia.test/api/v1/progress/me/power-ups/skip/use');
      expect(activation).toEqual({ message: 'Power-up used', remaining: 0, expiresAt: undefined });
    });

    it('should name the usage features when signed out', async () => {
      const { scholia } = createTestClient([], null);

      await expect(scholia.shop.activateXpBoost()).rejects.toThrow(
        'Sign in to activate power-ups.'
      );
      await expect(scholia.shop.useHint()).rejects.toThrow('Sign in to use your power-ups.');
      await expect(scholia.shop.useSkip()).rejects.toThrow('Sign in to use your power-ups.');
    });

    it('should propagate usage failures to the caller', async () => {
      const { scholia } = createTestClient([
        { status: 400, body: { detail: 'No hints available' } },
      ]);

      await expect(scholia.shop.useHint()).rejects.toThrow('No hints available');
    });
  });
});
