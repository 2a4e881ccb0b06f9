import { describe, it, expect } from 'vitest';
import {
  VERSION,
  LeaderboardBoard,
  ShopItemId,
  POWER_UP_CATALOG,
  SHOP_ITEMS,
  ProgressUpdateSchema,
  ClientError,
  executeWithRetry,
  toCanonicalProgress,
  z,
} from '../src/index';

describe('core', () => {
  it('exports VERSION', () => {
    expect(VERSION).toBe('0.1.0');
  });

  it('exports enums', () => {
    expect(LeaderboardBoard.GLOBAL).toBe('global');
    expect(ShopItemId.HINT_REVEAL).toBe('hint_reveal');
  });

  it('prices catalog power-ups like the shop listing', () => {
    for (const item of SHOP_ITEMS) {
      if (item.id in POWER_UP_CATALOG) {
        const entry = Object.entries(POWER_UP_CATALOG).find(([id]) => id === item.id);
        expect(entry?.[1].cost).toBe(item.cost);
      }
    }
  });

  it('exports the request layer building blocks', () => {
    expect(ProgressUpdateSchema).toBeDefined();
    expect(new ClientError('Bad request', 400, '').retryable).toBe(false);
    expect(typeof executeWithRetry).toBe('function');
    expect(typeof toCanonicalProgress).toBe('function');
  });

  it('exports Zod for consumers', () => {
    expect(z).toBeDefined();
    expect(z.string).toBeDefined();
  });
});
