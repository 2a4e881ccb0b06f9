export enum ShopItemId {
  STREAK_FREEZE = 'streak_freeze',
  XP_BOOST_2X = 'xp_boost_2x',
  HINT_REVEAL = 'hint_reveal',
  TIME_WARP = 'time_warp',
  STREAK_REPAIR = 'streak_repair',
  AVATAR_BORDER = 'avatar_gold',
  PREMIUM_THEME = 'theme_dark_premium',
}

export type PowerUpId =
  | ShopItemId.STREAK_FREEZE
  | ShopItemId.XP_BOOST_2X
  | ShopItemId.HINT_REVEAL
  | ShopItemId.TIME_WARP;

export const POWER_UP_IDS: readonly PowerUpId[] = [
  ShopItemId.STREAK_FREEZE,
  ShopItemId.XP_BOOST_2X,
  ShopItemId.HINT_REVEAL,
  ShopItemId.TIME_WARP,
];

export enum ShopCategory {
  POWER_UP = 'power_up',
  STREAK = 'streak',
  CUSTOMIZATION = 'customization',
}

/** Consumable counters as the progress endpoint names them. */
export enum ProgressCounter {
  STREAK_FREEZES = 'streak_freezes',
  XP_BOOST_2X = 'xp_boost_2x',
  XP_BOOST_5X = 'xp_boost_5x',
  TIME_WARP = 'time_warp',
  COIN_DOUBLER = 'coin_doubler',
  PERFECT_PROTECTION = 'perfect_protection',
}

export enum LeaderboardBoard {
  GLOBAL = 'global',
  FRIENDS = 'friends',
  LOCAL = 'local',
}
