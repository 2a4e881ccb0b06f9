import type { AxiosInstance } from 'axios';
import type { RetryConfig } from '@scholia/core';
import { AuthGate } from './auth/auth-gate';
import { getEnv } from './config/env';
import { RequestDispatcher } from './http/dispatcher';
import { ApiPipeline } from './http/api-pipeline';
import { AchievementsApi } from './api/achievements';
import { LeaderboardApi } from './api/leaderboard';
import { ProgressApi } from './api/progress';
import { ScriptPreferencesApi } from './api/script-preferences';
import { ShopApi } from './api/shop';
import { createChildLogger, logger as rootLogger } from './utils/logger';
import type { Logger } from './utils/logger';

export interface ScholiaClientOptions {
  /** Defaults to `SCHOLIA_API_URL`. */
  baseUrl?: string;
  credential?: string | null;
  /** Per attempt. Defaults to `SCHOLIA_REQUEST_TIMEOUT_SECONDS`. */
  timeoutSeconds?: number;
  /** Total attempts per request. Defaults to `SCHOLIA_MAX_ATTEMPTS`. */
  maxAttempts?: number;
  retry?: Partial<Omit<RetryConfig, 'maxAttempts'>>;
  httpClient?: AxiosInstance;
  logger?: Logger;
}

export interface ScholiaClient {
  readonly authGate: AuthGate;
  readonly progress: ProgressApi;
  readonly achievements: AchievementsApi;
  readonly shop: ShopApi;
  readonly leaderboard: LeaderboardApi;
  readonly scriptPreferences: ScriptPreferencesApi;
  /** Login or logout; every facade sees the new credential on its next call. */
  setCredential(token: string | null): void;
  hasAuth(): boolean;
}

export function createScholiaClient(options: ScholiaClientOptions = {}): ScholiaClient {
  const env = getEnv();
  const log = options.logger ?? rootLogger;

  const authGate = new AuthGate(options.credential ?? null);
  const dispatcher = new RequestDispatcher({
    baseUrl: options.baseUrl ?? env.SCHOLIA_API_URL,
    timeoutSeconds: options.timeoutSeconds ?? env.SCHOLIA_REQUEST_TIMEOUT_SECONDS,
    httpClient: options.httpClient,
  });
  const pipeline = new ApiPipeline(dispatcher, authGate, {
    retry: { ...options.retry, maxAttempts: options.maxAttempts ?? env.SCHOLIA_MAX_ATTEMPTS },
    logger: createChildLogger({ component: 'api-pipeline' }, log),
  });

  log.debug({ baseUrl: dispatcher.baseUrl }, 'Scholia client created');

  return {
    authGate,
    progress: new ProgressApi(pipeline, createChildLogger({ module: 'progress' }, log)),
    achievements: new AchievementsApi(pipeline, createChildLogger({ module: 'achievements' }, log)),
    shop: new ShopApi(pipeline, createChildLogger({ module: 'shop' }, log)),
    leaderboard: new LeaderboardApi(pipeline, createChildLogger({ module: 'leaderboard' }, log)),
    scriptPreferences: new ScriptPreferencesApi(
      pipeline,
      createChildLogger({ module: 'script-preferences' }, log)
    ),
    setCredential: (token) => authGate.setCredential(token),
    hasAuth: () => authGate.hasAuth(),
  };
}
