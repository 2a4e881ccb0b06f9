import { fromScriptPreferences, toScriptPreferences } from '@scholia/core';
import type { ScriptPreferences } from '@scholia/core';
import type { ApiPipeline } from '../http/api-pipeline';
import { createChildLogger } from '../utils/logger';
import type { Logger } from '../utils/logger';

export const SCRIPT_PREFERENCES_PATH = '/api/v1/users/me/script-preferences';
export const SCRIPT_PREFERENCES_FEATURE = 'sync your script preferences';

export class ScriptPreferencesApi {
  constructor(
    private readonly pipeline: ApiPipeline,
    private readonly log: Logger = createChildLogger({ module: 'script-preferences' })
  ) {}

  async get(): Promise<ScriptPreferences> {
    return this.pipeline.request({
      method: 'GET',
      path: SCRIPT_PREFERENCES_PATH,
      feature: SCRIPT_PREFERENCES_FEATURE,
      fallbackMessage: 'Failed to load script preferences',
      reconcile: toScriptPreferences,
      logger: this.log,
    });
  }

  async update(preferences: ScriptPreferences): Promise<ScriptPreferences> {
    return this.pipeline.request({
      method: 'PUT',
      path: SCRIPT_PREFERENCES_PATH,
      body: fromScriptPreferences(preferences),
      feature: SCRIPT_PREFERENCES_FEATURE,
      fallbackMessage: 'Failed to update script preferences',
      reconcile: toScriptPreferences,
      logger: this.log,
    });
  }

  async reset(): Promise<ScriptPreferences> {
    return this.pipeline.request({
      method: 'POST',
      path: `${SCRIPT_PREFERENCES_PATH}/reset`,
      feature: SCRIPT_PREFERENCES_FEATURE,
      fallbackMessage: 'Failed to reset script preferences',
      reconcile: toScriptPreferences,
      logger: this.log,
    });
  }
}
