import { join } from 'node:path';
import {
  AdaptationConfigSchema,
  type AdaptationConfig,
  type FrozenAdaptationConfig,
} from '@domain/types/config.js';
import { PRIMER_DIRS } from '@shared/constants/paths.js';
import { JsonStore } from '@infra/persistence/json-store.js';

function deepFreeze(value: unknown): void {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const child of Object.values(value)) deepFreeze(child);
}

export function configPath(primerDir: string): string {
  return join(primerDir, PRIMER_DIRS.config);
}

/**
 * Freeze a parsed config so no request can mutate shared settings.
 */
export function freezeConfig(config: AdaptationConfig): FrozenAdaptationConfig {
  deepFreeze(config);
  return config;
}

/**
 * Load `<primerDir>/config.json`, falling back to defaults when it is absent.
 *
 * @throws JsonStoreError when the file exists but is not a valid config
 */
export function loadAdaptationConfig(primerDir: string): FrozenAdaptationConfig {
  return freezeConfig(JsonStore.readOrDefault(configPath(primerDir), AdaptationConfigSchema));
}

/**
 * Write a config file holding every default, for users to edit. Returns the
 * path written. An existing file is left alone unless `overwrite` is set.
 */
export function writeDefaultConfig(primerDir: string, overwrite = false): { path: string; written: boolean } {
  const path = configPath(primerDir);
  if (JsonStore.exists(path) && !overwrite) {
    return { path, written: false };
  }
  JsonStore.write(path, AdaptationConfigSchema.parse({}), AdaptationConfigSchema);
  return { path, written: true };
}
