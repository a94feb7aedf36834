/**
 * Config loader with fallback to defaults
 *
 * Resolution order for the file: explicit argument, COP_CONFIG_PATH, then
 * ./cop.config.json in the working directory. A missing file means defaults;
 * an unreadable or invalid one is logged and also falls back to defaults.
 */

import fs from 'node:fs';
import path from 'node:path';
import { createModuleLogger } from '../utils/logger';
import {
  getDefaultConfig,
  parseConfig,
  validateConfig,
  type ConfigValidationResult,
  type CoordinatorConfig,
} from './types';

const log = createModuleLogger('config');

export const CONFIG_FILE_NAME = 'cop.config.json';

export function getConfigPath(): string {
  return process.env.COP_CONFIG_PATH ?? path.join(process.cwd(), CONFIG_FILE_NAME);
}

export function configExists(configPath?: string): boolean {
  return fs.existsSync(configPath ?? getConfigPath());
}

/**
 * Load configuration from file with fallback to defaults
 */
export function loadConfig(configPath?: string): CoordinatorConfig {
  const filePath = configPath ?? getConfigPath();

  if (!fs.existsSync(filePath)) {
    return getDefaultConfig();
  }

  try {
    const content = fs.readFileSync(filePath, 'utf-8');
    const config = parseConfig(content);
    const validation = validateConfig(config);

    // Warn about validation errors but still use config
    if (!validation.valid) {
      log.error({ path: filePath, errors: validation.errors }, 'Config validation failed');
    }

    return config;
  } catch (error) {
    log.error(
      { path: filePath, error: error instanceof Error ? error.message : String(error) },
      'Failed to load config, using defaults'
    );
    return getDefaultConfig();
  }
}

/**
 * Same as loadConfig but also returns the validation result.
 */
export function loadConfigWithValidation(configPath?: string): {
  config: CoordinatorConfig;
  validation: ConfigValidationResult;
} {
  const config = loadConfig(configPath);
  const validation = validateConfig(config);

  return { config, validation };
}
