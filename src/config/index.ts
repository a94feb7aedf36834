/**
 * Config module exports
 */

export type {
  AnalysisConfig,
  ConfigValidationResult,
  CoordinatorConfig,
  CoordinatorConfigInput,
  LogLevel,
  ReasoningConfig,
} from './types';

export {
  CoordinatorConfigSchema,
  DEFAULT_AREAS,
  LOG_LEVELS,
  getDefaultConfig,
  parseConfig,
  validateConfig,
} from './types';

export { CONFIG_FILE_NAME, configExists, getConfigPath, loadConfig, loadConfigWithValidation } from './loader';
