// formwork: schema-driven data coercion and validation

export * from './core/sentinels.js';
export * from './core/errors.js';
export { Logger, LogLevel, logger, levelFromName, type LogLevelName, type LoggerConfig } from './core/logger.js';
export {
  ElementDefinitionSchema,
  ValidatorDefinitionSchema,
  ConfigSchema,
  type ElementDefinition,
  type ValidatorDefinition,
  type FormworkConfig
} from './core/schemas.js';
export * from './models/index.js';
export * from './schema/index.js';
export * from './validation/index.js';
export * from './services/index.js';
