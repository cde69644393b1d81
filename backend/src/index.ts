/**
 * SEND Attribute Resolution - Backend entry point
 */

export * from './services/attributes/index.js';
export {
  PgSendDataRepository,
  type SendDataRepository,
} from './services/send/sendDataRepository.js';
export {
  ControlledTerminologyService,
  type VocabularyProvider,
} from './services/send/controlledTerminology.js';
export { getSendPool, closeSendPool, query, type QueryFn } from './lib/database/sendDatabase.js';
export { loadConfig, getConfig, type AppConfig } from './lib/config.js';
export {
  InvalidInputError,
  ConfigurationError,
  VocabularyNotFoundError,
  isAppError,
  type AppError,
} from './lib/errors.js';
export { logger, createLogger } from './lib/logger.js';
