/**
 * Core-Service
 *
 * Shared infrastructure for the workspace's services.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * API ORGANIZATION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   - Logging: logger, createChildLogger, withCorrelationId
 *   - Errors: ServiceError, toGraphQLError, error code registry
 *   - Configuration: loadConfig (defaults + JSON file + env vars)
 *   - Validation: validateInput (arktype)
 *   - Resilience: retry, keyed locks (in-process / Redis)
 *   - Databases: MongoDB connection + withTransaction, Redis connection
 *
 * ═══════════════════════════════════════════════════════════════════════════
 */

// ═══════════════════════════════════════════════════════════════════
// Logging
// ═══════════════════════════════════════════════════════════════════

export {
  logger,
  setLogLevel,
  configureLogger,
  createChildLogger,
  subscribeToLogs,
  formatLogLine,
  getCorrelationId,
  generateCorrelationId,
  withCorrelationId,
} from './common/logger.js';
export type { Logger, LogLevel, LogFormat, LogEntry, LogSubscriber, LoggerConfig } from './common/logger.js';

// ═══════════════════════════════════════════════════════════════════
// Errors
// ═══════════════════════════════════════════════════════════════════

export {
  ServiceError,
  isServiceError,
  getErrorMessage,
  normalizeError,
  serviceErrorCode,
  createServiceError,
  toGraphQLError,
  registerServiceErrorCodes,
  getAllErrorCodes,
  extractServiceFromCode,
} from './common/errors.js';
export type { ErrorCategory, ServiceErrorOptions } from './common/errors.js';

// ═══════════════════════════════════════════════════════════════════
// Configuration & Validation
// ═══════════════════════════════════════════════════════════════════

export {
  loadConfig,
  loadConfigFromEnv,
  parseEnvValue,
  deepMerge,
  isPlainObject,
  ConfigValidationError,
} from './common/config/loader.js';
export type { ConfigLoaderOptions } from './common/config/loader.js';

export { validateInput, isValidationFailure } from './common/validation/arktype.js';
export type { ValidationFailure } from './common/validation/arktype.js';

// ═══════════════════════════════════════════════════════════════════
// Resilience
// ═══════════════════════════════════════════════════════════════════

export { retry, calculateDelay, isRetryableServiceError, RetryConfigs } from './common/resilience/retry.js';
export type { RetryConfig, RetryResult, RetryStrategy } from './common/resilience/retry.js';

export {
  InProcessKeyedLock,
  RedisKeyedLock,
  LockAcquisitionError,
} from './common/resilience/keyed-lock.js';
export type { KeyedLock, RedisLockClient, RedisKeyedLockOptions } from './common/resilience/keyed-lock.js';

// ═══════════════════════════════════════════════════════════════════
// Utilities
// ═══════════════════════════════════════════════════════════════════

export { generateId, addHours, addDays, daysBetween, sum } from './common/utils.js';

// ═══════════════════════════════════════════════════════════════════
// Databases
// ═══════════════════════════════════════════════════════════════════

export {
  connectDatabase,
  closeDatabase,
  checkDatabaseHealth,
} from './databases/mongodb/connection.js';
export type { MongoConfig } from './databases/mongodb/connection.js';

export { withTransaction, DEFAULT_TRANSACTION_OPTIONS } from './databases/mongodb/transaction.js';
export { isDuplicateKeyError } from './databases/mongodb/errors.js';
export type { TransactionOptions } from './databases/mongodb/transaction.js';

export {
  connectRedis,
  closeRedis,
  checkRedisHealth,
  createRedisLockClient,
} from './databases/redis/connection.js';
export type { RedisClient, RedisConfig } from './databases/redis/connection.js';
