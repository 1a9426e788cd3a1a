/**
 * Error Handling Utilities
 *
 * - Generic error utilities (getErrorMessage, normalizeError)
 * - ServiceError base class: code + category + details, logged on construction
 * - GraphQL mapping (toGraphQLError) for whatever transport wraps the services
 * - Error code registry (registerServiceErrorCodes, getAllErrorCodes)
 */

import { GraphQLError } from 'graphql';
import { logger, getCorrelationId } from './logger.js';

// ═══════════════════════════════════════════════════════════════════
// Generic Error Utilities
// ═══════════════════════════════════════════════════════════════════

/**
 * Extract error message from any error type
 *
 * @example
 * ```typescript
 * try {
 *   await wallet.issueReward(rewardId);
 * } catch (error) {
 *   logger.error('Issue failed', { error: getErrorMessage(error) });
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

export function normalizeError(error: unknown): { message: string; stack?: string; code?: string } {
  if (error instanceof ServiceError) {
    return { message: error.message, stack: error.stack, code: error.code };
  }
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  return { message: getErrorMessage(error) };
}

// ═══════════════════════════════════════════════════════════════════
// Service Errors
// ═══════════════════════════════════════════════════════════════════

export type ErrorCategory =
  | 'not_found'
  | 'configuration'
  | 'insufficient_balance'
  | 'validation'
  | 'state_transition'
  | 'not_implemented'
  | 'concurrency'
  | 'internal';

/** HTTP status hint per category, for the transport layer that wraps the services. */
const ERROR_HTTP_STATUS: Record<ErrorCategory, number> = {
  not_found: 404,
  configuration: 500,
  insufficient_balance: 409,
  validation: 422,
  state_transition: 409,
  not_implemented: 501,
  concurrency: 409,
  internal: 500,
};

// Routine outcomes are logged at warn, the rest at error.
const EXPECTED_CATEGORIES: ReadonlySet<ErrorCategory> = new Set(['not_found', 'validation', 'insufficient_balance', 'concurrency']);

export interface ServiceErrorOptions {
  category?: ErrorCategory;
  details?: Record<string, unknown>;
  retryable?: boolean;
  cause?: unknown;
}

/**
 * Base class for every error a service raises on purpose.
 *
 * `code` is the service-prefixed identifier (e.g. "MSLoyaltyRewardNotFound"),
 * `message` is human readable.
 *
 * @example
 * ```typescript
 * throw new ServiceError('MSLoyaltyRewardNotFound', `Reward ${id} not found`, {
 *   category: 'not_found',
 *   details: { rewardId: id },
 * });
 * ```
 */
export class ServiceError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly details: Record<string, unknown>;
  readonly retryable: boolean;

  constructor(code: string, message: string, options: ServiceErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = formatToCapitalCamelCase(code);
    this.category = options.category ?? 'internal';
    this.details = options.details ?? {};
    this.retryable = options.retryable ?? false;

    const log = EXPECTED_CATEGORIES.has(this.category) ? logger.warn : logger.error;
    log('Service error', {
      code: this.code,
      category: this.category,
      message,
      details: this.details,
      correlationId: getCorrelationId(),
    });
  }

  get httpStatus(): number {
    return ERROR_HTTP_STATUS[this.category];
  }
}

export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

/**
 * Format string to CapitalCamelCase
 * - "reward not found" -> "RewardNotFound"
 * - "MSLoyaltyRewardNotFound" -> unchanged
 * - "reward_not_found" -> "RewardNotFound"
 */
function formatToCapitalCamelCase(str: string): string {
  if (!str) return 'RuntimeError';
  if (/^[A-Z]/.test(str)) {
    return str;
  }
  return str
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim()
    .split(' ')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');
}

/**
 * Build a service-prefixed error code.
 *
 * @example
 * ```typescript
 * serviceErrorCode('loyalty', 'reward not found'); // "MSLoyaltyRewardNotFound"
 * ```
 */
export function serviceErrorCode(service: string, errorType: string): string {
  const prefix = `MS${service.charAt(0).toUpperCase() + service.slice(1)}`;
  return `${prefix}${formatToCapitalCamelCase(errorType)}`;
}

export function createServiceError(
  service: string,
  errorType: string,
  message: string,
  options?: ServiceErrorOptions,
): ServiceError {
  return new ServiceError(serviceErrorCode(service, errorType), message, options);
}

// ═══════════════════════════════════════════════════════════════════
// GraphQL Mapping
// ═══════════════════════════════════════════════════════════════════

/**
 * Map any error to a `graphql` GraphQLError.
 * Service errors keep their code/category; anything else becomes an internal error.
 *
 * @example
 * ```typescript
 * try {
 *   return await wallet.redeemPoints(playerId, ruleId);
 * } catch (error) {
 *   throw toGraphQLError(error, { userId: playerId });
 * }
 * ```
 */
export function toGraphQLError(
  error: unknown,
  context?: { correlationId?: string; userId?: string },
): GraphQLError {
  if (error instanceof GraphQLError) {
    return error;
  }

  const correlationId = context?.correlationId ?? getCorrelationId();

  if (error instanceof ServiceError) {
    return new GraphQLError(error.message, {
      originalError: error,
      extensions: {
        ...error.details,
        code: error.code,
        category: error.category,
        httpStatus: error.httpStatus,
        ...(correlationId && { correlationId }),
        ...(context?.userId && { userId: context.userId }),
      },
    });
  }

  const message = getErrorMessage(error);
  logger.error('Unhandled error', { error: message, correlationId });
  return new GraphQLError(message, {
    ...(error instanceof Error && { originalError: error }),
    extensions: {
      code: 'InternalServerError',
      category: 'internal',
      httpStatus: ERROR_HTTP_STATUS.internal,
      ...(correlationId && { correlationId }),
      ...(context?.userId && { userId: context.userId }),
    },
  });
}

// ═══════════════════════════════════════════════════════════════════
// Error Code Registry
// ═══════════════════════════════════════════════════════════════════

/**
 * Service-agnostic registry of error codes.
 * Each service registers its codes during initialization; used for
 * error discovery and i18n key generation.
 */
const errorCodeRegistry = new Set<string>();

export function registerServiceErrorCodes(codes: readonly string[]): void {
  codes.forEach(code => errorCodeRegistry.add(code));
}

export function getAllErrorCodes(): string[] {
  return Array.from(errorCodeRegistry).sort();
}

/**
 * Extract service name from error code prefix (e.g., "MSLoyaltyRewardNotFound" -> "Loyalty")
 */
export function extractServiceFromCode(code: string): string | null {
  const match = code.match(/^MS([A-Z][a-z]+)/);
  return match ? match[1] : null;
}
