/**
 * Loyalty error taxonomy
 *
 * Each class fixes the category (and so the HTTP hint) of a ServiceError.
 * Profit-safety and cap outcomes are results, not errors.
 */

import { ServiceError } from 'core-service';
import { LOYALTY_ERRORS, type LoyaltyErrorCode } from './error-codes.js';

type Details = Record<string, unknown>;

export class NotFoundError extends ServiceError {
  constructor(code: LoyaltyErrorCode, message: string, details?: Details) {
    super(code, message, { category: 'not_found', details });
  }
}

export class ConfigurationError extends ServiceError {
  constructor(code: LoyaltyErrorCode, message: string, details?: Details) {
    super(code, message, { category: 'configuration', details });
  }
}

export class RuleInactiveError extends ConfigurationError {
  constructor(redemptionRuleId: string) {
    super(LOYALTY_ERRORS.RedemptionRuleInactive, `Redemption rule ${redemptionRuleId} is not active`, {
      redemptionRuleId,
    });
  }
}

export class InsufficientBalanceError extends ServiceError {
  constructor(
    readonly playerId: string,
    readonly currency: string,
    readonly available: number,
    readonly requested: number,
  ) {
    super(
      LOYALTY_ERRORS.InsufficientBalance,
      `Insufficient ${currency} balance: available ${available}, requested ${requested}`,
      { category: 'insufficient_balance', details: { playerId, currency, available, requested } },
    );
  }
}

export class ValidationFailureError extends ServiceError {
  constructor(code: LoyaltyErrorCode, message: string, details?: Details) {
    super(code, message, { category: 'validation', details });
  }
}

export class TierRequirementNotMetError extends ValidationFailureError {
  constructor(playerTier: string, requiredTier: string) {
    super(LOYALTY_ERRORS.TierRequirementNotMet, `Tier ${requiredTier} required, player is ${playerTier}`, {
      playerTier,
      requiredTier,
    });
  }
}

/** Illegal reward status change, e.g. issuing a reward twice */
export class StateTransitionError extends ServiceError {
  constructor(rewardId: string, from: string, to: string) {
    super(LOYALTY_ERRORS.InvalidRewardStatus, `Reward ${rewardId} cannot move from ${from} to ${to}`, {
      category: 'state_transition',
      details: { rewardId, from, to },
    });
  }
}

export class NotImplementedError extends ServiceError {
  constructor(code: LoyaltyErrorCode, message: string, details?: Details) {
    super(code, message, { category: 'not_implemented', details });
  }
}

/** A concurrent writer bumped the version first; the unit of work can be retried */
export class ConcurrentModificationError extends ServiceError {
  constructor(entity: string, id: string) {
    super(LOYALTY_ERRORS.ConcurrentModification, `${entity} ${id} was modified concurrently`, {
      category: 'concurrency',
      details: { entity, id },
      retryable: true,
    });
  }
}

export function playerNotFound(playerId: string): NotFoundError {
  return new NotFoundError(LOYALTY_ERRORS.PlayerNotFound, `Player ${playerId} not found`, { playerId });
}
