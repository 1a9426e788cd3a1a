/**
 * Loyalty Service Error Codes
 *
 * Complete list of all error codes used by loyalty-service.
 * Used for error discovery and i18n key generation.
 *
 * Constants are the single source of truth - array is derived from them
 */
export const LOYALTY_ERRORS = {
  PlayerNotFound: 'MSLoyaltyPlayerNotFound',
  RuleNotFound: 'MSLoyaltyRuleNotFound',
  RewardNotFound: 'MSLoyaltyRewardNotFound',
  RedemptionRuleNotFound: 'MSLoyaltyRedemptionRuleNotFound',
  SignalNotFound: 'MSLoyaltySignalNotFound',
  UnknownRewardType: 'MSLoyaltyUnknownRewardType',
  RedemptionRuleInactive: 'MSLoyaltyRedemptionRuleInactive',
  InsufficientBalance: 'MSLoyaltyInsufficientBalance',
  InvalidAmount: 'MSLoyaltyInvalidAmount',
  InvalidRule: 'MSLoyaltyInvalidRule',
  RedemptionLimitReached: 'MSLoyaltyRedemptionLimitReached',
  TierRequirementNotMet: 'MSLoyaltyTierRequirementNotMet',
  InvalidRewardStatus: 'MSLoyaltyInvalidRewardStatus',
  CurrencyNotSupported: 'MSLoyaltyCurrencyNotSupported',
  ConcurrentModification: 'MSLoyaltyConcurrentModification',
} as const;

/**
 * Array derived from constants - no duplication, automatically synced
 */
export const LOYALTY_ERROR_CODES: readonly string[] = Object.values(LOYALTY_ERRORS);

export type LoyaltyErrorCode = typeof LOYALTY_ERRORS[keyof typeof LOYALTY_ERRORS];
