/**
 * Loyalty Service Types
 *
 * Players earn loyalty points (LP) and rewards from configurable rules.
 * Every balance change is journaled as an append-only Transaction.
 */

// ═══════════════════════════════════════════════════════════════════
// Enumerations
// ═══════════════════════════════════════════════════════════════════

export const CURRENCY_TYPES = ['LP', 'RP', 'BONUS', 'TICKETS', 'CASH'] as const;
export type CurrencyType = typeof CURRENCY_TYPES[number];

/** Currencies the wallet holds a balance for (CASH is audit-only) */
export type WalletCurrency = Exclude<CurrencyType, 'CASH'>;

export const REWARD_TYPES = [
  'LOYALTY_POINTS',
  'REWARD_POINTS',
  'BONUS_BALANCE',
  'FREE_PLAY',
  'CASHBACK',
  'TICKETS',
] as const;
export type RewardType = typeof REWARD_TYPES[number];

export const REWARD_STATUSES = ['PENDING', 'ACTIVE', 'COMPLETED', 'EXPIRED', 'CANCELLED'] as const;
export type RewardStatus = typeof REWARD_STATUSES[number];

export const TRANSACTION_TYPES = [
  // Player activity (audit rows, CASH)
  'DEPOSIT',
  'WITHDRAWAL',
  'WAGER',
  'WIN',
  // Wallet movements
  'LP_EARNED',
  'LP_REDEEMED',
  'LP_EXPIRED',
  'RP_EARNED',
  'TICKETS_ISSUED',
  'BONUS_ISSUED',
  'BONUS_EXPIRED',
  'BALANCE_DEDUCTED',
  'REDEMPTION_PAYOUT',
] as const;
export type TransactionType = typeof TRANSACTION_TYPES[number];

export const ACTIVITY_TYPES = ['DEPOSIT', 'WITHDRAWAL', 'WIN'] as const satisfies readonly TransactionType[];
export type ActivityType = typeof ACTIVITY_TYPES[number];

export const TIER_LEVELS = ['BRONZE', 'SILVER', 'GOLD', 'PLATINUM', 'DIAMOND'] as const;
export type TierLevel = typeof TIER_LEVELS[number];

export const PLAYER_SEGMENTS = ['NEW', 'WINNING', 'BREAKEVEN', 'LOSING', 'VIP'] as const;
export type PlayerSegment = typeof PLAYER_SEGMENTS[number];

export const SIGNAL_TYPES = [
  'BONUS_ONLY_PLAY',
  'IMMEDIATE_WITHDRAWAL',
  'BET_MANIPULATION',
  'ABNORMAL_WIN_RATE',
  'MANUAL_REVIEW_REQUIRED',
] as const;
export type SignalType = typeof SIGNAL_TYPES[number];

export type PenaltyAction = 'BLOCKED' | 'INCREASED_WAGERING' | 'REDUCED_REWARDS' | 'NO_ACTION';

export type CapPeriod = 'daily' | 'weekly' | 'monthly';

// ═══════════════════════════════════════════════════════════════════
// Player State
// ═══════════════════════════════════════════════════════════════════

/** Flat snapshot computed per evaluation; never persisted */
export type PlayerStateValue = number | string | boolean;
export type PlayerState = Record<string, PlayerStateValue>;

// ═══════════════════════════════════════════════════════════════════
// Rules & Rewards
// ═══════════════════════════════════════════════════════════════════

/** Range/equality predicate: `{ net_loss: { min: 100, max: 500 } }` */
export interface RangePredicate {
  min?: number;
  max?: number;
  equals?: PlayerStateValue;
}

export type ConditionValue = PlayerStateValue | readonly PlayerStateValue[] | RangePredicate;

/** Conjunction: every key must hold */
export type Conditions = Record<string, ConditionValue>;

export interface RewardConfig {
  type: string;
  /** Literal number ("50") or arithmetic over numeric state fields ("net_loss * 0.10") */
  formula: string;
  maxAmount?: number;
  /** Multiplier: wageringRequired = amount * wageringRequirement */
  wageringRequirement?: number;
  expiryHours?: number;
  eligibleGames?: string[];
  maxBet?: number;
}

export interface RewardRule {
  ruleId: string;
  name: string;
  description?: string;
  priority: number;
  isActive: boolean;
  conditions: Conditions;
  rewardConfig: RewardConfig;
  createdAt: Date;
  updatedAt: Date;
}

export interface RewardMetadata {
  ruleName: string;
  playerSegment?: string;
  playerTier?: string;
  eligibleGames?: string[];
  maxBet?: number;
  cancelReason?: string;
}

export interface RewardRecord {
  id: string;
  playerId: string;
  ruleId: string;
  rewardType: RewardType;
  currencyType: WalletCurrency;
  amount: number;
  status: RewardStatus;
  wageringRequired: number;
  wageringCompleted: number;
  issuedAt: Date;
  expiresAt?: Date;
  activatedAt?: Date;
  cancelledAt?: Date;
  metadata: RewardMetadata;
}

// ═══════════════════════════════════════════════════════════════════
// Wallet
// ═══════════════════════════════════════════════════════════════════

export interface WalletBalance {
  playerId: string;
  lpBalance: number;
  rpBalance: number;
  bonusBalance: number;
  ticketsBalance: number;
  bonusWageringRequired: number;
  bonusWageringCompleted: number;
  bonusExpiry?: Date;
  bonusMaxBet?: number;
  bonusEligibleGames: string[];
  /** Optimistic concurrency counter, bumped on every write */
  version: number;
  updatedAt: Date;
}

/** FIFO lot of earned loyalty points */
export interface PointEntry {
  id: string;
  playerId: string;
  amount: number;
  remainingAmount: number;
  source: string;
  sourceId?: string;
  issuedAt: Date;
  expiresAt?: Date;
  isExpired: boolean;
}

export interface Transaction {
  id: string;
  playerId: string;
  type: TransactionType;
  currency: CurrencyType;
  /** Signed: positive = credit, negative = debit */
  amount: number;
  balanceBefore: number;
  balanceAfter: number;
  description: string;
  referenceId?: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
}

export interface RedemptionRule {
  id: string;
  name: string;
  isActive: boolean;
  lpCost: number;
  currencyValue: number;
  targetBalance: 'CASH' | 'BONUS';
  minLpBalance: number;
  tierRequirement?: TierLevel;
  maxRedemptionsPerMonth?: number;
}

export interface LoyaltyRedemption {
  id: string;
  playerId: string;
  redemptionRuleId: string;
  lpAmount: number;
  valueReceived: number;
  currencyType: 'CASH' | 'BONUS';
  status: 'COMPLETED';
  createdAt: Date;
}

// ═══════════════════════════════════════════════════════════════════
// Abuse & Players
// ═══════════════════════════════════════════════════════════════════

export interface AbuseSignal {
  id: string;
  playerId: string;
  signalType: SignalType;
  severity: number;
  description: string;
  metadata: Record<string, unknown>;
  isResolved: boolean;
  resolvedAt?: Date;
  detectedAt: Date;
}

export interface PlayerMetrics {
  totalDeposited: number;
  totalWagered: number;
  totalWon: number;
  netPnl: number;
  totalSessions: number;
  totalPlaytimeHours: number;
  avgBetSize: number;
  winLossRatio: number;
  bonusAbuseScore: number;
  lastDepositAt?: Date;
}

/** Owned by the segmentation side; the core reads it and updates risk fields */
export interface PlayerProfile {
  playerId: string;
  segment: PlayerSegment;
  tier: TierLevel;
  riskScore: number;
  isBlocked: boolean;
  isActive: boolean;
  metrics: PlayerMetrics;
  createdAt: Date;
  updatedAt: Date;
}

// ═══════════════════════════════════════════════════════════════════
// Results
// ═══════════════════════════════════════════════════════════════════

export interface ValidationResult {
  approved: boolean;
  reason: string;
}

export interface ExpectedValue {
  baseWager: number;
  retentionMultiplier: number;
  expectedWager: number;
  houseEdge: number;
  expectedRevenue: number;
  rewardCost: number;
  expectedProfit: number;
  roiPercent: number;
}

export interface RuleTestResult {
  matches: boolean;
  rewardAmount: number;
  playerState: PlayerState;
}

// ═══════════════════════════════════════════════════════════════════
// Collaborators
// ═══════════════════════════════════════════════════════════════════

export interface PlayerStateProvider {
  /** Throws NotFoundError for unknown players */
  getPlayerState(playerId: string): Promise<PlayerState>;
}

export type TierUpdateHook = (playerId: string) => Promise<TierLevel>;

export type Clock = () => Date;
