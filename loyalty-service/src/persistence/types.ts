/**
 * Ledger Store contracts
 *
 * Repositories return copies; mutating a returned entity changes nothing
 * until it is written back. Writes made through the repositories handed to
 * `withUnitOfWork` commit together when the callback resolves and are
 * discarded when it throws.
 */

import type {
  AbuseSignal,
  LoyaltyRedemption,
  PlayerProfile,
  PointEntry,
  RedemptionRule,
  RewardRecord,
  RewardRule,
  RewardStatus,
  TierLevel,
  Transaction,
  TransactionType,
  WalletBalance,
} from '../types.js';

// ═══════════════════════════════════════════════════════════════════
// Repositories
// ═══════════════════════════════════════════════════════════════════

export interface RuleRepository {
  findById(ruleId: string): Promise<RewardRule | null>;
  /** Creation order */
  findAll(filter?: { activeOnly?: boolean }): Promise<RewardRule[]>;
  /** Upsert by ruleId */
  save(rule: RewardRule): Promise<void>;
}

export interface RewardQuery {
  /** issuedAt >= since */
  since?: Date;
  /** Leave these rewards out (e.g. the ones still being judged) */
  excludeIds?: readonly string[];
  includeCancelled?: boolean;
}

export interface RewardRepository {
  insert(reward: RewardRecord): Promise<void>;
  findById(id: string): Promise<RewardRecord | null>;
  /** Newest first; cancelled rewards included unless the query says otherwise */
  findByPlayer(playerId: string, query?: RewardQuery): Promise<RewardRecord[]>;
  /** Sum of amounts; cancelled rewards excluded unless includeCancelled */
  sumAmount(playerId: string, query?: RewardQuery): Promise<number>;
  /**
   * Conditional status change. Resolves false (and writes nothing) when the
   * reward is no longer in `from`.
   */
  transitionStatus(
    id: string,
    from: RewardStatus,
    to: RewardStatus,
    changes?: Partial<Pick<RewardRecord, 'activatedAt' | 'cancelledAt' | 'metadata'>>,
  ): Promise<boolean>;
}

export interface BalanceRepository {
  findByPlayer(playerId: string): Promise<WalletBalance | null>;
  /** Insert unless a balance exists; resolves to whichever is stored */
  createIfAbsent(balance: WalletBalance): Promise<WalletBalance>;
  /**
   * Write the balance if the stored version still equals `balance.version`.
   * Resolves to the stored balance with the bumped version; throws
   * ConcurrentModificationError otherwise.
   */
  update(balance: WalletBalance): Promise<WalletBalance>;
  /** bonusBalance > 0 and bonusExpiry <= now */
  findWithExpiredBonus(now: Date): Promise<WalletBalance[]>;
}

export interface PointEntryRepository {
  insert(entry: PointEntry): Promise<void>;
  /** All lots of a player, FIFO order (issuedAt, then creation) */
  findByPlayer(playerId: string): Promise<PointEntry[]>;
  /** Non-expired lots with remainingAmount > 0, FIFO order */
  findOpenByPlayer(playerId: string): Promise<PointEntry[]>;
  /** Non-expired lots with remainingAmount > 0 and expiresAt <= now, FIFO order */
  findExpiring(now: Date, playerId?: string): Promise<PointEntry[]>;
  update(entry: PointEntry): Promise<void>;
}

export interface TransactionQuery {
  types?: readonly TransactionType[];
  since?: Date;
  limit?: number;
}

export interface TransactionRepository {
  append(transaction: Transaction): Promise<void>;
  /** Newest first */
  findByPlayer(playerId: string, query?: TransactionQuery): Promise<Transaction[]>;
  sumAmount(playerId: string, type: TransactionType, since?: Date): Promise<number>;
}

export interface SignalRepository {
  insert(signal: AbuseSignal): Promise<void>;
  findById(id: string): Promise<AbuseSignal | null>;
  findByPlayer(playerId: string, filter?: { unresolvedOnly?: boolean }): Promise<AbuseSignal[]>;
  markResolved(id: string, resolvedAt: Date): Promise<void>;
}

export interface PlayerRepository {
  findById(playerId: string): Promise<PlayerProfile | null>;
  /** Upsert by playerId */
  save(profile: PlayerProfile): Promise<void>;
  updateRisk(playerId: string, risk: { riskScore: number; isBlocked?: boolean }, at: Date): Promise<void>;
  updateTier(playerId: string, tier: TierLevel, at: Date): Promise<void>;
}

export interface RedemptionRuleRepository {
  findById(id: string): Promise<RedemptionRule | null>;
  save(rule: RedemptionRule): Promise<void>;
}

export interface RedemptionRepository {
  insert(redemption: LoyaltyRedemption): Promise<void>;
  countSince(playerId: string, redemptionRuleId: string, since: Date): Promise<number>;
  findByPlayer(playerId: string): Promise<LoyaltyRedemption[]>;
}

// ═══════════════════════════════════════════════════════════════════
// Store
// ═══════════════════════════════════════════════════════════════════

export interface LoyaltyRepositories {
  rules: RuleRepository;
  rewards: RewardRepository;
  balances: BalanceRepository;
  pointEntries: PointEntryRepository;
  transactions: TransactionRepository;
  signals: SignalRepository;
  players: PlayerRepository;
  redemptionRules: RedemptionRuleRepository;
  redemptions: RedemptionRepository;
}

export interface LoyaltyStore extends LoyaltyRepositories {
  /**
   * Run fn against repositories bound to one atomic unit of work.
   * Units of work must not be nested.
   */
  withUnitOfWork<T>(fn: (tx: LoyaltyRepositories) => Promise<T>): Promise<T>;
}
