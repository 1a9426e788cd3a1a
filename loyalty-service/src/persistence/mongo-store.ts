/**
 * MongoDB Ledger Store
 *
 * Entities are stored under their own string ids; Mongo's `_id` is projected
 * out of every read. Units of work run in a multi-document transaction, so
 * the server must be a replica set.
 */

import type { ClientSession, Collection, Db, Document, Filter, MongoClient } from 'mongodb';
import { createChildLogger, isDuplicateKeyError, withTransaction } from 'core-service';
import type {
  AbuseSignal,
  LoyaltyRedemption,
  PlayerProfile,
  PointEntry,
  RedemptionRule,
  RewardRecord,
  RewardRule,
  Transaction,
  WalletBalance,
} from '../types.js';
import { ConcurrentModificationError } from '../errors.js';
import type {
  BalanceRepository,
  LoyaltyRepositories,
  LoyaltyStore,
  PlayerRepository,
  PointEntryRepository,
  RedemptionRepository,
  RedemptionRuleRepository,
  RewardQuery,
  RewardRepository,
  RuleRepository,
  SignalRepository,
  TransactionRepository,
} from './types.js';

const log = createChildLogger({ component: 'mongo-store' });

export const COLLECTIONS = {
  rules: 'loyalty_rules',
  rewards: 'loyalty_rewards',
  balances: 'wallet_balances',
  pointEntries: 'point_entries',
  transactions: 'loyalty_transactions',
  signals: 'abuse_signals',
  players: 'player_profiles',
  redemptionRules: 'redemption_rules',
  redemptions: 'loyalty_redemptions',
} as const;

// Lean projection - exclude _id (we use custom id fields)
const LEAN = { projection: { _id: 0 } } as const;
// Creation order for equal timestamps
const FIFO_SORT = { issuedAt: 1, _id: 1 } as const;
const NEWEST_FIRST = { createdAt: -1, _id: -1 } as const;

interface Collections {
  rules: Collection<RewardRule>;
  rewards: Collection<RewardRecord>;
  balances: Collection<WalletBalance>;
  pointEntries: Collection<PointEntry>;
  transactions: Collection<Transaction>;
  signals: Collection<AbuseSignal>;
  players: Collection<PlayerProfile>;
  redemptionRules: Collection<RedemptionRule>;
  redemptions: Collection<LoyaltyRedemption>;
}

async function sumField<T extends Document>(
  collection: Collection<T>,
  match: Filter<T>,
  field: string,
  session?: ClientSession,
): Promise<number> {
  const [row] = await collection
    .aggregate<{ total: number }>(
      [{ $match: match }, { $group: { _id: null, total: { $sum: `$${field}` } } }],
      { session },
    )
    .toArray();
  return row?.total ?? 0;
}

// ═══════════════════════════════════════════════════════════════════
// Repositories (bound to an optional session)
// ═══════════════════════════════════════════════════════════════════

function ruleRepository(c: Collections, session?: ClientSession): RuleRepository {
  return {
    async findById(ruleId) {
      return c.rules.findOne({ ruleId }, { ...LEAN, session });
    },
    async findAll(filter = {}) {
      const query: Filter<RewardRule> = filter.activeOnly ? { isActive: true } : {};
      return c.rules.find(query, { ...LEAN, session }).sort({ createdAt: 1, _id: 1 }).toArray();
    },
    async save(rule) {
      await c.rules.replaceOne({ ruleId: rule.ruleId }, { ...rule }, { upsert: true, session, ignoreUndefined: true });
    },
  };
}

function rewardRepository(c: Collections, session?: ClientSession): RewardRepository {
  function rewardFilter(playerId: string, query: RewardQuery): Filter<RewardRecord> {
    const filter: Filter<RewardRecord> = { playerId };
    if (query.since) filter.issuedAt = { $gte: query.since };
    if (query.excludeIds && query.excludeIds.length > 0) filter.id = { $nin: [...query.excludeIds] };
    return filter;
  }

  return {
    async insert(reward) {
      await c.rewards.insertOne({ ...reward }, { session, ignoreUndefined: true });
    },
    async findById(id) {
      return c.rewards.findOne({ id }, { ...LEAN, session });
    },
    async findByPlayer(playerId, query = {}) {
      const filter = rewardFilter(playerId, query);
      if (query.includeCancelled === false) filter.status = { $ne: 'CANCELLED' };
      return c.rewards.find(filter, { ...LEAN, session }).sort({ issuedAt: -1, _id: -1 }).toArray();
    },
    async sumAmount(playerId, query = {}) {
      const filter = rewardFilter(playerId, query);
      if (!query.includeCancelled) filter.status = { $ne: 'CANCELLED' };
      return sumField(c.rewards, filter, 'amount', session);
    },
    async transitionStatus(id, from, to, changes = {}) {
      const result = await c.rewards.updateOne(
        { id, status: from },
        { $set: { ...changes, status: to } },
        { session, ignoreUndefined: true },
      );
      return result.modifiedCount === 1;
    },
  };
}

function balanceRepository(c: Collections, session?: ClientSession): BalanceRepository {
  return {
    async findByPlayer(playerId) {
      return c.balances.findOne({ playerId }, { ...LEAN, session });
    },
    async createIfAbsent(balance) {
      try {
        await c.balances.updateOne(
          { playerId: balance.playerId },
          { $setOnInsert: { ...balance } },
          { upsert: true, session, ignoreUndefined: true },
        );
      } catch (error) {
        // Concurrent upsert on the unique playerId index; the other insert won
        if (!isDuplicateKeyError(error)) throw error;
      }
      const stored = await c.balances.findOne({ playerId: balance.playerId }, { ...LEAN, session });
      if (!stored) {
        throw new ConcurrentModificationError('WalletBalance', balance.playerId);
      }
      return stored;
    },
    async update(balance) {
      const next: WalletBalance = { ...balance, version: balance.version + 1 };
      const result = await c.balances.replaceOne(
        { playerId: balance.playerId, version: balance.version },
        { ...next },
        { session, ignoreUndefined: true },
      );
      if (result.matchedCount !== 1) {
        throw new ConcurrentModificationError('WalletBalance', balance.playerId);
      }
      return next;
    },
    async findWithExpiredBonus(now) {
      return c.balances
        .find({ bonusBalance: { $gt: 0 }, bonusExpiry: { $lte: now } }, { ...LEAN, session })
        .toArray();
    },
  };
}

function pointEntryRepository(c: Collections, session?: ClientSession): PointEntryRepository {
  return {
    async insert(entry) {
      await c.pointEntries.insertOne({ ...entry }, { session, ignoreUndefined: true });
    },
    async findByPlayer(playerId) {
      return c.pointEntries.find({ playerId }, { ...LEAN, session }).sort(FIFO_SORT).toArray();
    },
    async findOpenByPlayer(playerId) {
      return c.pointEntries
        .find({ playerId, isExpired: false, remainingAmount: { $gt: 0 } }, { ...LEAN, session })
        .sort(FIFO_SORT)
        .toArray();
    },
    async findExpiring(now, playerId) {
      const filter: Filter<PointEntry> = { isExpired: false, remainingAmount: { $gt: 0 }, expiresAt: { $lte: now } };
      if (playerId) filter.playerId = playerId;
      return c.pointEntries.find(filter, { ...LEAN, session }).sort(FIFO_SORT).toArray();
    },
    async update(entry) {
      await c.pointEntries.replaceOne({ id: entry.id }, { ...entry }, { session, ignoreUndefined: true });
    },
  };
}

function transactionRepository(c: Collections, session?: ClientSession): TransactionRepository {
  return {
    async append(transaction) {
      await c.transactions.insertOne({ ...transaction }, { session, ignoreUndefined: true });
    },
    async findByPlayer(playerId, query = {}) {
      const filter: Filter<Transaction> = { playerId };
      if (query.types) filter.type = { $in: [...query.types] };
      if (query.since) filter.createdAt = { $gte: query.since };
      const cursor = c.transactions.find(filter, { ...LEAN, session }).sort(NEWEST_FIRST);
      if (query.limit !== undefined) cursor.limit(query.limit);
      return cursor.toArray();
    },
    async sumAmount(playerId, type, since) {
      const filter: Filter<Transaction> = { playerId, type };
      if (since) filter.createdAt = { $gte: since };
      return sumField(c.transactions, filter, 'amount', session);
    },
  };
}

function signalRepository(c: Collections, session?: ClientSession): SignalRepository {
  return {
    async insert(signal) {
      await c.signals.insertOne({ ...signal }, { session, ignoreUndefined: true });
    },
    async findById(id) {
      return c.signals.findOne({ id }, { ...LEAN, session });
    },
    async findByPlayer(playerId, filter = {}) {
      const query: Filter<AbuseSignal> = { playerId };
      if (filter.unresolvedOnly) query.isResolved = false;
      return c.signals.find(query, { ...LEAN, session }).sort({ detectedAt: 1, _id: 1 }).toArray();
    },
    async markResolved(id, resolvedAt) {
      await c.signals.updateOne({ id }, { $set: { isResolved: true, resolvedAt } }, { session });
    },
  };
}

function playerRepository(c: Collections, session?: ClientSession): PlayerRepository {
  return {
    async findById(playerId) {
      return c.players.findOne({ playerId }, { ...LEAN, session });
    },
    async save(profile) {
      await c.players.replaceOne({ playerId: profile.playerId }, { ...profile }, { upsert: true, session, ignoreUndefined: true });
    },
    async updateRisk(playerId, risk, at) {
      await c.players.updateOne(
        { playerId },
        { $set: { ...risk, updatedAt: at } },
        { session, ignoreUndefined: true },
      );
    },
    async updateTier(playerId, tier, at) {
      await c.players.updateOne({ playerId }, { $set: { tier, updatedAt: at } }, { session });
    },
  };
}

function redemptionRuleRepository(c: Collections, session?: ClientSession): RedemptionRuleRepository {
  return {
    async findById(id) {
      return c.redemptionRules.findOne({ id }, { ...LEAN, session });
    },
    async save(rule) {
      await c.redemptionRules.replaceOne({ id: rule.id }, { ...rule }, { upsert: true, session, ignoreUndefined: true });
    },
  };
}

function redemptionRepository(c: Collections, session?: ClientSession): RedemptionRepository {
  return {
    async insert(redemption) {
      await c.redemptions.insertOne({ ...redemption }, { session });
    },
    async countSince(playerId, redemptionRuleId, since) {
      return c.redemptions.countDocuments({ playerId, redemptionRuleId, createdAt: { $gte: since } }, { session });
    },
    async findByPlayer(playerId) {
      return c.redemptions.find({ playerId }, { ...LEAN, session }).sort(NEWEST_FIRST).toArray();
    },
  };
}

function bindRepositories(c: Collections, session?: ClientSession): LoyaltyRepositories {
  return {
    rules: ruleRepository(c, session),
    rewards: rewardRepository(c, session),
    balances: balanceRepository(c, session),
    pointEntries: pointEntryRepository(c, session),
    transactions: transactionRepository(c, session),
    signals: signalRepository(c, session),
    players: playerRepository(c, session),
    redemptionRules: redemptionRuleRepository(c, session),
    redemptions: redemptionRepository(c, session),
  };
}

// ═══════════════════════════════════════════════════════════════════
// Store
// ═══════════════════════════════════════════════════════════════════

export class MongoLoyaltyStore implements LoyaltyStore {
  readonly rules: RuleRepository;
  readonly rewards: RewardRepository;
  readonly balances: BalanceRepository;
  readonly pointEntries: PointEntryRepository;
  readonly transactions: TransactionRepository;
  readonly signals: SignalRepository;
  readonly players: PlayerRepository;
  readonly redemptionRules: RedemptionRuleRepository;
  readonly redemptions: RedemptionRepository;

  private readonly collections: Collections;

  constructor(private readonly client: MongoClient, db: Db) {
    this.collections = {
      rules: db.collection<RewardRule>(COLLECTIONS.rules),
      rewards: db.collection<RewardRecord>(COLLECTIONS.rewards),
      balances: db.collection<WalletBalance>(COLLECTIONS.balances),
      pointEntries: db.collection<PointEntry>(COLLECTIONS.pointEntries),
      transactions: db.collection<Transaction>(COLLECTIONS.transactions),
      signals: db.collection<AbuseSignal>(COLLECTIONS.signals),
      players: db.collection<PlayerProfile>(COLLECTIONS.players),
      redemptionRules: db.collection<RedemptionRule>(COLLECTIONS.redemptionRules),
      redemptions: db.collection<LoyaltyRedemption>(COLLECTIONS.redemptions),
    };

    const repositories = bindRepositories(this.collections);
    this.rules = repositories.rules;
    this.rewards = repositories.rewards;
    this.balances = repositories.balances;
    this.pointEntries = repositories.pointEntries;
    this.transactions = repositories.transactions;
    this.signals = repositories.signals;
    this.players = repositories.players;
    this.redemptionRules = repositories.redemptionRules;
    this.redemptions = repositories.redemptions;
  }

  async withUnitOfWork<T>(fn: (tx: LoyaltyRepositories) => Promise<T>): Promise<T> {
    return withTransaction({ client: this.client }, session => fn(bindRepositories(this.collections, session)));
  }

  /**
   * Create the unique and query indexes. Safe to call on every startup.
   */
  async ensureIndexes(): Promise<void> {
    const c = this.collections;
    await Promise.all([
      c.rules.createIndex({ ruleId: 1 }, { unique: true }),
      c.rewards.createIndex({ id: 1 }, { unique: true }),
      c.rewards.createIndex({ playerId: 1, issuedAt: -1 }),
      c.balances.createIndex({ playerId: 1 }, { unique: true }),
      c.balances.createIndex({ bonusExpiry: 1 }, { partialFilterExpression: { bonusBalance: { $gt: 0 } } }),
      c.pointEntries.createIndex({ id: 1 }, { unique: true }),
      c.pointEntries.createIndex({ playerId: 1, isExpired: 1, issuedAt: 1 }),
      c.pointEntries.createIndex({ isExpired: 1, expiresAt: 1 }),
      c.transactions.createIndex({ id: 1 }, { unique: true }),
      c.transactions.createIndex({ playerId: 1, type: 1, createdAt: -1 }),
      c.signals.createIndex({ id: 1 }, { unique: true }),
      c.signals.createIndex({ playerId: 1, isResolved: 1 }),
      c.players.createIndex({ playerId: 1 }, { unique: true }),
      c.redemptionRules.createIndex({ id: 1 }, { unique: true }),
      c.redemptions.createIndex({ playerId: 1, redemptionRuleId: 1, createdAt: -1 }),
    ]);
    log.info('Loyalty indexes ensured', { collections: Object.values(COLLECTIONS).length });
  }
}
