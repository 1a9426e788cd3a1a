/**
 * Wallet Ledger
 *
 * The only writer of WalletBalance. Every balance change appends a
 * Transaction in the same unit of work; LP credits open a FIFO PointEntry
 * lot and LP debits consume lots oldest first.
 *
 * Public mutators hold the player's keyed lock for the whole unit of work
 * and retry it when a concurrent writer bumped the balance version first.
 */

import {
  createChildLogger,
  generateId,
  addDays,
  retry,
  RetryConfigs,
  InProcessKeyedLock,
  getErrorMessage,
  sum,
  type KeyedLock,
  type Logger,
} from 'core-service';
import type {
  ActivityType,
  Clock,
  CurrencyType,
  LoyaltyRedemption,
  PointEntry,
  RewardRecord,
  TierLevel,
  TierUpdateHook,
  Transaction,
  TransactionType,
  WalletBalance,
  WalletCurrency,
} from '../../types.js';
import type { LoyaltyConfig } from '../../config.js';
import type { LoyaltyRepositories, LoyaltyStore, TransactionQuery } from '../../persistence/types.js';
import { LOYALTY_ERRORS } from '../../error-codes.js';
import {
  InsufficientBalanceError,
  NotFoundError,
  NotImplementedError,
  RuleInactiveError,
  StateTransitionError,
  TierRequirementNotMetError,
  ValidationFailureError,
  playerNotFound,
} from '../../errors.js';

export const PLAYER_LOCK_PREFIX = 'loyalty:player:';

const BALANCE_FIELDS = {
  LP: 'lpBalance',
  RP: 'rpBalance',
  BONUS: 'bonusBalance',
  TICKETS: 'ticketsBalance',
} as const satisfies Record<WalletCurrency, keyof WalletBalance>;

const TIER_RANK: Record<TierLevel, number> = { BRONZE: 0, SILVER: 1, GOLD: 2, PLATINUM: 3, DIAMOND: 4 };

const REDEMPTION_WINDOW_DAYS = 30;
const LOT_TOLERANCE = 1e-9;

// ═══════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════

export interface WalletLedgerDeps {
  store: LoyaltyStore;
  config: LoyaltyConfig;
  lock?: KeyedLock;
  tierHook?: TierUpdateHook;
  now?: Clock;
  logger?: Logger;
}

export interface TransactionInput {
  playerId: string;
  type: TransactionType;
  currency: CurrencyType;
  amount: number;
  balanceBefore: number;
  balanceAfter: number;
  description: string;
  referenceId?: string;
  metadata?: Record<string, unknown>;
}

export interface AddPointsOptions {
  /** Days until the lot expires; null = never. Falls back to wallet.defaultPointExpiryDays */
  expiryDays?: number | null;
  description?: string;
  sourceId?: string;
}

export interface BonusCreditOptions {
  /** Amount added to bonusWageringRequired (absolute, not a multiplier) */
  wageringRequirement?: number;
  expiry?: Date;
  maxBet?: number;
  eligibleGames?: string[];
  rewardId?: string;
  description?: string;
}

export interface DeductOptions {
  type?: TransactionType;
  description?: string;
  referenceId?: string;
  metadata?: Record<string, unknown>;
}

export interface ActivityOptions {
  description?: string;
  referenceId?: string;
  metadata?: Record<string, unknown>;
}

export interface LotConsumption {
  entryId: string;
  consumed: number;
}

export function zeroBalance(playerId: string, at: Date): WalletBalance {
  return {
    playerId,
    lpBalance: 0,
    rpBalance: 0,
    bonusBalance: 0,
    ticketsBalance: 0,
    bonusWageringRequired: 0,
    bonusWageringCompleted: 0,
    bonusEligibleGames: [],
    version: 0,
    updatedAt: at,
  };
}

function assertPositive(amount: number, field = 'amount'): void {
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new ValidationFailureError(LOYALTY_ERRORS.InvalidAmount, `${field} must be a positive number, got ${amount}`, {
      [field]: amount,
    });
  }
}

// ═══════════════════════════════════════════════════════════════════
// Wallet Ledger
// ═══════════════════════════════════════════════════════════════════

export class WalletLedger {
  private readonly store: LoyaltyStore;
  private readonly config: LoyaltyConfig;
  private readonly lock: KeyedLock;
  private readonly tierHook?: TierUpdateHook;
  private readonly now: Clock;
  private readonly log: Logger;

  constructor(deps: WalletLedgerDeps) {
    this.store = deps.store;
    this.config = deps.config;
    this.lock = deps.lock ?? new InProcessKeyedLock();
    this.tierHook = deps.tierHook;
    this.now = deps.now ?? (() => new Date());
    this.log = deps.logger ?? createChildLogger({ component: 'wallet-ledger' });
  }

  // ═══════════════════════════════════════════════════════════════════
  // Reads
  // ═══════════════════════════════════════════════════════════════════

  /** Stored balance, or an unsaved zero balance for unknown players */
  async getBalance(playerId: string): Promise<WalletBalance> {
    return (await this.store.balances.findByPlayer(playerId)) ?? zeroBalance(playerId, this.now());
  }

  async getOrCreateBalance(playerId: string): Promise<WalletBalance> {
    return (await this.store.balances.findByPlayer(playerId))
      ?? this.store.balances.createIfAbsent(zeroBalance(playerId, this.now()));
  }

  /** Newest first */
  async getTransactions(playerId: string, filter: TransactionQuery = {}): Promise<Transaction[]> {
    return this.store.transactions.findByPlayer(playerId, filter);
  }

  /** FIFO order, expired lots included */
  async getPointEntries(playerId: string): Promise<PointEntry[]> {
    return this.store.pointEntries.findByPlayer(playerId);
  }

  async getRedemptions(playerId: string): Promise<LoyaltyRedemption[]> {
    return this.store.redemptions.findByPlayer(playerId);
  }

  /**
   * Append an audit row. Does not touch balances; the caller supplies the
   * before/after snapshot of the change it made in the same unit of work.
   */
  async createTransaction(input: TransactionInput, repos: LoyaltyRepositories = this.store): Promise<Transaction> {
    const transaction: Transaction = {
      id: generateId(),
      playerId: input.playerId,
      type: input.type,
      currency: input.currency,
      amount: input.amount,
      balanceBefore: input.balanceBefore,
      balanceAfter: input.balanceAfter,
      description: input.description,
      metadata: input.metadata ?? {},
      createdAt: this.now(),
    };
    if (input.referenceId !== undefined) {
      transaction.referenceId = input.referenceId;
    }
    await repos.transactions.append(transaction);
    return transaction;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Credits
  // ═══════════════════════════════════════════════════════════════════

  async addLoyaltyPoints(
    playerId: string,
    amount: number,
    source: string,
    options: AddPointsOptions = {},
  ): Promise<Transaction> {
    assertPositive(amount);
    const transaction = await this.mutate(playerId, 'addLoyaltyPoints', tx =>
      this.creditLoyaltyPoints(tx, playerId, amount, source, options),
    );
    await this.runTierHook(playerId);
    return transaction;
  }

  async addBonusBalance(playerId: string, amount: number, options: BonusCreditOptions = {}): Promise<Transaction> {
    assertPositive(amount);
    return this.mutate(playerId, 'addBonusBalance', tx => this.creditBonus(tx, playerId, amount, options));
  }

  async addRewardPoints(playerId: string, amount: number, description = 'Reward points issued'): Promise<Transaction> {
    assertPositive(amount);
    return this.mutate(playerId, 'addRewardPoints', tx =>
      this.creditPlain(tx, playerId, 'RP', amount, 'RP_EARNED', description),
    );
  }

  async addTickets(playerId: string, amount: number, description = 'Tickets issued'): Promise<Transaction> {
    assertPositive(amount);
    return this.mutate(playerId, 'addTickets', tx =>
      this.creditPlain(tx, playerId, 'TICKETS', amount, 'TICKETS_ISSUED', description),
    );
  }

  // ═══════════════════════════════════════════════════════════════════
  // Debits
  // ═══════════════════════════════════════════════════════════════════

  /**
   * All-or-nothing debit. LP debits also consume point lots oldest first.
   */
  async deductBalance(
    playerId: string,
    currency: WalletCurrency,
    amount: number,
    options: DeductOptions = {},
  ): Promise<Transaction> {
    assertPositive(amount);
    return this.mutate(playerId, 'deductBalance', tx => this.debit(tx, playerId, currency, amount, options));
  }

  /**
   * LP debit that consumes point lots oldest first. The balance, the lots
   * and the debit row change together, and open lots are checked against
   * lpBalance afterwards. The row's `metadata.lots` lists what was consumed.
   */
  async deductLpFifo(playerId: string, amount: number, options: DeductOptions = {}): Promise<Transaction> {
    assertPositive(amount);
    return this.mutate(playerId, 'deductLpFifo', tx => this.debit(tx, playerId, 'LP', amount, options));
  }

  // ═══════════════════════════════════════════════════════════════════
  // Activity & Wagering
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Journal a DEPOSIT, WITHDRAWAL or WIN. CASH is audit-only, so both
   * snapshots are 0 and the amount is the positive magnitude.
   */
  async recordActivity(
    playerId: string,
    type: ActivityType,
    amount: number,
    options: ActivityOptions = {},
  ): Promise<Transaction> {
    assertPositive(amount);
    return this.createTransaction({
      playerId,
      type,
      currency: 'CASH',
      amount,
      balanceBefore: 0,
      balanceAfter: 0,
      description: options.description ?? type.charAt(0) + type.slice(1).toLowerCase(),
      referenceId: options.referenceId,
      metadata: options.metadata,
    });
  }

  /**
   * Journal a wager and count it toward the active bonus.
   *
   * @returns wagering progress in percent (100 once the requirement is met
   *   and cleared), or null when no requirement is active or the game is not
   *   eligible
   */
  async recordWager(playerId: string, amount: number, gameType?: string): Promise<number | null> {
    assertPositive(amount);
    return this.mutate(playerId, 'recordWager', async tx => {
      await this.createTransaction({
        playerId,
        type: 'WAGER',
        currency: 'CASH',
        amount,
        balanceBefore: 0,
        balanceAfter: 0,
        description: 'Wager',
        metadata: gameType ? { gameType } : {},
      }, tx);

      const balance = await this.loadBalance(tx, playerId);
      const required = balance.bonusWageringRequired;
      if (required <= 0) {
        return null;
      }

      if (gameType && balance.bonusEligibleGames.length > 0 && !balance.bonusEligibleGames.includes(gameType)) {
        this.log.warn('Wager on ineligible game not counted', {
          playerId,
          gameType,
          eligibleGames: balance.bonusEligibleGames,
        });
        return null;
      }

      // Counted anyway; enforcement is a product decision
      if (balance.bonusMaxBet !== undefined && amount > balance.bonusMaxBet) {
        this.log.warn('Wager exceeds bonus max bet', { playerId, amount, maxBet: balance.bonusMaxBet });
      }

      const completed = balance.bonusWageringCompleted + amount;
      if (completed >= required) {
        await tx.balances.update({
          ...balance,
          bonusWageringRequired: 0,
          bonusWageringCompleted: 0,
          updatedAt: this.now(),
        });
        this.log.info('Bonus wagering requirement met', { playerId, required, completed });
        return 100;
      }

      await tx.balances.update({ ...balance, bonusWageringCompleted: completed, updatedAt: this.now() });
      return (completed / required) * 100;
    });
  }

  // ═══════════════════════════════════════════════════════════════════
  // Sweeps
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Forfeit bonus balances past their expiry. Re-checks each balance under
   * the player's lock, so repeated runs expire a bonus once.
   *
   * @returns number of balances expired
   */
  async expireBonuses(): Promise<number> {
    const now = this.now();
    const candidates = await this.store.balances.findWithExpiredBonus(now);
    let expired = 0;

    for (const candidate of candidates) {
      const { playerId } = candidate;
      try {
        const done = await this.mutate(playerId, 'expireBonuses', async tx => {
          const balance = await tx.balances.findByPlayer(playerId);
          if (!balance || balance.bonusBalance <= 0 || !balance.bonusExpiry || balance.bonusExpiry > now) {
            return false;
          }

          const forfeited = balance.bonusBalance;
          const next: WalletBalance = {
            ...balance,
            bonusBalance: 0,
            bonusWageringRequired: 0,
            bonusWageringCompleted: 0,
            bonusEligibleGames: [],
            updatedAt: now,
          };
          delete next.bonusExpiry;
          delete next.bonusMaxBet;
          await tx.balances.update(next);

          await this.createTransaction({
            playerId,
            type: 'BONUS_EXPIRED',
            currency: 'BONUS',
            amount: -forfeited,
            balanceBefore: forfeited,
            balanceAfter: 0,
            description: 'Bonus expired',
            metadata: { expiredAt: balance.bonusExpiry.toISOString() },
          }, tx);
          return true;
        });
        if (done) expired++;
      } catch (error) {
        this.log.error('Bonus expiry failed', { playerId, error: getErrorMessage(error) });
      }
    }

    if (expired > 0) {
      this.log.info('Expired bonuses', { count: expired });
    }
    return expired;
  }

  /**
   * Expire point lots past their expiresAt and debit what they still held.
   *
   * @returns number of lots expired
   */
  async processPointExpiry(): Promise<number> {
    const now = this.now();
    const due = await this.store.pointEntries.findExpiring(now);
    const playerIds = [...new Set(due.map(entry => entry.playerId))];
    let expired = 0;

    for (const playerId of playerIds) {
      try {
        expired += await this.mutate(playerId, 'processPointExpiry', async tx => {
          const lots = await tx.pointEntries.findExpiring(now, playerId);
          let balance = await this.loadBalance(tx, playerId);

          for (const lot of lots) {
            const debit = Math.min(lot.remainingAmount, balance.lpBalance);
            const before = balance.lpBalance;
            if (debit > 0) {
              balance = await tx.balances.update({ ...balance, lpBalance: before - debit, updatedAt: now });
              await this.createTransaction({
                playerId,
                type: 'LP_EXPIRED',
                currency: 'LP',
                amount: -debit,
                balanceBefore: before,
                balanceAfter: balance.lpBalance,
                description: 'Loyalty points expired',
                referenceId: lot.id,
                metadata: { source: lot.source },
              }, tx);
            }
            await tx.pointEntries.update({ ...lot, remainingAmount: 0, isExpired: true });
          }

          await this.verifyLots(tx, playerId, balance.lpBalance);
          return lots.length;
        });
      } catch (error) {
        this.log.error('Point expiry failed', { playerId, error: getErrorMessage(error) });
      }
    }

    if (expired > 0) {
      this.log.info('Expired point lots', { count: expired, players: playerIds.length });
    }
    return expired;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Redemption & Issuance
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Exchange LP for cash or bonus value under a redemption rule.
   * Checks, debit, payout and the redemption row commit together.
   */
  async redeemPoints(playerId: string, redemptionRuleId: string): Promise<LoyaltyRedemption> {
    return this.mutate(playerId, 'redeemPoints', async tx => {
      const rule = await tx.redemptionRules.findById(redemptionRuleId);
      if (!rule) {
        throw new NotFoundError(LOYALTY_ERRORS.RedemptionRuleNotFound, `Redemption rule ${redemptionRuleId} not found`, {
          redemptionRuleId,
        });
      }
      if (!rule.isActive) {
        throw new RuleInactiveError(redemptionRuleId);
      }

      if (rule.tierRequirement) {
        const profile = await tx.players.findById(playerId);
        if (!profile) {
          throw playerNotFound(playerId);
        }
        if (TIER_RANK[profile.tier] < TIER_RANK[rule.tierRequirement]) {
          throw new TierRequirementNotMetError(profile.tier, rule.tierRequirement);
        }
      }

      const balance = await this.loadBalance(tx, playerId);
      const required = Math.max(rule.lpCost, rule.minLpBalance);
      if (balance.lpBalance < required) {
        throw new InsufficientBalanceError(playerId, 'LP', balance.lpBalance, required);
      }

      const now = this.now();
      if (rule.maxRedemptionsPerMonth !== undefined) {
        const recent = await tx.redemptions.countSince(playerId, rule.id, addDays(now, -REDEMPTION_WINDOW_DAYS));
        if (recent >= rule.maxRedemptionsPerMonth) {
          throw new ValidationFailureError(
            LOYALTY_ERRORS.RedemptionLimitReached,
            `Redemption limit of ${rule.maxRedemptionsPerMonth} per ${REDEMPTION_WINDOW_DAYS} days reached`,
            { playerId, redemptionRuleId, recent },
          );
        }
      }

      const redemptionId = generateId();
      await this.debit(tx, playerId, 'LP', rule.lpCost, {
        type: 'LP_REDEEMED',
        description: `Redeemed ${rule.name}`,
        referenceId: redemptionId,
      });

      if (rule.targetBalance === 'BONUS') {
        await this.creditBonus(tx, playerId, rule.currencyValue, {
          description: `Redemption payout: ${rule.name}`,
          rewardId: redemptionId,
        });
      } else {
        await this.createTransaction({
          playerId,
          type: 'REDEMPTION_PAYOUT',
          currency: 'CASH',
          amount: rule.currencyValue,
          balanceBefore: 0,
          balanceAfter: 0,
          description: `Redemption payout: ${rule.name}`,
          referenceId: redemptionId,
        }, tx);
      }

      const redemption: LoyaltyRedemption = {
        id: redemptionId,
        playerId,
        redemptionRuleId: rule.id,
        lpAmount: rule.lpCost,
        valueReceived: rule.currencyValue,
        currencyType: rule.targetBalance,
        status: 'COMPLETED',
        createdAt: now,
      };
      await tx.redemptions.insert(redemption);

      this.log.info('Points redeemed', { playerId, redemptionRuleId, lpAmount: rule.lpCost });
      return redemption;
    });
  }

  /**
   * Credit a PENDING reward and move it to ACTIVE in one unit of work.
   * A reward is credited at most once.
   */
  async issueReward(rewardId: string): Promise<Transaction> {
    const reward = await this.store.rewards.findById(rewardId);
    if (!reward) {
      throw new NotFoundError(LOYALTY_ERRORS.RewardNotFound, `Reward ${rewardId} not found`, { rewardId });
    }
    const { playerId } = reward;

    const transaction = await this.mutate(playerId, 'issueReward', async tx => {
      const current = await tx.rewards.findById(rewardId);
      if (!current) {
        throw new NotFoundError(LOYALTY_ERRORS.RewardNotFound, `Reward ${rewardId} not found`, { rewardId });
      }
      if (current.status !== 'PENDING') {
        throw new StateTransitionError(rewardId, current.status, 'ACTIVE');
      }

      const row = await this.creditReward(tx, current);

      const activated = await tx.rewards.transitionStatus(rewardId, 'PENDING', 'ACTIVE', { activatedAt: this.now() });
      if (!activated) {
        throw new StateTransitionError(rewardId, 'PENDING', 'ACTIVE');
      }
      return row;
    });

    this.log.info('Reward issued', {
      rewardId,
      playerId,
      currency: reward.currencyType,
      amount: reward.amount,
    });

    if (reward.currencyType === 'LP') {
      await this.runTierHook(playerId);
    }
    return transaction;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Unit-of-work steps
  // ═══════════════════════════════════════════════════════════════════

  private async mutate<T>(playerId: string, operation: string, fn: (tx: LoyaltyRepositories) => Promise<T>): Promise<T> {
    return this.lock.runExclusive(`${PLAYER_LOCK_PREFIX}${playerId}`, async () => {
      const { result } = await retry(() => this.store.withUnitOfWork(fn), {
        ...RetryConfigs.optimisticLock,
        maxRetries: this.config.wallet.maxConcurrencyRetries,
        name: `WalletLedger.${operation}`,
      });
      return result;
    });
  }

  private async loadBalance(tx: LoyaltyRepositories, playerId: string): Promise<WalletBalance> {
    return (await tx.balances.findByPlayer(playerId))
      ?? tx.balances.createIfAbsent(zeroBalance(playerId, this.now()));
  }

  private async creditReward(tx: LoyaltyRepositories, reward: RewardRecord): Promise<Transaction> {
    const currency = reward.currencyType;
    switch (currency) {
      case 'LP':
        return this.creditLoyaltyPoints(tx, reward.playerId, reward.amount, 'REWARD', {
          sourceId: reward.id,
          description: `Reward from rule ${reward.ruleId}`,
        });
      case 'BONUS': {
        const games = reward.metadata.eligibleGames;
        return this.creditBonus(tx, reward.playerId, reward.amount, {
          wageringRequirement: reward.wageringRequired,
          expiry: reward.expiresAt,
          maxBet: reward.metadata.maxBet,
          eligibleGames: games && games.length > 0 ? games : undefined,
          rewardId: reward.id,
          description: `Bonus from rule ${reward.ruleId}`,
        });
      }
      case 'RP':
      case 'TICKETS':
        throw new NotImplementedError(
          LOYALTY_ERRORS.CurrencyNotSupported,
          `Issuing ${currency} rewards is not supported`,
          { rewardId: reward.id, currency },
        );
      default: {
        const unhandled: never = currency;
        throw new Error(`Unhandled currency: ${String(unhandled)}`);
      }
    }
  }

  private async creditLoyaltyPoints(
    tx: LoyaltyRepositories,
    playerId: string,
    amount: number,
    source: string,
    options: AddPointsOptions,
  ): Promise<Transaction> {
    const now = this.now();
    const balance = await this.loadBalance(tx, playerId);
    const before = balance.lpBalance;
    const saved = await tx.balances.update({ ...balance, lpBalance: before + amount, updatedAt: now });

    const expiryDays = options.expiryDays === undefined ? this.config.wallet.defaultPointExpiryDays : options.expiryDays;
    const entry: PointEntry = {
      id: generateId(),
      playerId,
      amount,
      remainingAmount: amount,
      source,
      issuedAt: now,
      isExpired: false,
    };
    if (options.sourceId !== undefined) entry.sourceId = options.sourceId;
    if (expiryDays !== null) entry.expiresAt = addDays(now, expiryDays);
    await tx.pointEntries.insert(entry);

    return this.createTransaction({
      playerId,
      type: 'LP_EARNED',
      currency: 'LP',
      amount,
      balanceBefore: before,
      balanceAfter: saved.lpBalance,
      description: options.description ?? `Loyalty points from ${source}`,
      referenceId: options.sourceId,
      metadata: { source, pointEntryId: entry.id },
    }, tx);
  }

  private async creditBonus(
    tx: LoyaltyRepositories,
    playerId: string,
    amount: number,
    options: BonusCreditOptions,
  ): Promise<Transaction> {
    const balance = await this.loadBalance(tx, playerId);
    const before = balance.bonusBalance;
    const wageringRequirement = options.wageringRequirement ?? 0;

    const next: WalletBalance = {
      ...balance,
      bonusBalance: before + amount,
      bonusWageringRequired: balance.bonusWageringRequired + wageringRequirement,
      updatedAt: this.now(),
    };
    // Restrictions only change when supplied
    if (options.expiry !== undefined) next.bonusExpiry = options.expiry;
    if (options.maxBet !== undefined) next.bonusMaxBet = options.maxBet;
    if (options.eligibleGames !== undefined) next.bonusEligibleGames = [...options.eligibleGames];
    const saved = await tx.balances.update(next);

    return this.createTransaction({
      playerId,
      type: 'BONUS_ISSUED',
      currency: 'BONUS',
      amount,
      balanceBefore: before,
      balanceAfter: saved.bonusBalance,
      description: options.description ?? 'Bonus balance issued',
      referenceId: options.rewardId,
      metadata: { wageringRequirement },
    }, tx);
  }

  private async creditPlain(
    tx: LoyaltyRepositories,
    playerId: string,
    currency: 'RP' | 'TICKETS',
    amount: number,
    type: TransactionType,
    description: string,
  ): Promise<Transaction> {
    const field = BALANCE_FIELDS[currency];
    const balance = await this.loadBalance(tx, playerId);
    const before = balance[field];
    const next: WalletBalance = { ...balance, updatedAt: this.now() };
    next[field] = before + amount;
    const saved = await tx.balances.update(next);

    return this.createTransaction({
      playerId,
      type,
      currency,
      amount,
      balanceBefore: before,
      balanceAfter: saved[field],
      description,
    }, tx);
  }

  private async debit(
    tx: LoyaltyRepositories,
    playerId: string,
    currency: WalletCurrency,
    amount: number,
    options: DeductOptions,
  ): Promise<Transaction> {
    const field = BALANCE_FIELDS[currency];
    const balance = await this.loadBalance(tx, playerId);
    const available = balance[field];
    if (available < amount) {
      throw new InsufficientBalanceError(playerId, currency, available, amount);
    }

    const next: WalletBalance = { ...balance, updatedAt: this.now() };
    next[field] = available - amount;
    const saved = await tx.balances.update(next);

    let lots: LotConsumption[] = [];
    if (currency === 'LP') {
      lots = await this.consumeLots(tx, playerId, amount);
      await this.verifyLots(tx, playerId, saved.lpBalance);
    }

    return this.createTransaction({
      playerId,
      type: options.type ?? (currency === 'LP' ? 'LP_REDEEMED' : 'BALANCE_DEDUCTED'),
      currency,
      amount: -amount,
      balanceBefore: available,
      balanceAfter: saved[field],
      description: options.description ?? `Deducted ${currency}`,
      referenceId: options.referenceId,
      metadata: lots.length > 0 ? { ...options.metadata, lots } : options.metadata,
    }, tx);
  }

  /** FIFO: oldest issued first, creation order on ties */
  private async consumeLots(tx: LoyaltyRepositories, playerId: string, amount: number): Promise<LotConsumption[]> {
    const lots = await tx.pointEntries.findOpenByPlayer(playerId);
    const consumed: LotConsumption[] = [];
    let left = amount;

    for (const lot of lots) {
      if (left <= 0) break;
      const take = Math.min(lot.remainingAmount, left);
      await tx.pointEntries.update({ ...lot, remainingAmount: lot.remainingAmount - take });
      consumed.push({ entryId: lot.id, consumed: take });
      left -= take;
    }

    if (left > LOT_TOLERANCE) {
      this.log.error('Point lots exhausted before debit was covered', { playerId, requested: amount, uncovered: left });
    }
    return consumed;
  }

  private async verifyLots(tx: LoyaltyRepositories, playerId: string, lpBalance: number): Promise<void> {
    const lots = await tx.pointEntries.findOpenByPlayer(playerId);
    const remaining = sum(lots.map(lot => lot.remainingAmount));
    if (Math.abs(remaining - lpBalance) > LOT_TOLERANCE) {
      this.log.error('Point lots out of balance', { playerId, lotsRemaining: remaining, lpBalance });
    }
  }

  private async runTierHook(playerId: string): Promise<void> {
    if (!this.tierHook) return;
    try {
      const tier = await this.tierHook(playerId);
      this.log.debug('Tier recalculated', { playerId, tier });
    } catch (error) {
      // The credit is committed; a tier failure must not undo it
      this.log.error('Tier update hook failed', { playerId, error: getErrorMessage(error) });
    }
  }
}
