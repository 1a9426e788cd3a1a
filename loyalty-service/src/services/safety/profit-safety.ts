/**
 * Profit-Safety Gate
 *
 * Approves a candidate reward when its expected value is not negative and
 * the player's trailing reward totals stay within the period caps.
 * Outcomes are returned as { approved, reason }, never thrown.
 */

import { createChildLogger, addDays, getErrorMessage, type Logger } from 'core-service';
import type { CapPeriod, Clock, ExpectedValue, ValidationResult } from '../../types.js';
import type { LoyaltyConfig } from '../../config.js';
import type { LoyaltyStore } from '../../persistence/types.js';
import { LOYALTY_ERRORS } from '../../error-codes.js';
import { NotFoundError, playerNotFound } from '../../errors.js';

/** Days in the projection horizon of calculateExpectedFutureWager */
const PROJECTION_DAYS = 30;

export const CAP_WINDOW_DAYS: Record<CapPeriod, number> = {
  daily: 1,
  weekly: 7,
  monthly: 30,
};

const CAP_ORDER: readonly CapPeriod[] = ['daily', 'weekly', 'monthly'];

export interface ProfitSafetyDeps {
  store: LoyaltyStore;
  config: LoyaltyConfig;
  now?: Clock;
  logger?: Logger;
}

export interface CapOptions {
  /** Stored rewards to leave out of the window sums */
  excludeRewardIds?: readonly string[];
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export class ProfitSafetyGate {
  private readonly store: LoyaltyStore;
  private readonly safety: LoyaltyConfig['safety'];
  private readonly now: Clock;
  private readonly log: Logger;

  constructor(deps: ProfitSafetyDeps) {
    this.store = deps.store;
    this.safety = deps.config.safety;
    this.now = deps.now ?? (() => new Date());
    this.log = deps.logger ?? createChildLogger({ component: 'profit-safety' });
  }

  // ═══════════════════════════════════════════════════════════════════
  // Expected Value
  // ═══════════════════════════════════════════════════════════════════

  getHouseEdge(gameType?: string): number {
    if (gameType !== undefined && Object.prototype.hasOwnProperty.call(this.safety.houseEdges, gameType)) {
      return this.safety.houseEdges[gameType];
    }
    return this.safety.defaultHouseEdge;
  }

  /**
   * Recent daily wager average projected over the next 30 days.
   */
  async calculateExpectedFutureWager(playerId: string, lookbackDays = this.safety.lookbackDays): Promise<number> {
    if (lookbackDays <= 0) {
      return 0;
    }
    const since = addDays(this.now(), -lookbackDays);
    const wagered = await this.store.transactions.sumAmount(playerId, 'WAGER', since);
    return (wagered * PROJECTION_DAYS) / lookbackDays;
  }

  getRetentionMultiplier(segment: string, rewardType: string): number {
    return this.safety.retentionMultipliers[segment]?.[rewardType] ?? 1.0;
  }

  async calculateExpectedValue(
    playerId: string,
    rewardAmount: number,
    rewardType: string,
    gameType?: string,
  ): Promise<ExpectedValue> {
    const profile = await this.store.players.findById(playerId);
    if (!profile) {
      throw playerNotFound(playerId);
    }

    const baseWager = await this.calculateExpectedFutureWager(playerId);
    const retentionMultiplier = this.getRetentionMultiplier(profile.segment, rewardType);
    const houseEdge = this.getHouseEdge(gameType);

    const expectedWager = baseWager * retentionMultiplier;
    const expectedRevenue = expectedWager * houseEdge;
    const expectedProfit = expectedRevenue - rewardAmount;
    const roiPercent = rewardAmount === 0 ? 0 : (expectedProfit * 100) / rewardAmount;

    return {
      baseWager,
      retentionMultiplier,
      expectedWager,
      houseEdge,
      expectedRevenue,
      rewardCost: rewardAmount,
      expectedProfit,
      roiPercent,
    };
  }

  // ═══════════════════════════════════════════════════════════════════
  // Validation
  // ═══════════════════════════════════════════════════════════════════

  async validateRewardProfitability(
    playerId: string,
    amount: number,
    rewardType: string,
    minRoi = 0,
    gameType?: string,
  ): Promise<ValidationResult> {
    let ev: ExpectedValue;
    try {
      ev = await this.calculateExpectedValue(playerId, amount, rewardType, gameType);
    } catch (error) {
      return { approved: false, reason: `Validation error: ${getErrorMessage(error)}` };
    }

    if (ev.expectedProfit < 0) {
      return { approved: false, reason: `Negative expected profit: ${ev.expectedProfit.toFixed(2)}` };
    }
    if (ev.roiPercent < minRoi) {
      return { approved: false, reason: `ROI ${ev.roiPercent.toFixed(1)}% below minimum ${minRoi}%` };
    }
    return { approved: true, reason: 'Profitable' };
  }

  /**
   * Reject when rewards issued in the trailing window plus `amount` exceed
   * the period cap. Cancelled rewards do not count.
   */
  async checkRewardCaps(
    playerId: string,
    amount: number,
    period: CapPeriod,
    options: CapOptions = {},
  ): Promise<ValidationResult> {
    const cap = this.safety.caps[period];
    const since = addDays(this.now(), -CAP_WINDOW_DAYS[period]);
    const issued = await this.store.rewards.sumAmount(playerId, { since, excludeIds: options.excludeRewardIds });
    const total = issued + amount;

    if (total > cap) {
      return { approved: false, reason: `${capitalize(period)} cap exceeded: ${total.toFixed(2)} > ${cap.toFixed(2)}` };
    }
    return { approved: true, reason: `Within ${period} cap` };
  }

  /**
   * Profitability, then the daily, weekly and monthly caps. First failure wins.
   */
  async validateReward(
    playerId: string,
    amount: number,
    rewardType: string,
    minRoi = 0,
    options: CapOptions = {},
  ): Promise<ValidationResult> {
    const profitability = await this.validateRewardProfitability(playerId, amount, rewardType, minRoi);
    if (!profitability.approved) {
      this.log.info('Reward rejected', { playerId, amount, rewardType, reason: profitability.reason });
      return { approved: false, reason: `Profitability check failed: ${profitability.reason}` };
    }

    for (const period of CAP_ORDER) {
      const result = await this.checkRewardCaps(playerId, amount, period, options);
      if (!result.approved) {
        this.log.info('Reward rejected', { playerId, amount, rewardType, reason: result.reason });
        return result;
      }
    }

    return { approved: true, reason: 'All validations passed' };
  }

  /**
   * validateReward for a stored reward, which is left out of its own cap
   * sums. `excludeRewardIds` leaves out other rewards not yet judged.
   */
  async validatePendingReward(
    rewardId: string,
    minRoi = 0,
    options: CapOptions = {},
  ): Promise<ValidationResult> {
    const reward = await this.store.rewards.findById(rewardId);
    if (!reward) {
      throw new NotFoundError(LOYALTY_ERRORS.RewardNotFound, `Reward ${rewardId} not found`, { rewardId });
    }
    return this.validateReward(reward.playerId, reward.amount, reward.rewardType, minRoi, {
      excludeRewardIds: [reward.id, ...(options.excludeRewardIds ?? [])],
    });
  }
}
