/**
 * Batch Processor
 *
 * evaluate -> create -> (gate) -> issue for many players. One player's
 * failure is recorded and the batch moves on. A run without a correlation id
 * gets a fresh one so its log lines can be grouped.
 */

import {
  createChildLogger,
  generateCorrelationId,
  getCorrelationId,
  getErrorMessage,
  withCorrelationId,
  type Logger,
} from 'core-service';
import type { RulesEngine } from './rules-engine/engine.js';
import type { WalletLedger } from './wallet/wallet-ledger.js';
import type { ProfitSafetyGate } from './safety/profit-safety.js';

export interface BatchOptions {
  /** Rewards per player (default: 1) */
  limit?: number;
  /** Run the profit-safety gate and cancel rejected rewards (default: true) */
  validate?: boolean;
  minRoi?: number;
  /** Issue approved rewards to the wallet (default: true) */
  issue?: boolean;
}

export interface BatchError {
  playerId: string;
  error: string;
}

export interface BatchResult {
  processed: number;
  rewardsCreated: number;
  rewardsIssued: number;
  rewardsRejected: number;
  errors: BatchError[];
}

export interface MaintenanceResult {
  bonusesExpired: number;
  pointLotsExpired: number;
}

export interface BatchProcessorDeps {
  rules: RulesEngine;
  wallet: WalletLedger;
  safety: ProfitSafetyGate;
  logger?: Logger;
}

export class BatchProcessor {
  private readonly log: Logger;

  constructor(private readonly deps: BatchProcessorDeps) {
    this.log = deps.logger ?? createChildLogger({ component: 'batch-processor' });
  }

  async processPlayers(playerIds: readonly string[], options: BatchOptions = {}): Promise<BatchResult> {
    if (!getCorrelationId()) {
      return withCorrelationId(generateCorrelationId(), () => this.processPlayers(playerIds, options));
    }

    const { limit = 1, validate = true, minRoi = 0, issue = true } = options;
    const result: BatchResult = { processed: 0, rewardsCreated: 0, rewardsIssued: 0, rewardsRejected: 0, errors: [] };

    for (const playerId of playerIds) {
      try {
        const rewards = await this.deps.rules.evaluateAndCreateRewards(playerId, limit);
        result.rewardsCreated += rewards.length;

        // Priority order: a reward is judged against the ones already
        // decided, never against lower-priority siblings still waiting.
        for (const [index, reward] of rewards.entries()) {
          if (validate) {
            const undecided = rewards.slice(index + 1).map(next => next.id);
            const verdict = await this.deps.safety.validatePendingReward(reward.id, minRoi, {
              excludeRewardIds: undecided,
            });
            if (!verdict.approved) {
              await this.deps.rules.cancelReward(reward.id, verdict.reason);
              result.rewardsRejected++;
              continue;
            }
          }
          if (issue) {
            await this.deps.wallet.issueReward(reward.id);
            result.rewardsIssued++;
          }
        }
        result.processed++;
      } catch (error) {
        result.errors.push({ playerId, error: getErrorMessage(error) });
        this.log.error('Player processing failed', { playerId, error: getErrorMessage(error) });
      }
    }

    this.log.info('Batch processed', {
      players: playerIds.length,
      processed: result.processed,
      created: result.rewardsCreated,
      issued: result.rewardsIssued,
      rejected: result.rewardsRejected,
      failed: result.errors.length,
    });
    return result;
  }

  async runMaintenance(): Promise<MaintenanceResult> {
    const bonusesExpired = await this.deps.wallet.expireBonuses();
    const pointLotsExpired = await this.deps.wallet.processPointExpiry();
    return { bonusesExpired, pointLotsExpired };
  }
}
