/**
 * Abuse Scorer
 *
 * Detectors read the transaction journal, rewards and the player profile.
 * Signals accumulate until resolved; the score is the capped sum of their
 * severities. This component classifies only. Enforcement of the penalty
 * happens through the rule conditions evaluated against player state.
 */

import { createChildLogger, addHours, generateId, sum, type Logger } from 'core-service';
import type { AbuseSignal, Clock, PenaltyAction, SignalType } from '../../types.js';
import type { LoyaltyConfig } from '../../config.js';
import type { LoyaltyStore } from '../../persistence/types.js';
import { LOYALTY_ERRORS } from '../../error-codes.js';
import { NotFoundError, playerNotFound } from '../../errors.js';

const MAX_SCORE = 100;
const SCORE_PER_SEVERITY = 10;

export interface AbuseScorerDeps {
  store: LoyaltyStore;
  config: LoyaltyConfig;
  now?: Clock;
  logger?: Logger;
}

export interface PenaltyResult {
  score: number;
  action: PenaltyAction;
}

export class AbuseScorer {
  private readonly store: LoyaltyStore;
  private readonly abuse: LoyaltyConfig['abuse'];
  private readonly now: Clock;
  private readonly log: Logger;

  constructor(deps: AbuseScorerDeps) {
    this.store = deps.store;
    this.abuse = deps.config.abuse;
    this.now = deps.now ?? (() => new Date());
    this.log = deps.logger ?? createChildLogger({ component: 'abuse-scorer' });
  }

  // ═══════════════════════════════════════════════════════════════════
  // Detectors
  // ═══════════════════════════════════════════════════════════════════

  /** Received rewards but never deposited */
  async detectBonusOnlyPlay(playerId: string): Promise<boolean> {
    const rewarded = await this.store.rewards.sumAmount(playerId);
    if (rewarded <= 0) {
      return false;
    }
    const deposited = await this.store.transactions.sumAmount(playerId, 'DEPOSIT');
    return deposited === 0;
  }

  /** A withdrawal at or after a reward issued inside the trailing window */
  async detectImmediateWithdrawal(playerId: string, hours = this.abuse.immediateWithdrawalHours): Promise<boolean> {
    const since = addHours(this.now(), -hours);
    const rewards = await this.store.rewards.findByPlayer(playerId, { since, includeCancelled: false });
    if (rewards.length === 0) {
      return false;
    }

    const firstReward = Math.min(...rewards.map(reward => reward.issuedAt.getTime()));
    const withdrawals = await this.store.transactions.findByPlayer(playerId, { types: ['WITHDRAWAL'], since });
    return withdrawals.some(row => row.createdAt.getTime() >= firstReward);
  }

  /** Largest recent bet over `betMaxRatio` times the smallest */
  async detectBetManipulation(playerId: string): Promise<boolean> {
    const wagers = await this.store.transactions.findByPlayer(playerId, {
      types: ['WAGER'],
      limit: this.abuse.betSampleSize,
    });
    if (wagers.length < this.abuse.betMinSamples) {
      return false;
    }

    const bets = wagers.map(row => Math.abs(row.amount));
    const min = Math.min(...bets);
    const max = Math.max(...bets);
    return min > 0 && max / min > this.abuse.betMaxRatio;
  }

  /** Winning more than `winRateMaxRatio` of the amount wagered, over a minimum volume */
  async detectAbnormalWinRate(playerId: string): Promise<boolean> {
    const profile = await this.store.players.findById(playerId);
    if (!profile) {
      return false;
    }
    const { totalWagered, totalWon } = profile.metrics;
    if (totalWagered < this.abuse.winRateMinWagered || totalWagered <= 0) {
      return false;
    }
    return totalWon / totalWagered > this.abuse.winRateMaxRatio;
  }

  /**
   * Run every detector and record a signal for each hit. A type that already
   * has an unresolved signal is not recorded again.
   *
   * @returns the signals created by this pass
   */
  async detectAbuseSignals(playerId: string): Promise<AbuseSignal[]> {
    const detections: Array<[SignalType, () => Promise<boolean>, string]> = [
      ['BONUS_ONLY_PLAY', () => this.detectBonusOnlyPlay(playerId), 'Rewards received without any deposit'],
      [
        'IMMEDIATE_WITHDRAWAL',
        () => this.detectImmediateWithdrawal(playerId),
        `Withdrawal within ${this.abuse.immediateWithdrawalHours}h of a reward`,
      ],
      ['BET_MANIPULATION', () => this.detectBetManipulation(playerId), 'Bet size swings across recent wagers'],
      ['ABNORMAL_WIN_RATE', () => this.detectAbnormalWinRate(playerId), 'Win rate above expected range'],
    ];

    const open = new Set((await this.store.signals.findByPlayer(playerId, { unresolvedOnly: true })).map(s => s.signalType));
    const created: AbuseSignal[] = [];

    for (const [signalType, detect, description] of detections) {
      if (!(await detect())) continue;
      if (open.has(signalType)) {
        this.log.debug('Signal already open', { playerId, signalType });
        continue;
      }
      created.push(await this.createSignal(playerId, signalType, description));
    }

    if (created.length > 0) {
      this.log.warn('Abuse signals detected', { playerId, signals: created.map(s => s.signalType) });
    }
    return created;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Scoring & Penalties
  // ═══════════════════════════════════════════════════════════════════

  /** 0..100 over unresolved signals */
  async calculateAbuseScore(playerId: string): Promise<number> {
    const signals = await this.store.signals.findByPlayer(playerId, { unresolvedOnly: true });
    const severity = sum(signals.map(signal => signal.severity));
    return Math.min(severity * SCORE_PER_SEVERITY, MAX_SCORE);
  }

  classifyScore(score: number): PenaltyAction {
    const { thresholds } = this.abuse;
    if (score >= thresholds.blocked) return 'BLOCKED';
    if (score >= thresholds.increasedWagering) return 'INCREASED_WAGERING';
    if (score >= thresholds.reducedRewards) return 'REDUCED_REWARDS';
    return 'NO_ACTION';
  }

  /**
   * Persist the current score as the player's risk score and classify it.
   * Blocking sets isBlocked; lower bands leave it unchanged.
   */
  async applyAbusePenalty(playerId: string): Promise<PenaltyResult> {
    const profile = await this.store.players.findById(playerId);
    if (!profile) {
      throw playerNotFound(playerId);
    }

    const score = await this.calculateAbuseScore(playerId);
    const action = this.classifyScore(score);
    await this.store.players.updateRisk(
      playerId,
      action === 'BLOCKED' ? { riskScore: score, isBlocked: true } : { riskScore: score },
      this.now(),
    );

    if (action !== 'NO_ACTION') {
      this.log.warn('Abuse penalty applied', { playerId, score, action });
    }
    return { score, action };
  }

  // ═══════════════════════════════════════════════════════════════════
  // Manual Review
  // ═══════════════════════════════════════════════════════════════════

  async flagForReview(playerId: string, reason: string): Promise<AbuseSignal> {
    const signal = await this.createSignal(playerId, 'MANUAL_REVIEW_REQUIRED', `Flagged for manual review: ${reason}`);
    this.log.error('Player flagged for manual review', { playerId, reason, signalId: signal.id });
    return signal;
  }

  async resolveSignal(signalId: string): Promise<AbuseSignal> {
    const signal = await this.store.signals.findById(signalId);
    if (!signal) {
      throw new NotFoundError(LOYALTY_ERRORS.SignalNotFound, `Signal ${signalId} not found`, { signalId });
    }
    if (signal.isResolved) {
      return signal;
    }

    const resolvedAt = this.now();
    await this.store.signals.markResolved(signalId, resolvedAt);
    this.log.info('Signal resolved', { signalId, playerId: signal.playerId, signalType: signal.signalType });
    return { ...signal, isResolved: true, resolvedAt };
  }

  async getSignals(playerId: string, options: { unresolvedOnly?: boolean } = {}): Promise<AbuseSignal[]> {
    return this.store.signals.findByPlayer(playerId, options);
  }

  private async createSignal(playerId: string, signalType: SignalType, description: string): Promise<AbuseSignal> {
    const signal: AbuseSignal = {
      id: generateId(),
      playerId,
      signalType,
      severity: this.abuse.severities[signalType],
      description,
      metadata: {},
      isResolved: false,
      detectedAt: this.now(),
    };
    await this.store.signals.insert(signal);
    return signal;
  }
}
