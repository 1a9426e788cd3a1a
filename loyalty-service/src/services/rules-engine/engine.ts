/**
 * Rules Engine
 *
 * Matches player state against configured reward rules, computes reward
 * amounts and records PENDING rewards. Never touches the wallet or the
 * profit-safety gate; issuing is the Wallet Ledger's job.
 */

import { createChildLogger, addHours, generateId, isValidationFailure, type Logger } from 'core-service';
import type {
  Clock,
  PlayerState,
  PlayerStateProvider,
  RewardConfig,
  RewardMetadata,
  RewardRecord,
  RewardRule,
  RuleTestResult,
} from '../../types.js';
import type { LoyaltyStore } from '../../persistence/types.js';
import { LOYALTY_ERRORS } from '../../error-codes.js';
import { ConfigurationError, NotFoundError, StateTransitionError, ValidationFailureError } from '../../errors.js';
import { evaluateCondition } from './condition.js';
import { evaluateFormula, parseLiteral, FormulaEvaluationError } from './formula.js';
import { currencyForRewardType, isRewardType } from './reward-types.js';
import { parseRuleInput } from './rule-schema.js';

export interface RulesEngineDeps {
  store: LoyaltyStore;
  stateProvider: PlayerStateProvider;
  now?: Clock;
  logger?: Logger;
}

/** Numeric fields only; booleans and strings never reach a formula */
function numericVariables(state: PlayerState): Record<string, number> {
  const variables: Record<string, number> = {};
  for (const [key, value] of Object.entries(state)) {
    if (typeof value === 'number') {
      variables[key] = value;
    }
  }
  return variables;
}

/** Stable: equal priorities keep creation order */
function byPriorityDesc(rules: RewardRule[]): RewardRule[] {
  return rules
    .map((rule, index) => ({ rule, index }))
    .sort((a, b) => b.rule.priority - a.rule.priority || a.index - b.index)
    .map(entry => entry.rule);
}

export class RulesEngine {
  private readonly store: LoyaltyStore;
  private readonly stateProvider: PlayerStateProvider;
  private readonly now: Clock;
  private readonly log: Logger;

  constructor(deps: RulesEngineDeps) {
    this.store = deps.store;
    this.stateProvider = deps.stateProvider;
    this.now = deps.now ?? (() => new Date());
    this.log = deps.logger ?? createChildLogger({ component: 'rules-engine' });
  }

  // ═══════════════════════════════════════════════════════════════════
  // Evaluation
  // ═══════════════════════════════════════════════════════════════════

  evaluateRule(rule: RewardRule, state: PlayerState): boolean {
    if (!rule.isActive) {
      return false;
    }
    return evaluateCondition(rule.conditions, state);
  }

  /**
   * Literal formulas return their value; anything else is evaluated over the
   * numeric state fields. A formula that cannot be evaluated yields 0.
   */
  calculateRewardAmount(rule: RewardRule, state: PlayerState): number {
    const { formula } = rule.rewardConfig;
    const literal = parseLiteral(formula);
    if (literal !== null) {
      return literal;
    }

    try {
      return evaluateFormula(formula, numericVariables(state));
    } catch (error) {
      if (error instanceof FormulaEvaluationError) {
        this.log.warn('Formula evaluation failed', { ruleId: rule.ruleId, formula, error: error.message });
        return 0;
      }
      throw error;
    }
  }

  applyCaps(amount: number, rewardConfig: RewardConfig): number {
    if (rewardConfig.maxAmount !== undefined && amount > rewardConfig.maxAmount) {
      return rewardConfig.maxAmount;
    }
    return amount;
  }

  /**
   * Active rules matching the player, highest priority first.
   * State is fetched from the provider when not supplied.
   */
  async getApplicableRules(playerId: string, state?: PlayerState): Promise<RewardRule[]> {
    const playerState = state ?? await this.stateProvider.getPlayerState(playerId);
    const rules = byPriorityDesc(await this.store.rules.findAll({ activeOnly: true }));
    return rules.filter(rule => this.evaluateRule(rule, playerState));
  }

  // ═══════════════════════════════════════════════════════════════════
  // Reward Creation
  // ═══════════════════════════════════════════════════════════════════

  async createReward(playerId: string, rule: RewardRule, amount: number, state: PlayerState): Promise<RewardRecord> {
    const { rewardConfig } = rule;
    if (!isRewardType(rewardConfig.type)) {
      throw new ConfigurationError(
        LOYALTY_ERRORS.UnknownRewardType,
        `Rule ${rule.ruleId} has unknown reward type "${rewardConfig.type}"`,
        { ruleId: rule.ruleId, rewardType: rewardConfig.type },
      );
    }

    const issuedAt = this.now();
    const metadata: RewardMetadata = { ruleName: rule.name };
    if (typeof state.segment === 'string') metadata.playerSegment = state.segment;
    if (typeof state.tier === 'string') metadata.playerTier = state.tier;
    if (rewardConfig.eligibleGames) metadata.eligibleGames = [...rewardConfig.eligibleGames];
    if (rewardConfig.maxBet !== undefined) metadata.maxBet = rewardConfig.maxBet;

    const reward: RewardRecord = {
      id: generateId(),
      playerId,
      ruleId: rule.ruleId,
      rewardType: rewardConfig.type,
      currencyType: currencyForRewardType(rewardConfig.type),
      amount,
      status: 'PENDING',
      wageringRequired: amount * (rewardConfig.wageringRequirement ?? 0),
      wageringCompleted: 0,
      issuedAt,
      metadata,
    };
    if (rewardConfig.expiryHours !== undefined) {
      reward.expiresAt = addHours(issuedAt, rewardConfig.expiryHours);
    }

    await this.store.rewards.insert(reward);

    this.log.info('Reward created', {
      rewardId: reward.id,
      playerId,
      ruleId: rule.ruleId,
      rewardType: reward.rewardType,
      amount,
    });

    return reward;
  }

  /**
   * Evaluate the player once and create rewards for the top `limit` matching
   * rules. Rules whose capped amount is not positive are skipped.
   */
  async evaluateAndCreateRewards(playerId: string, limit = 1): Promise<RewardRecord[]> {
    const state = await this.stateProvider.getPlayerState(playerId);
    const rules = (await this.getApplicableRules(playerId, state)).slice(0, Math.max(0, limit));

    const rewards: RewardRecord[] = [];
    for (const rule of rules) {
      const amount = this.applyCaps(this.calculateRewardAmount(rule, state), rule.rewardConfig);
      if (amount <= 0) {
        this.log.warn('Skipping rule with non-positive reward amount', { playerId, ruleId: rule.ruleId, amount });
        continue;
      }
      rewards.push(await this.createReward(playerId, rule, amount, state));
    }

    this.log.debug('Rules evaluated', { playerId, matched: rules.length, created: rewards.length });
    return rewards;
  }

  // ═══════════════════════════════════════════════════════════════════
  // Rule Administration
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Validate and upsert a rule. An existing rule keeps its createdAt.
   */
  async saveRule(input: unknown): Promise<RewardRule> {
    const parsed = parseRuleInput(input);
    if (isValidationFailure(parsed)) {
      throw new ValidationFailureError(LOYALTY_ERRORS.InvalidRule, `Invalid rule: ${parsed.errors.join('; ')}`, {
        errors: parsed.errors,
      });
    }

    const now = this.now();
    const existing = await this.store.rules.findById(parsed.ruleId);
    const rule: RewardRule = {
      ...parsed,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    await this.store.rules.save(rule);

    this.log.info(existing ? 'Rule updated' : 'Rule created', { ruleId: rule.ruleId, priority: rule.priority });
    return rule;
  }

  async getRule(ruleId: string): Promise<RewardRule> {
    const rule = await this.store.rules.findById(ruleId);
    if (!rule) {
      throw new NotFoundError(LOYALTY_ERRORS.RuleNotFound, `Rule ${ruleId} not found`, { ruleId });
    }
    return rule;
  }

  /** All rules, highest priority first */
  async listRules(options: { activeOnly?: boolean } = {}): Promise<RewardRule[]> {
    return byPriorityDesc(await this.store.rules.findAll(options));
  }

  async deactivateRule(ruleId: string): Promise<RewardRule> {
    const rule = await this.getRule(ruleId);
    if (!rule.isActive) {
      return rule;
    }
    const updated: RewardRule = { ...rule, isActive: false, updatedAt: this.now() };
    await this.store.rules.save(updated);
    this.log.info('Rule deactivated', { ruleId });
    return updated;
  }

  /**
   * Dry run: does the rule match the player, and for how much. Creates nothing.
   */
  async testRule(ruleId: string, playerId: string): Promise<RuleTestResult> {
    const rule = await this.getRule(ruleId);
    const playerState = await this.stateProvider.getPlayerState(playerId);
    const matches = this.evaluateRule(rule, playerState);
    const rewardAmount = matches
      ? this.applyCaps(this.calculateRewardAmount(rule, playerState), rule.rewardConfig)
      : 0;
    return { matches, rewardAmount, playerState };
  }

  // ═══════════════════════════════════════════════════════════════════
  // Reward Queries & Cancellation
  // ═══════════════════════════════════════════════════════════════════

  async getReward(rewardId: string): Promise<RewardRecord> {
    const reward = await this.store.rewards.findById(rewardId);
    if (!reward) {
      throw new NotFoundError(LOYALTY_ERRORS.RewardNotFound, `Reward ${rewardId} not found`, { rewardId });
    }
    return reward;
  }

  /** Newest first */
  async listRewards(playerId: string): Promise<RewardRecord[]> {
    return this.store.rewards.findByPlayer(playerId);
  }

  /**
   * PENDING -> CANCELLED. Any other status is a state transition error.
   */
  async cancelReward(rewardId: string, reason: string): Promise<RewardRecord> {
    const reward = await this.getReward(rewardId);
    const cancelledAt = this.now();

    const changed = reward.status === 'PENDING' && await this.store.rewards.transitionStatus(
      rewardId,
      'PENDING',
      'CANCELLED',
      { cancelledAt, metadata: { ...reward.metadata, cancelReason: reason } },
    );
    if (!changed) {
      const current = await this.getReward(rewardId);
      throw new StateTransitionError(rewardId, current.status, 'CANCELLED');
    }

    this.log.info('Reward cancelled', { rewardId, playerId: reward.playerId, reason });
    return this.getReward(rewardId);
  }
}
