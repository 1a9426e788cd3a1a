/**
 * Tier Service
 *
 * Default TierUpdateHook: classifies by lp_balance against the configured
 * tier table, with optional per-tier requirements.
 */

import { createChildLogger, type Logger } from 'core-service';
import type { Clock, PlayerState, PlayerStateProvider, TierLevel } from '../types.js';
import type { LoyaltyStore } from '../persistence/types.js';
import type { TierDefinition } from '../config.js';
import { evaluateCondition } from './rules-engine/condition.js';
import { playerNotFound } from '../errors.js';

export interface TierServiceDeps {
  store: LoyaltyStore;
  stateProvider: PlayerStateProvider;
  tiers: readonly TierDefinition[];
  now?: Clock;
  logger?: Logger;
}

export class TierService {
  private readonly tiers: TierDefinition[];
  private readonly log: Logger;
  private readonly now: Clock;

  constructor(private readonly deps: TierServiceDeps) {
    this.tiers = [...deps.tiers].sort((a, b) => b.lpMin - a.lpMin);
    this.now = deps.now ?? (() => new Date());
    this.log = deps.logger ?? createChildLogger({ component: 'tier-service' });
  }

  /** Highest tier whose threshold and requirements the state meets */
  calculateTier(state: PlayerState): TierLevel {
    const lp = typeof state.lp_balance === 'number' ? state.lp_balance : 0;
    for (const definition of this.tiers) {
      if (lp < definition.lpMin) continue;
      if (definition.requirements && !evaluateCondition(definition.requirements, state)) continue;
      return definition.tier;
    }
    return 'BRONZE';
  }

  async updatePlayerTier(playerId: string): Promise<TierLevel> {
    const profile = await this.deps.store.players.findById(playerId);
    if (!profile) {
      throw playerNotFound(playerId);
    }

    const state = await this.deps.stateProvider.getPlayerState(playerId);
    const tier = this.calculateTier(state);
    if (tier !== profile.tier) {
      await this.deps.store.players.updateTier(playerId, tier, this.now());
      this.log.info('Player tier changed', { playerId, from: profile.tier, to: tier });
    }
    return tier;
  }

  /** Bound updatePlayerTier, for the wallet's tier hook */
  asHook(): (playerId: string) => Promise<TierLevel> {
    return playerId => this.updatePlayerTier(playerId);
  }
}
