/**
 * Player state provider backed by the stored profile and wallet balance.
 *
 * Field names are the vocabulary of rule conditions and formulas
 * (`net_loss_min`, `total_wagered * 0.01`, ...).
 */

import { daysBetween } from 'core-service';
import type { Clock, PlayerState, PlayerStateProvider } from '../types.js';
import type { LoyaltyRepositories } from '../persistence/types.js';
import { playerNotFound } from '../errors.js';

export function createProfilePlayerStateProvider(
  store: LoyaltyRepositories,
  now: Clock = () => new Date(),
): PlayerStateProvider {
  return {
    async getPlayerState(playerId: string): Promise<PlayerState> {
      const profile = await store.players.findById(playerId);
      if (!profile) {
        throw playerNotFound(playerId);
      }
      const balance = await store.balances.findByPlayer(playerId);
      const { metrics } = profile;

      const state: PlayerState = {
        player_id: profile.playerId,
        segment: profile.segment,
        tier: profile.tier,
        risk_score: profile.riskScore,
        is_active: profile.isActive,
        is_blocked: profile.isBlocked,

        total_deposited: metrics.totalDeposited,
        total_wagered: metrics.totalWagered,
        total_won: metrics.totalWon,
        net_pnl: metrics.netPnl,
        net_loss: Math.max(0, -metrics.netPnl),
        session_count: metrics.totalSessions,
        total_playtime_hours: metrics.totalPlaytimeHours,
        avg_bet_size: metrics.avgBetSize,
        win_loss_ratio: metrics.winLossRatio,
        bonus_abuse_score: metrics.bonusAbuseScore,

        lp_balance: balance?.lpBalance ?? 0,
        rp_balance: balance?.rpBalance ?? 0,
        bonus_balance: balance?.bonusBalance ?? 0,
        tickets_balance: balance?.ticketsBalance ?? 0,
      };

      // Absent (not 0) when the player never deposited
      if (metrics.lastDepositAt) {
        state.days_since_last_deposit = Math.floor(daysBetween(metrics.lastDepositAt, now()));
      }

      return state;
    },
  };
}
