import { addDays, addHours, subscribeToLogs, type LogEntry } from 'core-service';
import { createLoyaltyService, resolveConfig, type ConfigOverrides, type LoyaltyService } from '../../src/index.js';
import type { PlayerMetrics, PlayerProfile, RewardRecord, RewardRule, TierUpdateHook } from '../../src/types.js';
import { MemoryLoyaltyStore } from './memory-store.js';

export const START = new Date('2026-03-02T12:00:00.000Z');

/** Manually advanced clock */
export class TestClock {
  private current: Date;

  constructor(start: Date = START) {
    this.current = new Date(start);
  }

  now = (): Date => new Date(this.current);

  advanceHours(hours: number): void {
    this.current = addHours(this.current, hours);
  }

  advanceDays(days: number): void {
    this.current = addDays(this.current, days);
  }
}

export function makeProfile(
  playerId: string,
  overrides: Partial<Omit<PlayerProfile, 'playerId' | 'metrics'>> & { metrics?: Partial<PlayerMetrics> } = {},
): PlayerProfile {
  const { metrics, ...rest } = overrides;
  return {
    playerId,
    segment: 'LOSING',
    tier: 'BRONZE',
    riskScore: 0,
    isBlocked: false,
    isActive: true,
    createdAt: START,
    updatedAt: START,
    ...rest,
    metrics: {
      totalDeposited: 0,
      totalWagered: 0,
      totalWon: 0,
      netPnl: 0,
      totalSessions: 0,
      totalPlaytimeHours: 0,
      avgBetSize: 0,
      winLossRatio: 0,
      bonusAbuseScore: 0,
      ...metrics,
    },
  };
}

export function makeRule(ruleId: string, overrides: Partial<Omit<RewardRule, 'ruleId'>> = {}): RewardRule {
  return {
    ruleId,
    name: `Rule ${ruleId}`,
    priority: 0,
    isActive: true,
    conditions: {},
    rewardConfig: { type: 'LOYALTY_POINTS', formula: '10' },
    createdAt: START,
    updatedAt: START,
    ...overrides,
  };
}

export function makeReward(id: string, playerId: string, overrides: Partial<Omit<RewardRecord, 'id' | 'playerId'>> = {}): RewardRecord {
  return {
    id,
    playerId,
    ruleId: 'rule-1',
    rewardType: 'BONUS_BALANCE',
    currencyType: 'BONUS',
    amount: 100,
    status: 'ACTIVE',
    wageringRequired: 0,
    wageringCompleted: 0,
    issuedAt: START,
    metadata: { ruleName: 'Rule 1' },
    ...overrides,
  };
}

export interface TestContext {
  store: MemoryLoyaltyStore;
  clock: TestClock;
  service: LoyaltyService;
}

export function createTestContext(
  options: { config?: ConfigOverrides; tierHook?: TierUpdateHook | null } = {},
): TestContext {
  const store = new MemoryLoyaltyStore();
  const clock = new TestClock();
  const service = createLoyaltyService({
    store,
    config: resolveConfig(options.config),
    now: clock.now,
    tierHook: options.tierHook === undefined ? null : options.tierHook,
  });
  return { store, clock, service };
}

/** Collect log entries until the returned stop function is called */
export function captureLogs(): { entries: LogEntry[]; stop: () => void } {
  const entries: LogEntry[] = [];
  const stop = subscribeToLogs(entry => {
    entries.push(entry);
  });
  return { entries, stop };
}
