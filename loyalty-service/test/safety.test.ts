import { describe, it, expect, beforeEach } from 'vitest';
import { START, createTestContext, makeProfile, makeReward, type TestContext } from './support/fixtures.js';

const PLAYER = 'player-1';

describe('ProfitSafetyGate', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = createTestContext();
    await ctx.store.players.save(makeProfile(PLAYER, { segment: 'LOSING' }));
  });

  // ═══════════════════════════════════════════════════════════════════
  // LOOKUPS
  // ═══════════════════════════════════════════════════════════════════

  describe('lookups', () => {
    it('should use the configured house edge per game', () => {
      expect(ctx.service.safety.getHouseEdge('roulette')).toBe(0.027);
      expect(ctx.service.safety.getHouseEdge('blackjack')).toBe(0.005);
    });

    it('should fall back to the default house edge', () => {
      expect(ctx.service.safety.getHouseEdge('crash')).toBe(0.05);
      expect(ctx.service.safety.getHouseEdge()).toBe(0.05);
      expect(ctx.service.safety.getHouseEdge('toString')).toBe(0.05);
    });

    it('should default the retention multiplier to 1', () => {
      expect(ctx.service.safety.getRetentionMultiplier('VIP', 'CASHBACK')).toBe(1.4);
      expect(ctx.service.safety.getRetentionMultiplier('LOSING', 'TICKETS')).toBe(1);
      expect(ctx.service.safety.getRetentionMultiplier('UNKNOWN', 'CASHBACK')).toBe(1);
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // EXPECTED VALUE
  // ═══════════════════════════════════════════════════════════════════

  describe('calculateExpectedFutureWager', () => {
    beforeEach(async () => {
      await ctx.service.wallet.recordWager(PLAYER, 600);
      ctx.clock.advanceDays(15);
      await ctx.service.wallet.recordWager(PLAYER, 400);
    });

    it('should project the lookback average over 30 days', async () => {
      expect(await ctx.service.safety.calculateExpectedFutureWager(PLAYER)).toBe(1000);
      expect(await ctx.service.safety.calculateExpectedFutureWager(PLAYER, 10)).toBe(1200);
    });

    it('should return 0 for a non-positive lookback', async () => {
      expect(await ctx.service.safety.calculateExpectedFutureWager(PLAYER, 0)).toBe(0);
    });
  });

  describe('calculateExpectedValue', () => {
    it('should reject a bonus that costs more than it earns', async () => {
      await ctx.service.wallet.recordWager(PLAYER, 1000);

      const ev = await ctx.service.safety.calculateExpectedValue(PLAYER, 100, 'BONUS_BALANCE');

      expect(ev).toEqual({
        baseWager: 1000,
        retentionMultiplier: 1.8,
        expectedWager: 1800,
        houseEdge: 0.05,
        expectedRevenue: 90,
        rewardCost: 100,
        expectedProfit: -10,
        roiPercent: -10,
      });
    });

    it('should fail for an unknown player', async () => {
      await expect(ctx.service.safety.calculateExpectedValue('ghost', 10, 'CASHBACK')).rejects.toThrow('Player ghost not found');
    });
  });

  describe('validateRewardProfitability', () => {
    beforeEach(async () => {
      await ctx.service.wallet.recordWager(PLAYER, 1000);
    });

    it('should report a negative expected profit', async () => {
      expect(await ctx.service.safety.validateRewardProfitability(PLAYER, 100, 'BONUS_BALANCE')).toEqual({
        approved: false,
        reason: 'Negative expected profit: -10.00',
      });
    });

    it('should compare ROI with the minimum', async () => {
      // 1000 * 1.2 * 0.05 = 60 revenue against a 50 cost
      expect(await ctx.service.safety.validateRewardProfitability(PLAYER, 50, 'LOYALTY_POINTS', 25)).toEqual({
        approved: false,
        reason: 'ROI 20.0% below minimum 25%',
      });
      expect(await ctx.service.safety.validateRewardProfitability(PLAYER, 50, 'LOYALTY_POINTS', 20)).toEqual({
        approved: true,
        reason: 'Profitable',
      });
    });

    it('should turn lookup failures into a rejection', async () => {
      expect(await ctx.service.safety.validateRewardProfitability('ghost', 50, 'CASHBACK')).toEqual({
        approved: false,
        reason: 'Validation error: Player ghost not found',
      });
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // CAPS
  // ═══════════════════════════════════════════════════════════════════

  describe('caps', () => {
    beforeEach(async () => {
      // Expected revenue 100000 * 1.8 * 0.05 = 9000 keeps every amount below profitable
      await ctx.service.wallet.recordWager(PLAYER, 100000);
      await ctx.store.rewards.insert(makeReward('earlier', PLAYER, { amount: 950 }));
    });

    it('should reject an amount that pushes the daily total over the cap', async () => {
      expect(await ctx.service.safety.checkRewardCaps(PLAYER, 100, 'daily')).toEqual({
        approved: false,
        reason: 'Daily cap exceeded: 1050.00 > 1000.00',
      });
      expect(await ctx.service.safety.validateReward(PLAYER, 100, 'BONUS_BALANCE')).toEqual({
        approved: false,
        reason: 'Daily cap exceeded: 1050.00 > 1000.00',
      });
    });

    it('should allow reaching the cap exactly', async () => {
      expect(await ctx.service.safety.checkRewardCaps(PLAYER, 50, 'daily')).toEqual({
        approved: true,
        reason: 'Within daily cap',
      });
      expect(await ctx.service.safety.validateReward(PLAYER, 50, 'BONUS_BALANCE')).toEqual({
        approved: true,
        reason: 'All validations passed',
      });
    });

    it('should ignore cancelled rewards', async () => {
      await ctx.store.rewards.insert(makeReward('cancelled', PLAYER, { amount: 500, status: 'CANCELLED' }));

      expect((await ctx.service.safety.checkRewardCaps(PLAYER, 50, 'daily')).approved).toBe(true);
    });

    it('should only count rewards inside the trailing window', async () => {
      ctx.clock.advanceDays(2);

      expect((await ctx.service.safety.checkRewardCaps(PLAYER, 100, 'daily')).approved).toBe(true);
      expect(await ctx.service.safety.checkRewardCaps(PLAYER, 4100, 'weekly')).toEqual({
        approved: false,
        reason: 'Weekly cap exceeded: 5050.00 > 5000.00',
      });
    });

    it('should report profitability failures before caps', async () => {
      expect(await ctx.service.safety.validateReward(PLAYER, 9500, 'BONUS_BALANCE')).toEqual({
        approved: false,
        reason: 'Profitability check failed: Negative expected profit: -500.00',
      });
    });
  });

  describe('validatePendingReward', () => {
    beforeEach(async () => {
      await ctx.service.wallet.recordWager(PLAYER, 100000);
      await ctx.store.rewards.insert(makeReward('pending', PLAYER, { amount: 950, status: 'PENDING', issuedAt: START }));
    });

    it('should leave the reward out of its own cap sums', async () => {
      expect(await ctx.service.safety.validatePendingReward('pending')).toEqual({
        approved: true,
        reason: 'All validations passed',
      });
    });

    it('should still count the player\'s other rewards', async () => {
      await ctx.store.rewards.insert(makeReward('other', PLAYER, { amount: 100 }));

      expect(await ctx.service.safety.validatePendingReward('pending')).toEqual({
        approved: false,
        reason: 'Daily cap exceeded: 1050.00 > 1000.00',
      });
    });

    it('should raise NotFound for an unknown reward', async () => {
      await expect(ctx.service.safety.validatePendingReward('missing')).rejects.toMatchObject({
        code: 'MSLoyaltyRewardNotFound',
      });
    });
  });
});
