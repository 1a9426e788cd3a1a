import { describe, it, expect, beforeEach } from 'vitest';
import {
  ConcurrentModificationError,
  InsufficientBalanceError,
  NotImplementedError,
  RuleInactiveError,
  StateTransitionError,
  TierRequirementNotMetError,
  ValidationFailureError,
  type RedemptionRule,
  type RewardRecord,
} from '../src/index.js';
import { START, captureLogs, createTestContext, makeProfile, type TestContext } from './support/fixtures.js';

const PLAYER = 'player-1';

function pendingReward(id: string, overrides: Partial<RewardRecord> = {}): RewardRecord {
  return {
    id,
    playerId: PLAYER,
    ruleId: 'rule-1',
    rewardType: 'LOYALTY_POINTS',
    currencyType: 'LP',
    amount: 100,
    status: 'PENDING',
    wageringRequired: 0,
    wageringCompleted: 0,
    issuedAt: START,
    metadata: { ruleName: 'Rule 1' },
    ...overrides,
  };
}

function bonusReward(id: string): RewardRecord {
  return pendingReward(id, {
    rewardType: 'BONUS_BALANCE',
    currencyType: 'BONUS',
    amount: 50,
    wageringRequired: 500,
    expiresAt: new Date('2026-03-05T12:00:00.000Z'),
    metadata: { ruleName: 'Rule 1', eligibleGames: ['slots'], maxBet: 5 },
  });
}

const CASH_REDEMPTION: RedemptionRule = {
  id: 'cash-10',
  name: 'Cash 10',
  isActive: true,
  lpCost: 1000,
  currencyValue: 10,
  targetBalance: 'CASH',
  minLpBalance: 1000,
  maxRedemptionsPerMonth: 2,
};

describe('WalletLedger', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = createTestContext();
    await ctx.store.players.save(makeProfile(PLAYER));
  });

  // ═══════════════════════════════════════════════════════════════════
  // CREDITS
  // ═══════════════════════════════════════════════════════════════════

  describe('credits', () => {
    it('should credit loyalty points with a lot and a journal row', async () => {
      const tx = await ctx.service.wallet.addLoyaltyPoints(PLAYER, 100, 'PLAY');

      const [lot] = await ctx.service.wallet.getPointEntries(PLAYER);
      expect(lot).toMatchObject({ amount: 100, remainingAmount: 100, source: 'PLAY', isExpired: false, issuedAt: START });
      expect(lot.expiresAt).toBeUndefined();
      expect(tx).toMatchObject({
        type: 'LP_EARNED',
        currency: 'LP',
        amount: 100,
        balanceBefore: 0,
        balanceAfter: 100,
        description: 'Loyalty points from PLAY',
        metadata: { source: 'PLAY', pointEntryId: lot.id },
      });
      expect((await ctx.service.wallet.getBalance(PLAYER)).lpBalance).toBe(100);
    });

    it('should date lot expiry from expiryDays', async () => {
      await ctx.service.wallet.addLoyaltyPoints(PLAYER, 10, 'PLAY', { expiryDays: 30 });

      const [lot] = await ctx.service.wallet.getPointEntries(PLAYER);
      expect(lot.expiresAt).toEqual(new Date('2026-04-01T12:00:00.000Z'));
    });

    it('should fall back to the configured default expiry', async () => {
      ctx = createTestContext({ config: { wallet: { defaultPointExpiryDays: 7, maxConcurrencyRetries: 5 } } });

      await ctx.service.wallet.addLoyaltyPoints(PLAYER, 10, 'PLAY');
      await ctx.service.wallet.addLoyaltyPoints(PLAYER, 10, 'PLAY', { expiryDays: null });

      const lots = await ctx.service.wallet.getPointEntries(PLAYER);
      expect(lots[0].expiresAt).toEqual(new Date('2026-03-09T12:00:00.000Z'));
      expect(lots[1].expiresAt).toBeUndefined();
    });

    it('should credit reward points and tickets', async () => {
      const rp = await ctx.service.wallet.addRewardPoints(PLAYER, 25);
      const tickets = await ctx.service.wallet.addTickets(PLAYER, 3);

      expect(rp).toMatchObject({ type: 'RP_EARNED', currency: 'RP', amount: 25, description: 'Reward points issued' });
      expect(tickets).toMatchObject({ type: 'TICKETS_ISSUED', currency: 'TICKETS', balanceAfter: 3, description: 'Tickets issued' });
      const balance = await ctx.service.wallet.getBalance(PLAYER);
      expect([balance.rpBalance, balance.ticketsBalance, balance.version]).toEqual([25, 3, 2]);
    });

    it('should reject non-positive amounts', async () => {
      const attempt = ctx.service.wallet.addLoyaltyPoints(PLAYER, 0, 'PLAY');

      await expect(attempt).rejects.toBeInstanceOf(ValidationFailureError);
      await expect(attempt).rejects.toThrow('amount must be a positive number, got 0');
      expect(ctx.store.dump().transactions).toHaveLength(0);
    });

    it('should serialize concurrent credits for one player', async () => {
      await Promise.all(Array.from({ length: 10 }, () => ctx.service.wallet.addLoyaltyPoints(PLAYER, 10, 'PLAY')));

      const balance = await ctx.service.wallet.getBalance(PLAYER);
      expect(balance.lpBalance).toBe(100);
      expect(balance.version).toBe(10);
      expect(await ctx.service.wallet.getPointEntries(PLAYER)).toHaveLength(10);
    });

    it('should return an unsaved zero balance for an unknown player', async () => {
      const balance = await ctx.service.wallet.getBalance('nobody');

      expect(balance).toMatchObject({ lpBalance: 0, bonusBalance: 0, version: 0 });
      expect(ctx.store.dump().balances).toHaveLength(0);
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // DEBITS (FIFO)
  // ═══════════════════════════════════════════════════════════════════

  describe('debits', () => {
    beforeEach(async () => {
      await ctx.service.wallet.addLoyaltyPoints(PLAYER, 100, 'PLAY');
      ctx.clock.advanceHours(1);
      await ctx.service.wallet.addLoyaltyPoints(PLAYER, 50, 'PLAY');
    });

    it('should consume the oldest lot first', async () => {
      const [older, newer] = await ctx.service.wallet.getPointEntries(PLAYER);

      const tx = await ctx.service.wallet.deductBalance(PLAYER, 'LP', 120);

      expect(tx).toMatchObject({
        type: 'LP_REDEEMED',
        amount: -120,
        balanceBefore: 150,
        balanceAfter: 30,
        description: 'Deducted LP',
        metadata: { lots: [{ entryId: older.id, consumed: 100 }, { entryId: newer.id, consumed: 20 }] },
      });
      const lots = await ctx.service.wallet.getPointEntries(PLAYER);
      expect(lots.map(lot => lot.remainingAmount)).toEqual([0, 30]);
    });

    it('should keep open lots equal to the LP balance', async () => {
      await ctx.service.wallet.deductBalance(PLAYER, 'LP', 120);

      const balance = await ctx.service.wallet.getBalance(PLAYER);
      const open = (await ctx.service.wallet.getPointEntries(PLAYER)).filter(lot => !lot.isExpired);
      expect(open.reduce((total, lot) => total + lot.remainingAmount, 0)).toBe(balance.lpBalance);
    });

    it('should change nothing when the balance is short', async () => {
      const before = ctx.store.dump();

      const attempt = ctx.service.wallet.deductBalance(PLAYER, 'LP', 200);

      await expect(attempt).rejects.toBeInstanceOf(InsufficientBalanceError);
      await expect(attempt).rejects.toThrow('Insufficient LP balance: available 150, requested 200');
      expect(ctx.store.dump()).toEqual(before);
    });

    it('should tag non-LP debits as balance deductions', async () => {
      await ctx.service.wallet.addRewardPoints(PLAYER, 40);

      const tx = await ctx.service.wallet.deductBalance(PLAYER, 'RP', 15, { description: 'Shop purchase', referenceId: 'order-9' });

      expect(tx).toMatchObject({
        type: 'BALANCE_DEDUCTED',
        currency: 'RP',
        amount: -15,
        balanceAfter: 25,
        description: 'Shop purchase',
        referenceId: 'order-9',
      });
    });

    it('should debit the balance together with the lots in deductLpFifo', async () => {
      const [older, newer] = await ctx.service.wallet.getPointEntries(PLAYER);
      const logs = captureLogs();

      const tx = await ctx.service.wallet.deductLpFifo(PLAYER, 120);

      logs.stop();
      expect(tx).toMatchObject({
        type: 'LP_REDEEMED',
        currency: 'LP',
        amount: -120,
        balanceBefore: 150,
        balanceAfter: 30,
        metadata: { lots: [{ entryId: older.id, consumed: 100 }, { entryId: newer.id, consumed: 20 }] },
      });
      const balance = await ctx.service.wallet.getBalance(PLAYER);
      const open = (await ctx.service.wallet.getPointEntries(PLAYER)).filter(lot => !lot.isExpired);
      expect(balance.lpBalance).toBe(30);
      expect(open.reduce((total, lot) => total + lot.remainingAmount, 0)).toBe(balance.lpBalance);
      expect(logs.entries.filter(entry => entry.message === 'Point lots out of balance')).toEqual([]);
    });

    it('should reject a deductLpFifo larger than the balance', async () => {
      await expect(ctx.service.wallet.deductLpFifo(PLAYER, 151)).rejects.toBeInstanceOf(InsufficientBalanceError);

      expect((await ctx.service.wallet.getBalance(PLAYER)).lpBalance).toBe(150);
      const lots = await ctx.service.wallet.getPointEntries(PLAYER);
      expect(lots.map(lot => lot.remainingAmount)).toEqual([100, 50]);
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // REWARD ISSUANCE
  // ═══════════════════════════════════════════════════════════════════

  describe('issueReward', () => {
    it('should credit an LP reward once and activate it', async () => {
      await ctx.store.rewards.insert(pendingReward('reward-1'));

      const tx = await ctx.service.wallet.issueReward('reward-1');

      expect(tx).toMatchObject({
        type: 'LP_EARNED',
        amount: 100,
        balanceAfter: 100,
        description: 'Reward from rule rule-1',
        referenceId: 'reward-1',
        metadata: { source: 'REWARD' },
      });
      const reward = await ctx.store.rewards.findById('reward-1');
      expect(reward?.status).toBe('ACTIVE');
      expect(reward?.activatedAt).toEqual(START);

      const again = ctx.service.wallet.issueReward('reward-1');
      await expect(again).rejects.toBeInstanceOf(StateTransitionError);
      await expect(again).rejects.toThrow('Reward reward-1 cannot move from ACTIVE to ACTIVE');
      expect((await ctx.service.wallet.getBalance(PLAYER)).lpBalance).toBe(100);
      expect(await ctx.service.wallet.getTransactions(PLAYER)).toHaveLength(1);
    });

    it('should let only one of two concurrent issues through', async () => {
      await ctx.store.rewards.insert(pendingReward('reward-1'));

      const outcomes = await Promise.allSettled([
        ctx.service.wallet.issueReward('reward-1'),
        ctx.service.wallet.issueReward('reward-1'),
      ]);

      expect(outcomes.map(outcome => outcome.status).sort()).toEqual(['fulfilled', 'rejected']);
      const reasons = outcomes.flatMap(outcome => (outcome.status === 'rejected' ? [outcome.reason] : []));
      expect(reasons[0]).toBeInstanceOf(StateTransitionError);
      expect((await ctx.service.wallet.getBalance(PLAYER)).lpBalance).toBe(100);
      expect(await ctx.service.wallet.getTransactions(PLAYER)).toHaveLength(1);
      expect((await ctx.store.rewards.findById('reward-1'))?.status).toBe('ACTIVE');
    });

    it('should credit a bonus with its wagering and restrictions', async () => {
      await ctx.store.rewards.insert(bonusReward('bonus-1'));

      const tx = await ctx.service.wallet.issueReward('bonus-1');

      expect(tx).toMatchObject({
        type: 'BONUS_ISSUED',
        currency: 'BONUS',
        amount: 50,
        balanceBefore: 0,
        balanceAfter: 50,
        description: 'Bonus from rule rule-1',
        metadata: { wageringRequirement: 500 },
      });
      const balance = await ctx.service.wallet.getBalance(PLAYER);
      expect(balance).toMatchObject({
        bonusBalance: 50,
        bonusWageringRequired: 500,
        bonusWageringCompleted: 0,
        bonusMaxBet: 5,
        bonusEligibleGames: ['slots'],
      });
      expect(balance.bonusExpiry).toEqual(new Date('2026-03-05T12:00:00.000Z'));
    });

    it('should refuse RP rewards and leave them pending', async () => {
      await ctx.store.rewards.insert(pendingReward('rp-1', { rewardType: 'REWARD_POINTS', currencyType: 'RP' }));

      const attempt = ctx.service.wallet.issueReward('rp-1');

      await expect(attempt).rejects.toBeInstanceOf(NotImplementedError);
      await expect(attempt).rejects.toMatchObject({ code: 'MSLoyaltyCurrencyNotSupported', category: 'not_implemented' });
      expect((await ctx.store.rewards.findById('rp-1'))?.status).toBe('PENDING');
      expect(ctx.store.rollbacks).toBe(1);
    });

    it('should refuse a cancelled reward', async () => {
      await ctx.store.rewards.insert(pendingReward('gone', { status: 'CANCELLED' }));

      await expect(ctx.service.wallet.issueReward('gone')).rejects.toThrow('Reward gone cannot move from CANCELLED to ACTIVE');
    });

    it('should raise NotFound for an unknown reward', async () => {
      await expect(ctx.service.wallet.issueReward('missing')).rejects.toMatchObject({
        code: 'MSLoyaltyRewardNotFound',
        category: 'not_found',
      });
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // WAGERING
  // ═══════════════════════════════════════════════════════════════════

  describe('recordWager', () => {
    beforeEach(async () => {
      await ctx.store.rewards.insert(bonusReward('bonus-1'));
      await ctx.service.wallet.issueReward('bonus-1');
    });

    it('should report progress toward the requirement', async () => {
      expect(await ctx.service.wallet.recordWager(PLAYER, 100, 'slots')).toBeCloseTo(20);
      expect((await ctx.service.wallet.getBalance(PLAYER)).bonusWageringCompleted).toBe(100);
    });

    it('should not count wagers on ineligible games', async () => {
      const logs = captureLogs();

      const progress = await ctx.service.wallet.recordWager(PLAYER, 100, 'roulette');

      logs.stop();
      expect(progress).toBeNull();
      expect((await ctx.service.wallet.getBalance(PLAYER)).bonusWageringCompleted).toBe(0);
      expect(logs.entries.map(entry => entry.message)).toContain('Wager on ineligible game not counted');
      const [wager] = await ctx.service.wallet.getTransactions(PLAYER, { types: ['WAGER'] });
      expect(wager).toMatchObject({ currency: 'CASH', amount: 100, balanceBefore: 0, balanceAfter: 0, metadata: { gameType: 'roulette' } });
    });

    it('should count bets over the max bet with a warning', async () => {
      const logs = captureLogs();

      const progress = await ctx.service.wallet.recordWager(PLAYER, 50, 'slots');

      logs.stop();
      expect(progress).toBeCloseTo(10);
      const warning = logs.entries.find(entry => entry.message === 'Wager exceeds bonus max bet');
      expect(warning?.data).toMatchObject({ playerId: PLAYER, amount: 50, maxBet: 5 });
    });

    it('should clear the requirement once it is met', async () => {
      await ctx.service.wallet.recordWager(PLAYER, 400, 'slots');

      expect(await ctx.service.wallet.recordWager(PLAYER, 150, 'slots')).toBe(100);

      const balance = await ctx.service.wallet.getBalance(PLAYER);
      expect([balance.bonusWageringRequired, balance.bonusWageringCompleted, balance.bonusBalance]).toEqual([0, 0, 50]);
      expect(await ctx.service.wallet.recordWager(PLAYER, 10, 'slots')).toBeNull();
    });
  });

  it('should return null for wagers with no active requirement', async () => {
    expect(await ctx.service.wallet.recordWager(PLAYER, 20)).toBeNull();
    expect(await ctx.service.wallet.getTransactions(PLAYER, { types: ['WAGER'] })).toHaveLength(1);
  });

  it('should journal cash activity without balance snapshots', async () => {
    const tx = await ctx.service.wallet.recordActivity(PLAYER, 'DEPOSIT', 100);

    expect(tx).toMatchObject({
      type: 'DEPOSIT',
      currency: 'CASH',
      amount: 100,
      balanceBefore: 0,
      balanceAfter: 0,
      description: 'Deposit',
      metadata: {},
    });
    expect(tx.referenceId).toBeUndefined();
  });

  // ═══════════════════════════════════════════════════════════════════
  // EXPIRY SWEEPS
  // ═══════════════════════════════════════════════════════════════════

  describe('expireBonuses', () => {
    it('should forfeit an expired bonus once', async () => {
      await ctx.store.rewards.insert(bonusReward('bonus-1'));
      await ctx.service.wallet.issueReward('bonus-1');

      expect(await ctx.service.wallet.expireBonuses()).toBe(0);
      ctx.clock.advanceHours(73);

      expect(await ctx.service.wallet.expireBonuses()).toBe(1);
      expect(await ctx.service.wallet.expireBonuses()).toBe(0);

      const balance = await ctx.service.wallet.getBalance(PLAYER);
      expect(balance).toMatchObject({
        bonusBalance: 0,
        bonusWageringRequired: 0,
        bonusWageringCompleted: 0,
        bonusEligibleGames: [],
      });
      expect(balance.bonusExpiry).toBeUndefined();
      expect(balance.bonusMaxBet).toBeUndefined();

      const expiries = await ctx.service.wallet.getTransactions(PLAYER, { types: ['BONUS_EXPIRED'] });
      expect(expiries).toHaveLength(1);
      expect(expiries[0]).toMatchObject({ amount: -50, balanceBefore: 50, balanceAfter: 0, description: 'Bonus expired' });
    });
  });

  describe('processPointExpiry', () => {
    it('should expire due lots and debit what they still held', async () => {
      await ctx.service.wallet.addLoyaltyPoints(PLAYER, 100, 'PLAY', { expiryDays: 30 });
      ctx.clock.advanceDays(1);
      await ctx.service.wallet.addLoyaltyPoints(PLAYER, 50, 'PLAY');
      await ctx.service.wallet.deductBalance(PLAYER, 'LP', 30);
      ctx.clock.advanceDays(30);

      expect(await ctx.service.wallet.processPointExpiry()).toBe(1);
      expect(await ctx.service.wallet.processPointExpiry()).toBe(0);

      const [expiredLot, openLot] = await ctx.service.wallet.getPointEntries(PLAYER);
      expect(expiredLot).toMatchObject({ isExpired: true, remainingAmount: 0 });
      expect(openLot).toMatchObject({ isExpired: false, remainingAmount: 50 });
      expect((await ctx.service.wallet.getBalance(PLAYER)).lpBalance).toBe(50);

      const [row] = await ctx.service.wallet.getTransactions(PLAYER, { types: ['LP_EXPIRED'] });
      expect(row).toMatchObject({
        amount: -70,
        balanceBefore: 120,
        balanceAfter: 50,
        description: 'Loyalty points expired',
        referenceId: expiredLot.id,
      });
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // REDEMPTION
  // ═══════════════════════════════════════════════════════════════════

  describe('redeemPoints', () => {
    beforeEach(async () => {
      await ctx.store.redemptionRules.save(CASH_REDEMPTION);
      await ctx.service.wallet.addLoyaltyPoints(PLAYER, 5000, 'PLAY');
    });

    it('should debit LP and pay out cash', async () => {
      const redemption = await ctx.service.wallet.redeemPoints(PLAYER, 'cash-10');

      expect(redemption).toMatchObject({
        playerId: PLAYER,
        redemptionRuleId: 'cash-10',
        lpAmount: 1000,
        valueReceived: 10,
        currencyType: 'CASH',
        status: 'COMPLETED',
        createdAt: START,
      });
      expect((await ctx.service.wallet.getBalance(PLAYER)).lpBalance).toBe(4000);

      const [payout, debit] = await ctx.service.wallet.getTransactions(PLAYER, { types: ['LP_REDEEMED', 'REDEMPTION_PAYOUT'] });
      expect(debit).toMatchObject({ type: 'LP_REDEEMED', amount: -1000, description: 'Redeemed Cash 10', referenceId: redemption.id });
      expect(payout).toMatchObject({ type: 'REDEMPTION_PAYOUT', currency: 'CASH', amount: 10, referenceId: redemption.id });
      expect(await ctx.service.wallet.getRedemptions(PLAYER)).toEqual([redemption]);
    });

    it('should pay bonus-targeted redemptions into the bonus balance', async () => {
      await ctx.store.redemptionRules.save({ ...CASH_REDEMPTION, id: 'bonus-25', name: 'Bonus 25', currencyValue: 25, targetBalance: 'BONUS' });

      await ctx.service.wallet.redeemPoints(PLAYER, 'bonus-25');

      const balance = await ctx.service.wallet.getBalance(PLAYER);
      expect([balance.lpBalance, balance.bonusBalance, balance.bonusWageringRequired]).toEqual([4000, 25, 0]);
    });

    it('should enforce the monthly limit over a trailing window', async () => {
      await ctx.service.wallet.redeemPoints(PLAYER, 'cash-10');
      await ctx.service.wallet.redeemPoints(PLAYER, 'cash-10');

      const attempt = ctx.service.wallet.redeemPoints(PLAYER, 'cash-10');
      await expect(attempt).rejects.toMatchObject({ code: 'MSLoyaltyRedemptionLimitReached' });
      await expect(attempt).rejects.toThrow('Redemption limit of 2 per 30 days reached');
      expect((await ctx.service.wallet.getBalance(PLAYER)).lpBalance).toBe(3000);

      ctx.clock.advanceDays(31);
      await ctx.service.wallet.redeemPoints(PLAYER, 'cash-10');
      expect((await ctx.service.wallet.getBalance(PLAYER)).lpBalance).toBe(2000);
    });

    it('should require the larger of cost and minimum balance', async () => {
      await ctx.store.redemptionRules.save({ ...CASH_REDEMPTION, id: 'premium', minLpBalance: 6000 });

      const attempt = ctx.service.wallet.redeemPoints(PLAYER, 'premium');

      await expect(attempt).rejects.toBeInstanceOf(InsufficientBalanceError);
      await expect(attempt).rejects.toThrow('Insufficient LP balance: available 5000, requested 6000');
    });

    it('should reject inactive rules', async () => {
      await ctx.store.redemptionRules.save({ ...CASH_REDEMPTION, id: 'retired', isActive: false });

      await expect(ctx.service.wallet.redeemPoints(PLAYER, 'retired')).rejects.toBeInstanceOf(RuleInactiveError);
    });

    it('should enforce the tier requirement', async () => {
      await ctx.store.redemptionRules.save({ ...CASH_REDEMPTION, id: 'gold-only', tierRequirement: 'GOLD' });

      const attempt = ctx.service.wallet.redeemPoints(PLAYER, 'gold-only');

      await expect(attempt).rejects.toBeInstanceOf(TierRequirementNotMetError);
      await expect(attempt).rejects.toThrow('Tier GOLD required, player is BRONZE');
    });

    it('should raise NotFound for an unknown rule', async () => {
      await expect(ctx.service.wallet.redeemPoints(PLAYER, 'nope')).rejects.toThrow('Redemption rule nope not found');
    });
  });

  // ═══════════════════════════════════════════════════════════════════
  // UNIT OF WORK
  // ═══════════════════════════════════════════════════════════════════

  describe('unit of work', () => {
    it('should retry after a concurrent modification', async () => {
      ctx.store.failNextBalanceUpdates(2);

      await ctx.service.wallet.addRewardPoints(PLAYER, 5);

      expect(ctx.store.unitsOfWork).toBe(3);
      expect(ctx.store.rollbacks).toBe(2);
      expect((await ctx.service.wallet.getBalance(PLAYER)).rpBalance).toBe(5);
      expect(await ctx.service.wallet.getTransactions(PLAYER)).toHaveLength(1);
    });

    it('should give up after the configured retries', async () => {
      ctx = createTestContext({ config: { wallet: { defaultPointExpiryDays: null, maxConcurrencyRetries: 1 } } });
      ctx.store.failNextBalanceUpdates(5);

      await expect(ctx.service.wallet.addRewardPoints(PLAYER, 5)).rejects.toBeInstanceOf(ConcurrentModificationError);
      expect(ctx.store.unitsOfWork).toBe(2);
      expect(ctx.store.dump().balances).toHaveLength(0);
    });

    it('should keep a committed credit when the tier hook fails', async () => {
      ctx = createTestContext({
        tierHook: async () => {
          throw new Error('tier store down');
        },
      });
      const logs = captureLogs();

      const tx = await ctx.service.wallet.addLoyaltyPoints(PLAYER, 100, 'PLAY');

      logs.stop();
      expect(tx.balanceAfter).toBe(100);
      expect((await ctx.service.wallet.getBalance(PLAYER)).lpBalance).toBe(100);
      const failure = logs.entries.find(entry => entry.message === 'Tier update hook failed');
      expect(failure?.level).toBe('error');
      expect(failure?.data).toMatchObject({ playerId: PLAYER, error: 'tier store down' });
    });
  });
});
