/**
 * Loyalty Service Configuration Defaults
 *
 * Lowest-priority layer of loadConfig(); a JSON file and
 * LOYALTY_SERVICE_* environment variables override these.
 */

export const LOYALTY_CONFIG_DEFAULTS = {
  serviceName: 'loyalty-service',
  logLevel: 'info',
  logFormat: 'json',

  // Database (connectLoyaltyService only)
  mongoUri: 'mongodb://localhost:27017/loyalty_service?replicaSet=rs0',
  dbName: 'loyalty_service',

  lock: {
    backend: 'memory',
    ttlMs: 10000,
    acquireTimeoutMs: 5000,
  },

  wallet: {
    // null = points never expire unless the caller passes expiryDays
    defaultPointExpiryDays: null,
    maxConcurrencyRetries: 5,
  },

  safety: {
    defaultHouseEdge: 0.05,
    houseEdges: {
      slots: 0.05,
      roulette: 0.027,
      blackjack: 0.005,
      poker: 0.05,
    },
    // segment -> reward type -> expected uplift in future wagering
    retentionMultipliers: {
      LOSING: { BONUS_BALANCE: 1.8, CASHBACK: 1.5, LOYALTY_POINTS: 1.2 },
      BREAKEVEN: { BONUS_BALANCE: 1.5, CASHBACK: 1.4, LOYALTY_POINTS: 1.3 },
      WINNING: { BONUS_BALANCE: 1.1, CASHBACK: 1.1, LOYALTY_POINTS: 1.2 },
      NEW: { BONUS_BALANCE: 2.0, CASHBACK: 1.6, LOYALTY_POINTS: 1.4 },
      VIP: { BONUS_BALANCE: 1.3, CASHBACK: 1.4, LOYALTY_POINTS: 1.5 },
    },
    lookbackDays: 30,
    caps: {
      daily: 1000,
      weekly: 5000,
      monthly: 20000,
    },
  },

  abuse: {
    immediateWithdrawalHours: 24,
    betSampleSize: 20,
    betMinSamples: 10,
    betMaxRatio: 10,
    winRateMinWagered: 1000,
    winRateMaxRatio: 1.2,
    severities: {
      BONUS_ONLY_PLAY: 5,
      IMMEDIATE_WITHDRAWAL: 7,
      BET_MANIPULATION: 8,
      ABNORMAL_WIN_RATE: 9,
      MANUAL_REVIEW_REQUIRED: 10,
    },
    thresholds: {
      blocked: 81,
      increasedWagering: 61,
      reducedRewards: 31,
    },
  },

  tiers: [
    { tier: 'BRONZE', lpMin: 0 },
    { tier: 'SILVER', lpMin: 1000 },
    { tier: 'GOLD', lpMin: 10000 },
    { tier: 'PLATINUM', lpMin: 50000 },
    { tier: 'DIAMOND', lpMin: 100000 },
  ],
};
