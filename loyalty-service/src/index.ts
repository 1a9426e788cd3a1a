/**
 * Loyalty Service
 *
 * Rule evaluation, reward issuance, wallet ledger, profit-safety gate and
 * abuse scoring for a gaming platform.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * WIRING
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   createLoyaltyService({ store })     any LoyaltyStore (tests: in-memory)
 *   connectLoyaltyService(config)       MongoDB store, optional Redis lock
 *
 * Pipeline: rules.evaluateAndCreateRewards -> safety.validatePendingReward
 *           -> wallet.issueReward   (batch.processPlayers runs all three)
 * ═══════════════════════════════════════════════════════════════════════════
 */

import {
  logger,
  configureLogger,
  connectDatabase,
  closeDatabase,
  checkDatabaseHealth,
  connectRedis,
  checkRedisHealth,
  closeRedis,
  createRedisLockClient,
  InProcessKeyedLock,
  RedisKeyedLock,
  ConfigValidationError,
  registerServiceErrorCodes,
  type KeyedLock,
} from 'core-service';
import { LOYALTY_ERROR_CODES } from './error-codes.js';
import { printConfigSummary, resolveConfig, type LoyaltyConfig } from './config.js';
import type { Clock, PlayerStateProvider, TierUpdateHook } from './types.js';
import type { LoyaltyStore } from './persistence/types.js';
import { MongoLoyaltyStore } from './persistence/mongo-store.js';
import { RulesEngine } from './services/rules-engine/engine.js';
import { WalletLedger } from './services/wallet/wallet-ledger.js';
import { ProfitSafetyGate } from './services/safety/profit-safety.js';
import { AbuseScorer } from './services/safety/abuse-scorer.js';
import { TierService } from './services/tier.js';
import { BatchProcessor } from './services/batch.js';
import { createProfilePlayerStateProvider } from './services/player-state.js';

registerServiceErrorCodes(LOYALTY_ERROR_CODES);

export interface LoyaltyServiceOptions {
  store: LoyaltyStore;
  config?: LoyaltyConfig;
  lock?: KeyedLock;
  /** Defaults to the profile-backed provider */
  stateProvider?: PlayerStateProvider;
  /** Defaults to TierService.updatePlayerTier; null disables the hook */
  tierHook?: TierUpdateHook | null;
  now?: Clock;
}

export interface LoyaltyService {
  rules: RulesEngine;
  wallet: WalletLedger;
  safety: ProfitSafetyGate;
  abuse: AbuseScorer;
  tiers: TierService;
  batch: BatchProcessor;
  config: LoyaltyConfig;
  store: LoyaltyStore;
}

export function createLoyaltyService(options: LoyaltyServiceOptions): LoyaltyService {
  const { store } = options;
  const config = options.config ?? resolveConfig();
  const now = options.now ?? (() => new Date());
  const stateProvider = options.stateProvider ?? createProfilePlayerStateProvider(store, now);

  const tiers = new TierService({ store, stateProvider, tiers: config.tiers, now });
  const tierHook = options.tierHook === null ? undefined : options.tierHook ?? tiers.asHook();

  const rules = new RulesEngine({ store, stateProvider, now });
  const wallet = new WalletLedger({ store, config, lock: options.lock, tierHook, now });
  const safety = new ProfitSafetyGate({ store, config, now });
  const abuse = new AbuseScorer({ store, config, now });
  const batch = new BatchProcessor({ rules, wallet, safety });

  return { rules, wallet, safety, abuse, tiers, batch, config, store };
}

export interface HealthReport {
  healthy: boolean;
  mongo: { healthy: boolean; latencyMs: number; error?: string };
  redis?: { healthy: boolean; latencyMs: number; error?: string };
}

export interface ConnectedLoyaltyService extends LoyaltyService {
  health(): Promise<HealthReport>;
  close(): Promise<void>;
}

/**
 * Connect MongoDB (and Redis for the distributed player lock) and wire the
 * service on top.
 */
export async function connectLoyaltyService(config: LoyaltyConfig): Promise<ConnectedLoyaltyService> {
  configureLogger({ level: config.logLevel, format: config.logFormat, service: config.serviceName });
  printConfigSummary(config);

  const { client, db } = await connectDatabase(config.mongoUri, { dbName: config.dbName });
  const store = new MongoLoyaltyStore(client, db);
  await store.ensureIndexes();

  let lock: KeyedLock = new InProcessKeyedLock();
  let usesRedis = false;
  if (config.lock.backend === 'redis') {
    if (!config.redisUrl) {
      await closeDatabase();
      throw new ConfigValidationError(config.serviceName, ['redisUrl is required when lock.backend is "redis"']);
    }
    const redis = await connectRedis({ url: config.redisUrl, clientName: config.serviceName });
    lock = new RedisKeyedLock(createRedisLockClient(redis), {
      ttlMs: config.lock.ttlMs,
      acquireTimeoutMs: config.lock.acquireTimeoutMs,
    });
    usesRedis = true;
  }

  logger.info('Loyalty service connected', { database: db.databaseName, lock: config.lock.backend });

  return {
    ...createLoyaltyService({ store, config, lock }),
    async health() {
      const mongo = await checkDatabaseHealth();
      if (!usesRedis) {
        return { healthy: mongo.healthy, mongo };
      }
      const redis = await checkRedisHealth();
      return { healthy: mongo.healthy && redis.healthy, mongo, redis };
    },
    async close() {
      if (usesRedis) {
        await closeRedis();
      }
      await closeDatabase();
    },
  };
}

// ═══════════════════════════════════════════════════════════════════
// Exports
// ═══════════════════════════════════════════════════════════════════

export { loadConfig, validateConfig, resolveConfig, printConfigSummary } from './config.js';
export type { LoyaltyConfig, TierDefinition, ConfigOverrides, LoadConfigOptions } from './config.js';
export { LOYALTY_CONFIG_DEFAULTS } from './config-defaults.js';
export { LOYALTY_ERRORS, LOYALTY_ERROR_CODES } from './error-codes.js';
export type { LoyaltyErrorCode } from './error-codes.js';
export * from './errors.js';
export * from './types.js';

export type * from './persistence/types.js';
export { MongoLoyaltyStore, COLLECTIONS } from './persistence/mongo-store.js';

export { RulesEngine, WalletLedger, ProfitSafetyGate, AbuseScorer, TierService, BatchProcessor };
export type { RulesEngineDeps } from './services/rules-engine/engine.js';
export { evaluateCondition, evaluatePredicate, parseConditions } from './services/rules-engine/condition.js';
export { evaluateFormula, parseFormula, parseLiteral, FormulaEvaluationError } from './services/rules-engine/formula.js';
export { currencyForRewardType, isRewardType } from './services/rules-engine/reward-types.js';
export { parseRuleInput, ruleInputSchema, rewardConfigSchema } from './services/rules-engine/rule-schema.js';
export type { RuleInput } from './services/rules-engine/rule-schema.js';
export { zeroBalance, PLAYER_LOCK_PREFIX } from './services/wallet/wallet-ledger.js';
export type {
  WalletLedgerDeps,
  TransactionInput,
  AddPointsOptions,
  BonusCreditOptions,
  DeductOptions,
  ActivityOptions,
  LotConsumption,
} from './services/wallet/wallet-ledger.js';
export { CAP_WINDOW_DAYS } from './services/safety/profit-safety.js';
export type { CapOptions } from './services/safety/profit-safety.js';
export type { PenaltyResult } from './services/safety/abuse-scorer.js';
export type { BatchOptions, BatchResult, BatchError, MaintenanceResult } from './services/batch.js';
export { createProfilePlayerStateProvider } from './services/player-state.js';
