/**
 * Loyalty Service Configuration
 *
 * Priority order (lowest to highest):
 * 1. LOYALTY_CONFIG_DEFAULTS (config-defaults.ts)
 * 2. JSON config file (LOYALTY_CONFIG_FILE, optional)
 * 3. LOYALTY_SERVICE_* environment variables, `__` for nesting
 *    (LOYALTY_SERVICE_SAFETY__CAPS__DAILY=500)
 *
 * Components receive the validated LoyaltyConfig explicitly; nothing reads
 * process.env after startup.
 */

import { type } from 'arktype';
import {
  logger,
  loadConfig as loadLayeredConfig,
  deepMerge,
  validateInput,
  isValidationFailure,
  ConfigValidationError,
  type LogFormat,
  type LogLevel,
  type ValidationFailure,
} from 'core-service';
import { LOYALTY_CONFIG_DEFAULTS } from './config-defaults.js';
import { parseConditions } from './services/rules-engine/condition.js';
import type { CapPeriod, Conditions, SignalType, TierLevel } from './types.js';

export interface TierDefinition {
  tier: TierLevel;
  /** lp_balance needed to qualify */
  lpMin: number;
  /** Extra player-state conditions, same syntax as rule conditions */
  requirements?: Conditions;
}

export interface LoyaltyConfig {
  serviceName: string;
  logLevel: LogLevel;
  logFormat: LogFormat;

  mongoUri: string;
  dbName: string;
  redisUrl?: string;

  lock: {
    backend: 'memory' | 'redis';
    ttlMs: number;
    acquireTimeoutMs: number;
  };

  wallet: {
    defaultPointExpiryDays: number | null;
    maxConcurrencyRetries: number;
  };

  safety: {
    defaultHouseEdge: number;
    houseEdges: Record<string, number>;
    /** segment -> reward type -> multiplier */
    retentionMultipliers: Record<string, Record<string, number>>;
    lookbackDays: number;
    caps: Record<CapPeriod, number>;
  };

  abuse: {
    immediateWithdrawalHours: number;
    betSampleSize: number;
    betMinSamples: number;
    betMaxRatio: number;
    winRateMinWagered: number;
    winRateMaxRatio: number;
    severities: Record<SignalType, number>;
    thresholds: {
      blocked: number;
      increasedWagering: number;
      reducedRewards: number;
    };
  };

  tiers: TierDefinition[];
}

// ═══════════════════════════════════════════════════════════════════
// Schema
// ═══════════════════════════════════════════════════════════════════

const severity = '1 <= number.integer <= 10';
const score = '0 <= number <= 100';

const tierSchema = type({
  tier: "'BRONZE' | 'SILVER' | 'GOLD' | 'PLATINUM' | 'DIAMOND'",
  lpMin: 'number >= 0',
  'requirements?': 'object',
});

const configSchema = type({
  serviceName: 'string > 0',
  logLevel: "'debug' | 'info' | 'warn' | 'error'",
  logFormat: "'json' | 'text' | 'pretty'",
  mongoUri: 'string > 0',
  dbName: 'string > 0',
  'redisUrl?': 'string > 0',
  lock: {
    backend: "'memory' | 'redis'",
    ttlMs: 'number.integer > 0',
    acquireTimeoutMs: 'number.integer > 0',
  },
  wallet: {
    defaultPointExpiryDays: 'number > 0 | null',
    maxConcurrencyRetries: 'number.integer >= 0',
  },
  safety: {
    defaultHouseEdge: '0 <= number <= 1',
    houseEdges: { '[string]': '0 <= number <= 1' },
    retentionMultipliers: { '[string]': { '[string]': 'number >= 0' } },
    lookbackDays: 'number > 0',
    caps: {
      daily: 'number >= 0',
      weekly: 'number >= 0',
      monthly: 'number >= 0',
    },
  },
  abuse: {
    immediateWithdrawalHours: 'number > 0',
    betSampleSize: 'number.integer > 0',
    betMinSamples: 'number.integer > 0',
    betMaxRatio: 'number > 0',
    winRateMinWagered: 'number >= 0',
    winRateMaxRatio: 'number > 0',
    severities: {
      BONUS_ONLY_PLAY: severity,
      IMMEDIATE_WITHDRAWAL: severity,
      BET_MANIPULATION: severity,
      ABNORMAL_WIN_RATE: severity,
      MANUAL_REVIEW_REQUIRED: severity,
    },
    thresholds: {
      blocked: score,
      increasedWagering: score,
      reducedRewards: score,
    },
  },
  tiers: tierSchema.array().atLeastLength(1),
});

/**
 * Validate a merged config object. Returns the typed config or the list of
 * problems.
 */
export function validateConfig(input: Record<string, unknown>): LoyaltyConfig | ValidationFailure {
  const parsed = validateInput(configSchema(input));
  if (isValidationFailure(parsed)) {
    return parsed;
  }

  const errors: string[] = [];
  const tiers: TierDefinition[] = parsed.tiers.map((definition, index) => {
    if (definition.requirements === undefined) {
      return { tier: definition.tier, lpMin: definition.lpMin };
    }
    const requirements = parseConditions(definition.requirements, `tiers[${index}].requirements`);
    if (isValidationFailure(requirements)) {
      errors.push(...requirements.errors);
      return { tier: definition.tier, lpMin: definition.lpMin };
    }
    return { tier: definition.tier, lpMin: definition.lpMin, requirements };
  });

  const { blocked, increasedWagering, reducedRewards } = parsed.abuse.thresholds;
  if (!(blocked > increasedWagering && increasedWagering > reducedRewards)) {
    errors.push('abuse.thresholds must satisfy blocked > increasedWagering > reducedRewards');
  }

  if (errors.length > 0) {
    return { errors };
  }
  return { ...parsed, tiers };
}

// ═══════════════════════════════════════════════════════════════════
// Loading
// ═══════════════════════════════════════════════════════════════════

export interface LoadConfigOptions {
  configFile?: string;
  env?: Record<string, string | undefined>;
}

/**
 * Load configuration from defaults, the optional JSON file and the environment.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoyaltyConfig> {
  const env = options.env ?? process.env;
  return loadLayeredConfig({
    serviceName: LOYALTY_CONFIG_DEFAULTS.serviceName,
    defaults: LOYALTY_CONFIG_DEFAULTS,
    configFile: options.configFile ?? env.LOYALTY_CONFIG_FILE,
    env,
    validate: validateConfig,
  });
}

function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

export type ConfigOverrides = {
  [K in keyof LoyaltyConfig]?: LoyaltyConfig[K] extends unknown[]
    ? LoyaltyConfig[K]
    : LoyaltyConfig[K] extends object
      ? Partial<LoyaltyConfig[K]>
      : LoyaltyConfig[K];
};

/**
 * Defaults merged with in-code overrides, no file or environment.
 * Throws ConfigValidationError when the result is invalid.
 */
export function resolveConfig(overrides: ConfigOverrides = {}): LoyaltyConfig {
  const result = validateConfig(deepMerge(LOYALTY_CONFIG_DEFAULTS, toRecord(overrides)));
  if (isValidationFailure(result)) {
    throw new ConfigValidationError(LOYALTY_CONFIG_DEFAULTS.serviceName, result.errors);
  }
  return result;
}

/**
 * Print configuration summary (for debugging)
 */
export function printConfigSummary(config: LoyaltyConfig): void {
  logger.info('Loyalty Service Configuration:', {
    MongoDB: config.mongoUri.replace(/\/\/[^@/]*@/, '//***@'),
    Database: config.dbName,
    Lock: config.lock.backend,
    Redis: config.redisUrl ? 'configured' : 'not configured',
    PointExpiryDays: config.wallet.defaultPointExpiryDays ?? 'never',
    Caps: config.safety.caps,
    Tiers: config.tiers.map(t => `${t.tier}>=${t.lpMin}`).join(', '),
  });
}
