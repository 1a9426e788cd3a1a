/**
 * Rule input validation (admin upserts, JSON seed files)
 */

import { type } from 'arktype';
import { validateInput, isValidationFailure, type ValidationFailure } from 'core-service';
import { parseConditions } from './condition.js';
import { isRewardType } from './reward-types.js';
import type { Conditions, RewardConfig } from '../../types.js';

export const rewardConfigSchema = type({
  type: 'string > 0',
  formula: 'string > 0',
  'maxAmount?': 'number >= 0',
  'wageringRequirement?': 'number >= 0',
  'expiryHours?': 'number > 0',
  'eligibleGames?': 'string[]',
  'maxBet?': 'number > 0',
});

export const ruleInputSchema = type({
  ruleId: 'string > 0',
  name: 'string > 0',
  'description?': 'string',
  'priority?': 'number.integer',
  'isActive?': 'boolean',
  'conditions?': 'object',
  rewardConfig: rewardConfigSchema,
});

export interface RuleInput {
  ruleId: string;
  name: string;
  description?: string;
  priority: number;
  isActive: boolean;
  conditions: Conditions;
  rewardConfig: RewardConfig;
}

/**
 * Validate an untrusted rule definition. Omitted priority defaults to 0,
 * isActive to true and conditions to "always matches".
 */
export function parseRuleInput(input: unknown): RuleInput | ValidationFailure {
  const parsed = validateInput(ruleInputSchema(input));
  if (isValidationFailure(parsed)) {
    return parsed;
  }

  const errors: string[] = [];
  const conditions = parseConditions(parsed.conditions ?? {});
  if (isValidationFailure(conditions)) {
    errors.push(...conditions.errors);
  }
  if (!isRewardType(parsed.rewardConfig.type)) {
    errors.push(`rewardConfig.type "${parsed.rewardConfig.type}" is not a known reward type`);
  }

  if (errors.length > 0 || isValidationFailure(conditions)) {
    return { errors };
  }

  return {
    ruleId: parsed.ruleId,
    name: parsed.name,
    description: parsed.description,
    priority: parsed.priority ?? 0,
    isActive: parsed.isActive ?? true,
    conditions,
    rewardConfig: { ...parsed.rewardConfig },
  };
}
