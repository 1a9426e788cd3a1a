/**
 * Condition matching
 *
 * A condition is a conjunction: every key must hold against the player state.
 * Per key, the first matching form wins:
 *   { field: { min, max, equals } }  range / equality on state[field]
 *   { field: [a, b] }                state[field] is one of the values
 *   { field_min: n }                 state[field] >= n
 *   { field_max: n }                 state[field] <= n
 *   { field: value }                 state[field] === value
 *
 * A missing state field fails every form. Ordering comparisons need numbers on
 * both sides.
 */

import type { ValidationFailure } from 'core-service';
import type { ConditionValue, Conditions, PlayerState, PlayerStateValue, RangePredicate } from '../../types.js';

const RANGE_KEYS = ['min', 'max', 'equals'] as const;

function isRangePredicate(value: ConditionValue): value is RangePredicate {
  return typeof value === 'object' && !Array.isArray(value);
}

function isList(value: ConditionValue): value is readonly PlayerStateValue[] {
  return Array.isArray(value);
}

function atLeast(actual: PlayerStateValue | undefined, bound: unknown): boolean {
  return typeof actual === 'number' && typeof bound === 'number' && actual >= bound;
}

function atMost(actual: PlayerStateValue | undefined, bound: unknown): boolean {
  return typeof actual === 'number' && typeof bound === 'number' && actual <= bound;
}

function matchesRange(actual: PlayerStateValue | undefined, range: RangePredicate): boolean {
  if (actual === undefined) return false;
  if (range.min !== undefined && !atLeast(actual, range.min)) return false;
  if (range.max !== undefined && !atMost(actual, range.max)) return false;
  if (range.equals !== undefined && actual !== range.equals) return false;
  return true;
}

export function evaluatePredicate(key: string, expected: ConditionValue, state: PlayerState): boolean {
  if (isRangePredicate(expected)) {
    return matchesRange(state[key], expected);
  }

  if (isList(expected)) {
    const actual = state[key];
    return actual !== undefined && expected.includes(actual);
  }

  if (key.endsWith('_min')) {
    return atLeast(state[key.slice(0, -4)], expected);
  }

  if (key.endsWith('_max')) {
    return atMost(state[key.slice(0, -4)], expected);
  }

  return state[key] === expected;
}

export function evaluateCondition(conditions: Conditions, state: PlayerState): boolean {
  for (const [key, expected] of Object.entries(conditions)) {
    if (!evaluatePredicate(key, expected, state)) {
      return false;
    }
  }
  return true;
}

// ═══════════════════════════════════════════════════════════════════
// Parsing (untrusted JSON -> Conditions)
// ═══════════════════════════════════════════════════════════════════

function entriesOf(value: object): Array<[string, unknown]> {
  return Object.entries(value);
}

function isScalar(value: unknown): value is PlayerStateValue {
  return typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean';
}

function parseRange(key: string, raw: Record<string, unknown>, errors: string[]): RangePredicate {
  const range: RangePredicate = {};
  for (const [field, value] of entriesOf(raw)) {
    if (field === 'min' || field === 'max') {
      if (typeof value !== 'number') {
        errors.push(`${key}.${field} must be a number`);
      } else {
        range[field] = value;
      }
    } else if (field === 'equals') {
      if (!isScalar(value)) {
        errors.push(`${key}.equals must be a number, string or boolean`);
      } else {
        range.equals = value;
      }
    } else {
      errors.push(`${key} has unknown range key "${field}" (expected ${RANGE_KEYS.join(', ')})`);
    }
  }
  return range;
}

/**
 * Check the shape of a conditions object read from JSON/config.
 */
export function parseConditions(input: unknown, label = 'conditions'): Conditions | ValidationFailure {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return { errors: [`${label} must be an object`] };
  }

  const errors: string[] = [];
  const conditions: Conditions = {};

  for (const [key, value] of entriesOf(input)) {
    const path = `${label}.${key}`;
    if (isScalar(value)) {
      if ((key.endsWith('_min') || key.endsWith('_max')) && typeof value !== 'number') {
        errors.push(`${path} must be a number`);
        continue;
      }
      conditions[key] = value;
    } else if (Array.isArray(value)) {
      const items = value.filter(isScalar);
      if (items.length !== value.length) {
        errors.push(`${path} must list numbers, strings or booleans`);
        continue;
      }
      conditions[key] = items;
    } else if (typeof value === 'object' && value !== null) {
      conditions[key] = parseRange(path, Object.fromEntries(entriesOf(value)), errors);
    } else {
      errors.push(`${path} has unsupported value ${String(value)}`);
    }
  }

  return errors.length > 0 ? { errors } : conditions;
}
