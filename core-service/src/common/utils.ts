/**
 * Generic Utilities
 *
 * Common helpers that don't depend on service-specific logic
 */

import crypto from 'node:crypto';

// ═══════════════════════════════════════════════════════════════════
// Identifiers
// ═══════════════════════════════════════════════════════════════════

/** Generate a UUID v4 */
export function generateId(): string {
  return crypto.randomUUID();
}

// ═══════════════════════════════════════════════════════════════════
// Date/Time Utilities
// ═══════════════════════════════════════════════════════════════════

export function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * 60 * 60 * 1000);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * 24 * 60 * 60 * 1000);
}

/** Whole or fractional days from `from` to `to` */
export function daysBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / (24 * 60 * 60 * 1000);
}

// ═══════════════════════════════════════════════════════════════════
// Numbers
// ═══════════════════════════════════════════════════════════════════

export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}
