/**
 * MongoDB Error Helpers
 *
 * Upserts racing on a unique index surface as duplicate key errors (E11000);
 * callers re-read the winning document instead of failing.
 */

import { MongoServerError } from 'mongodb';

/**
 * Check if error is a MongoDB duplicate key error (E11000/E11001)
 */
export function isDuplicateKeyError(error: unknown): boolean {
  if (error instanceof MongoServerError) {
    return error.code === 11000 || error.code === 11001 || error.codeName === 'DuplicateKey';
  }
  return error instanceof Error && error.message.includes('E11000');
}
