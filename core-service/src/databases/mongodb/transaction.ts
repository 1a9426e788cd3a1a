/**
 * MongoDB transaction helper
 *
 * Multi-document writes (balance + audit row + lots) commit together or not at all.
 * Requires a replica set or sharded cluster.
 */

import type { ClientSession, MongoClient, TransactionOptions as MongoTransactionOptions } from 'mongodb';

export const DEFAULT_TRANSACTION_OPTIONS: MongoTransactionOptions = {
  readConcern: { level: 'snapshot' },
  writeConcern: { w: 'majority' },
  readPreference: 'primary',
};

export interface TransactionOptions {
  client: MongoClient;
  /** Existing session: the caller owns the transaction, fn runs inside it */
  session?: ClientSession;
  transactionOptions?: MongoTransactionOptions;
}

/**
 * Run fn inside a transaction.
 *
 * @example
 * ```typescript
 * await withTransaction({ client }, async (session) => {
 *   await balances.updateOne({ playerId }, update, { session });
 *   await transactions.insertOne(row, { session });
 * });
 * ```
 */
export async function withTransaction<T>(
  options: TransactionOptions,
  fn: (session: ClientSession) => Promise<T>,
): Promise<T> {
  if (options.session) {
    return fn(options.session);
  }

  const session = options.client.startSession();
  try {
    let result: { value: T } | undefined;
    await session.withTransaction(async () => {
      result = { value: await fn(session) };
    }, options.transactionOptions ?? DEFAULT_TRANSACTION_OPTIONS);
    if (!result) {
      throw new Error('Transaction callback did not complete');
    }
    return result.value;
  } finally {
    await session.endSession();
  }
}
