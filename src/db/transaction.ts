import { sql } from 'drizzle-orm';
import { TransactionError } from '@/utils/errors';
import type { DatabaseConnection, DatabaseConnector } from './connection';

const BEGIN = sql.raw('BEGIN ISOLATION LEVEL READ COMMITTED READ WRITE');
const COMMIT = sql.raw('COMMIT');
const ROLLBACK = sql.raw('ROLLBACK');

type RollbackOutcome = { ok: true } | { ok: false; error: unknown };

/**
 * Runs `fn` inside a read-committed, read-write transaction on a freshly
 * checked-out connection.
 *
 * Commits when `fn` resolves and rolls back when anything fails, commit
 * included. A failed rollback never hides the error that caused it: both are
 * reported together in an AggregateError.
 */
export async function withTransaction<T>(
  connector: DatabaseConnector,
  operation: string,
  fn: (connection: DatabaseConnection) => Promise<T>,
): Promise<T> {
  let connection: DatabaseConnection;
  try {
    connection = await connector.connect();
  } catch (err) {
    throw new TransactionError('connect', operation, err);
  }

  let broken = false;
  try {
    try {
      await connection.db.execute(BEGIN);
    } catch (err) {
      broken = true;
      throw new TransactionError('begin', operation, err);
    }

    let result: T;
    try {
      result = await fn(connection);
    } catch (err) {
      const outcome = await rollback(connection);
      if (outcome.ok) throw err;
      broken = true;
      throw joinedRollbackError(operation, err, outcome.error);
    }

    try {
      await connection.db.execute(COMMIT);
    } catch (err) {
      const commitError = new TransactionError('commit', operation, err);
      // Postgres ends the transaction on a failed COMMIT; this only clears
      // the session if the driver left it open.
      const outcome = await rollback(connection);
      if (outcome.ok) throw commitError;
      broken = true;
      throw joinedRollbackError(operation, commitError, outcome.error);
    }

    return result;
  } finally {
    connection.release(broken);
  }
}

async function rollback(connection: DatabaseConnection): Promise<RollbackOutcome> {
  try {
    await connection.db.execute(ROLLBACK);
    return { ok: true };
  } catch (error) {
    return { ok: false, error };
  }
}

function joinedRollbackError(operation: string, original: unknown, rollbackError: unknown): TransactionError {
  return new TransactionError(
    'rollback',
    operation,
    new AggregateError([original, rollbackError], `${operation}: rollback failed after error`),
  );
}
