import { LargeObjectError } from '../largeObjects/errors.js';
import type { Connectable, PoolClientLike, QueryResultLike, Queryable } from './queryable.js';

export const DEFAULT_TRANSACTION_TIMEOUT_MS = 60_000;

export class TransactionTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Transaction timed out after ${timeoutMs}ms`);
    this.name = 'TransactionTimeoutError';
  }
}

/**
 * Query capability bound to one open transaction. Once the transaction ends
 * every query through it is rejected, so descriptors opened in the scope
 * cannot be used after the server has closed them.
 */
export class TransactionScope implements Queryable {
  private active = true;

  constructor(private readonly client: Queryable) {}

  get isActive() {
    return this.active;
  }

  expire() {
    this.active = false;
  }

  query(text: string, values?: unknown[]): Promise<QueryResultLike> {
    if (!this.active) {
      return Promise.reject(new LargeObjectError('NotFound', 'Transaction scope has ended; its descriptors are closed'));
    }
    return this.client.query(text, values);
  }
}

export interface TransactionOptions {
  timeoutMs?: number;
}

const rollback = async (client: PoolClientLike) => {
  try {
    await client.query('ROLLBACK');
  } catch (rollbackError) {
    console.warn('[db] rollback failed', rollbackError);
  }
};

/**
 * Runs `fn` inside BEGIN/COMMIT on a pooled client. A rejection from `fn`
 * rolls back. The timeout covers the whole call: when it fires the scope is
 * expired and the connection dropped, even if a statement is still running.
 */
export const withTransaction = async <T>(
  pool: Connectable,
  fn: (scope: TransactionScope) => Promise<T>,
  options: TransactionOptions = {},
): Promise<T> => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TRANSACTION_TIMEOUT_MS;
  const client = await pool.connect();
  const scope = new TransactionScope(client);
  let timedOut = false;
  let timer: NodeJS.Timeout | undefined;

  const work = (async () => {
    await client.query('BEGIN');
    try {
      const result = await fn(scope);
      scope.expire();
      await client.query('COMMIT');
      return result;
    } catch (error) {
      scope.expire();
      if (!timedOut) {
        await rollback(client);
      }
      throw error;
    }
  })();

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      scope.expire();
      const timeoutError = new TransactionTimeoutError(timeoutMs);
      // A client runs one statement at a time, so a ROLLBACK would queue behind
      // the stuck one. Destroying the connection makes the server abort instead.
      client.release(timeoutError);
      work.catch((lateError: unknown) => {
        console.warn('[db] work abandoned after transaction timeout failed', lateError);
      });
      reject(timeoutError);
    }, timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
    if (!timedOut) {
      client.release();
    }
  }
};
