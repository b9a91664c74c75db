import { escapeIdentifier } from 'pg';
import type { Queryable } from '../db/queryable.js';
import { fromPgError } from './errors.js';

/**
 * SQL call fragments for the server-side large object functions, one per
 * primitive. Arguments are SQL expressions (placeholders such as `$1`, column
 * references or literals), so the same fragments can appear in ad-hoc bulk
 * queries as well as in the statements issued by the bindings.
 *
 * See https://www.postgresql.org/docs/current/lo-interfaces.html
 */
export const largeObjectSql = {
  create: (desiredId = '0') => `lo_create(${desiredId})`,
  unlink: (objectId: string) => `lo_unlink(${objectId})`,
  open: (objectId: string, flags: string) => `lo_open(${objectId}, ${flags})`,
  close: (descriptor: string) => `lo_close(${descriptor})`,
  write: (descriptor: string, data: string) => `lowrite(${descriptor}, ${data})`,
  read: (descriptor: string, length: string) => `loread(${descriptor}, ${length})`,
  seek: (descriptor: string, offset: string, whence: string) => `lo_lseek64(${descriptor}, ${offset}, ${whence})`,
  tell: (descriptor: string) => `lo_tell64(${descriptor})`,
  resize: (descriptor: string, size: string) => `lo_truncate64(${descriptor}, ${size})`,
} as const;

export type LargeObjectPrimitive = keyof typeof largeObjectSql;

export interface UnlinkReferencedOptions {
  table: string;
  column: string;
  /** Condition with `$n` placeholders bound from `params`. */
  where?: string;
  params?: unknown[];
}

/**
 * Removes every large object referenced by `column` in the rows of `table`
 * matching `where`, in a single statement. Returns how many were unlinked.
 */
export const unlinkReferencedObjects = async (db: Queryable, options: UnlinkReferencedOptions): Promise<number> => {
  const column = escapeIdentifier(options.column);
  const whereClause = options.where ? ` WHERE ${options.where}` : '';
  try {
    const result = await db.query(
      `SELECT ${largeObjectSql.unlink(column)} AS unlinked FROM ${escapeIdentifier(options.table)}${whereClause}`,
      options.params ?? [],
    );
    return result.rows.length;
  } catch (error) {
    throw fromPgError(error, { operation: 'unlinkReferenced' });
  }
};

/**
 * Takes a transaction-scoped advisory lock keyed by the object id, so writers
 * that check and then modify the same object run one after another.
 */
export const lockLargeObject = async (db: Queryable, objectId: number): Promise<void> => {
  await db.query('SELECT pg_advisory_xact_lock($1) AS locked', [objectId]);
};
