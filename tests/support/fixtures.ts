import { withTransaction } from '../../src/db/transaction.js';
import { PgLargeObjectBackend } from '../../src/largeObjects/bindings.js';
import { isLargeObjectError } from '../../src/largeObjects/errors.js';
import type { LargeObjectErrorKind } from '../../src/largeObjects/errors.js';
import { LargeObject } from '../../src/largeObjects/largeObject.js';
import type { OpenOptions } from '../../src/largeObjects/largeObject.js';
import type { FakeLargeObjectDatabase } from './fakeLargeObjectDatabase.js';

/** Runs `fn` with a backend bound to one committed transaction. */
export const inScope = <T>(db: FakeLargeObjectDatabase, fn: (backend: PgLargeObjectBackend) => Promise<T>) =>
  withTransaction(db, (scope) => fn(new PgLargeObjectBackend(scope)));

/** Stores `data`, opens it with `options` and hands the handle to `fn`. */
export const withObject = async (
  db: FakeLargeObjectDatabase,
  data: string | Uint8Array,
  options: OpenOptions,
  fn: (lob: LargeObject) => Promise<void>,
): Promise<number> => {
  const objectId = db.put(data);
  await inScope(db, async (backend) => {
    const lob = await LargeObject.open(backend, objectId, options);
    await fn(lob);
  });
  return objectId;
};

export const isKind = (kind: LargeObjectErrorKind) => (error: unknown) => isLargeObjectError(error, kind);

/** Deterministic pseudo-random bytes. */
export const makePayload = (size: number, seed = 1): Buffer => {
  const payload = Buffer.alloc(size);
  let state = seed >>> 0;
  for (let i = 0; i < size; i += 1) {
    state = (Math.imul(state, 1_664_525) + 1_013_904_223) >>> 0;
    payload[i] = state >>> 24;
  }
  return payload;
};

export async function* chunksOf(data: Buffer, size: number): AsyncGenerator<Buffer> {
  for (let offset = 0; offset < data.length; offset += size) {
    yield data.subarray(offset, offset + size);
  }
}

export const countStatements = (db: FakeLargeObjectDatabase, prefix: string) =>
  db.statements.filter((statement) => statement.startsWith(prefix)).length;
