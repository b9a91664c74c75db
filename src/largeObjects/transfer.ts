import { pipeline } from 'node:stream/promises';
import type { Writable } from 'node:stream';
import type { Connectable } from '../db/queryable.js';
import { DEFAULT_TRANSACTION_TIMEOUT_MS, withTransaction } from '../db/transaction.js';
import { PgLargeObjectBackend } from './bindings.js';
import { LargeObject } from './largeObject.js';
import { collect, drainInto, iterateChunks } from './streams.js';
import type { ByteSource } from './streams.js';

export const DEFAULT_TRANSFER_BUFFER_SIZE = 65_536;

export interface ImportOptions {
  bufferSize?: number;
  timeoutMs?: number;
}

export interface ExportOptions {
  bufferSize?: number;
  timeoutMs?: number;
}

export interface ExportToSinkOptions extends ExportOptions {
  sink: Writable;
}

/**
 * Streams `source` into a newly created large object and returns its id. The
 * whole import is one transaction, so a failure part-way leaves no object
 * behind.
 */
export const importLargeObject = async (
  pool: Connectable,
  source: ByteSource,
  options: ImportOptions = {},
): Promise<number> => {
  const bufferSize = options.bufferSize ?? DEFAULT_TRANSFER_BUFFER_SIZE;

  return withTransaction(
    pool,
    async (scope) => {
      const lob = await LargeObject.create(new PgLargeObjectBackend(scope), { bufferSize });
      await drainInto(iterateChunks(source, bufferSize), lob.writer());
      return lob.objectId;
    },
    { timeoutMs: options.timeoutMs ?? DEFAULT_TRANSACTION_TIMEOUT_MS },
  );
};

/**
 * Reads a large object back. Without a sink the bytes are collected and
 * returned; with one they are piped into it and nothing is returned.
 */
export function exportLargeObject(pool: Connectable, objectId: number, options?: ExportOptions): Promise<Buffer>;
export function exportLargeObject(pool: Connectable, objectId: number, options: ExportToSinkOptions): Promise<void>;
export async function exportLargeObject(
  pool: Connectable,
  objectId: number,
  options: ExportOptions & { sink?: Writable } = {},
): Promise<Buffer | void> {
  const bufferSize = options.bufferSize ?? DEFAULT_TRANSFER_BUFFER_SIZE;
  const { sink } = options;

  return withTransaction(
    pool,
    async (scope) => {
      const lob = await LargeObject.open(new PgLargeObjectBackend(scope), objectId, { mode: 'read', bufferSize });
      if (!sink) {
        return collect(lob);
      }
      await pipeline(lob.toReadable(), sink);
      return undefined;
    },
    { timeoutMs: options.timeoutMs ?? DEFAULT_TRANSACTION_TIMEOUT_MS },
  );
}
