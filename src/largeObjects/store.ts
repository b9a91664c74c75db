import type { Writable } from 'node:stream';
import type { Connectable } from '../db/queryable.js';
import { DEFAULT_TRANSACTION_TIMEOUT_MS, withTransaction } from '../db/transaction.js';
import type { TransactionOptions, TransactionScope } from '../db/transaction.js';
import { PgLargeObjectBackend } from './bindings.js';
import type { LargeObjectBackend } from './bindings.js';
import { DEFAULT_BUFFER_SIZE, LargeObject, withLargeObject } from './largeObject.js';
import type { OpenOptions } from './largeObject.js';
import { lockLargeObject, unlinkReferencedObjects } from './sql.js';
import type { UnlinkReferencedOptions } from './sql.js';
import type { ByteSource } from './streams.js';
import { DEFAULT_TRANSFER_BUFFER_SIZE, exportLargeObject, importLargeObject } from './transfer.js';

export interface LargeObjectStoreDefaults {
  bufferSize: number;
  transferBufferSize: number;
  timeoutMs: number;
}

/** Large object operations bound to one open transaction. */
export interface ScopedLargeObjects {
  readonly backend: LargeObjectBackend;
  readonly scope: TransactionScope;
  create(options?: OpenOptions): Promise<LargeObject>;
  open(objectId: number, options?: OpenOptions): Promise<LargeObject>;
  remove(objectId: number): Promise<void>;
  /** Serializes this transaction with any other that locks the same object. */
  lock(objectId: number): Promise<void>;
  unlinkReferenced(options: UnlinkReferencedOptions): Promise<number>;
}

export class LargeObjectStore {
  readonly defaults: LargeObjectStoreDefaults;

  constructor(
    private readonly pool: Connectable,
    defaults: Partial<LargeObjectStoreDefaults> = {},
  ) {
    this.defaults = {
      bufferSize: defaults.bufferSize ?? DEFAULT_BUFFER_SIZE,
      transferBufferSize: defaults.transferBufferSize ?? DEFAULT_TRANSFER_BUFFER_SIZE,
      timeoutMs: defaults.timeoutMs ?? DEFAULT_TRANSACTION_TIMEOUT_MS,
    };
  }

  transaction<T>(fn: (objects: ScopedLargeObjects) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
    return withTransaction(
      this.pool,
      (scope) => {
        const backend = new PgLargeObjectBackend(scope);
        const withBufferSize = (openOptions: OpenOptions = {}): OpenOptions => ({
          ...openOptions,
          bufferSize: openOptions.bufferSize ?? this.defaults.bufferSize,
        });
        return fn({
          backend,
          scope,
          create: (openOptions) => LargeObject.create(backend, withBufferSize(openOptions)),
          open: (objectId, openOptions) => LargeObject.open(backend, objectId, withBufferSize(openOptions)),
          remove: (objectId) => LargeObject.remove(backend, objectId),
          lock: (objectId) => lockLargeObject(scope, objectId),
          unlinkReferenced: (unlinkOptions) => unlinkReferencedObjects(scope, unlinkOptions),
        });
      },
      { timeoutMs: options.timeoutMs ?? this.defaults.timeoutMs },
    );
  }

  importObject(source: ByteSource, options: { bufferSize?: number; timeoutMs?: number } = {}): Promise<number> {
    return importLargeObject(this.pool, source, {
      bufferSize: options.bufferSize ?? this.defaults.transferBufferSize,
      timeoutMs: options.timeoutMs ?? this.defaults.timeoutMs,
    });
  }

  exportObject(objectId: number, options?: { bufferSize?: number; timeoutMs?: number }): Promise<Buffer>;
  exportObject(objectId: number, options: { bufferSize?: number; timeoutMs?: number; sink: Writable }): Promise<void>;
  exportObject(
    objectId: number,
    options: { bufferSize?: number; timeoutMs?: number; sink?: Writable } = {},
  ): Promise<Buffer | void> {
    const bufferSize = options.bufferSize ?? this.defaults.transferBufferSize;
    const timeoutMs = options.timeoutMs ?? this.defaults.timeoutMs;
    if (options.sink) {
      return exportLargeObject(this.pool, objectId, { bufferSize, timeoutMs, sink: options.sink });
    }
    return exportLargeObject(this.pool, objectId, { bufferSize, timeoutMs });
  }

  removeObject(objectId: number): Promise<void> {
    return this.transaction((objects) => objects.remove(objectId));
  }

  sizeOf(objectId: number): Promise<number> {
    return this.transaction((objects) =>
      withLargeObject(
        () => objects.open(objectId, { mode: 'read' }),
        (lob) => lob.size(),
      ),
    );
  }
}
