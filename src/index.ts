export { INV_READ, INV_WRITE, PgLargeObjectBackend, SeekWhence } from './largeObjects/bindings.js';
export type { LargeObjectBackend } from './largeObjects/bindings.js';
export { LargeObjectError, fromPgError, isLargeObjectError } from './largeObjects/errors.js';
export type { LargeObjectErrorContext, LargeObjectErrorKind } from './largeObjects/errors.js';
export { DEFAULT_BUFFER_SIZE, LargeObject, withLargeObject } from './largeObjects/largeObject.js';
export type { OpenMode, OpenOptions, SeekAnchor } from './largeObjects/largeObject.js';
export { largeObjectSql, lockLargeObject, unlinkReferencedObjects } from './largeObjects/sql.js';
export type { LargeObjectPrimitive, UnlinkReferencedOptions } from './largeObjects/sql.js';
export { collect, drainInto, iterateChunks, rechunk } from './largeObjects/streams.js';
export type { ByteChunkConsumer, ByteSource } from './largeObjects/streams.js';
export { LargeObjectStore } from './largeObjects/store.js';
export type { LargeObjectStoreDefaults, ScopedLargeObjects } from './largeObjects/store.js';
export { DEFAULT_TRANSFER_BUFFER_SIZE, exportLargeObject, importLargeObject } from './largeObjects/transfer.js';
export type { ExportOptions, ExportToSinkOptions, ImportOptions } from './largeObjects/transfer.js';
export { LargeObjectUploadWriter, UploadOffsetError } from './largeObjects/uploadWriter.js';
export type { UploadCloseReason, UploadWriterState } from './largeObjects/uploadWriter.js';
export { TransactionScope, TransactionTimeoutError, withTransaction } from './db/transaction.js';
export type { TransactionOptions } from './db/transaction.js';
export type { Connectable, PoolClientLike, Queryable } from './db/queryable.js';
export { buildApp } from './app.js';
