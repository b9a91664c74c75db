import { isLargeObjectError } from './errors.js';
import { withLargeObject } from './largeObject.js';
import type { LargeObjectStore } from './store.js';

export interface UploadWriterState {
  objectId: number;
  bytesWritten: number;
}

export type UploadCloseReason = 'done' | 'cancel' | { error: unknown };

/** The object no longer ends where the upload expected to continue. */
export class UploadOffsetError extends Error {
  constructor(
    readonly objectId: number,
    readonly offset: number,
    readonly size: number,
  ) {
    super(`offset ${offset} does not match uploaded size ${size}`);
    this.name = 'UploadOffsetError';
  }
}

/**
 * Streams an upload into a large object chunk by chunk. No transaction spans
 * the whole upload: the object is created in one, and every chunk is appended
 * in a fresh one, so a failed chunk only rolls back itself.
 */
export class LargeObjectUploadWriter {
  constructor(private readonly store: LargeObjectStore) {}

  async init(): Promise<UploadWriterState> {
    const objectId = await this.store.transaction(async (objects) => {
      const lob = await objects.create({ mode: 'write' });
      await lob.close();
      return lob.objectId;
    });
    return { objectId, bytesWritten: 0 };
  }

  meta(state: UploadWriterState): UploadWriterState {
    return state;
  }

  async writeChunk(data: Uint8Array, state: UploadWriterState): Promise<UploadWriterState> {
    await this.store.transaction((objects) =>
      withLargeObject(
        () => objects.open(state.objectId, { mode: 'append' }),
        (lob) => lob.write(data),
      ),
    );
    return { ...state, bytesWritten: state.bytesWritten + data.byteLength };
  }

  /**
   * Like {@link writeChunk}, but appends only when the object is exactly
   * `state.bytesWritten` bytes long. The check and the write share one
   * transaction, and an advisory lock orders concurrent writers to the same
   * object, so a replayed chunk is rejected instead of appended twice.
   */
  async writeChunkAt(data: Uint8Array, state: UploadWriterState): Promise<UploadWriterState> {
    await this.store.transaction(async (objects) => {
      await objects.lock(state.objectId);
      await withLargeObject(
        () => objects.open(state.objectId, { mode: 'append' }),
        async (lob) => {
          const size = await lob.tell();
          if (size !== state.bytesWritten) {
            throw new UploadOffsetError(state.objectId, state.bytesWritten, size);
          }
          await lob.write(data);
        },
      );
    });
    return { ...state, bytesWritten: state.bytesWritten + data.byteLength };
  }

  /** Finishes the upload; a cancelled or failed one has its partial object removed. */
  async close(state: UploadWriterState, reason: UploadCloseReason): Promise<UploadWriterState> {
    if (reason === 'done') {
      return state;
    }
    try {
      await this.store.removeObject(state.objectId);
    } catch (error) {
      if (!isLargeObjectError(error, 'NotFound')) {
        throw error;
      }
    }
    const detail = reason === 'cancel' ? 'cancelled' : 'failed';
    console.info(`[upload] ${detail} upload removed large object ${state.objectId}`);
    return state;
  }
}
