import { Readable } from 'node:stream';
import { INV_READ, INV_WRITE, SeekWhence } from './bindings.js';
import type { LargeObjectBackend } from './bindings.js';
import { LargeObjectError } from './errors.js';
import type { ByteChunkConsumer } from './streams.js';

// The server-side docs advise moving at most a few megabytes per call.
export const DEFAULT_BUFFER_SIZE = 1_048_576;

export type OpenMode = 'read' | 'write' | 'readWrite' | 'append';
export type SeekAnchor = 'start' | 'current' | 'end';

export interface OpenOptions {
  mode?: OpenMode;
  bufferSize?: number;
}

const MODE_FLAGS: Record<OpenMode, number> = {
  read: INV_READ,
  write: INV_WRITE,
  readWrite: INV_READ | INV_WRITE,
  append: INV_READ | INV_WRITE,
};

const ANCHORS: Record<SeekAnchor, SeekWhence> = {
  start: SeekWhence.Start,
  current: SeekWhence.Current,
  end: SeekWhence.End,
};

const isOpenMode = (value: unknown): value is OpenMode =>
  typeof value === 'string' && Object.hasOwn(MODE_FLAGS, value);

const isSeekAnchor = (value: unknown): value is SeekAnchor =>
  typeof value === 'string' && Object.hasOwn(ANCHORS, value);

const assertObjectId = (objectId: number) => {
  if (!Number.isSafeInteger(objectId) || objectId <= 0) {
    throw new LargeObjectError('InvalidArgument', `object id must be a positive integer, got ${objectId}`);
  }
};

const resolveBufferSize = (bufferSize: number | undefined) => {
  const resolved = bufferSize ?? DEFAULT_BUFFER_SIZE;
  if (!Number.isSafeInteger(resolved) || resolved <= 0) {
    throw new LargeObjectError('InvalidArgument', `buffer size must be a positive integer, got ${resolved}`);
  }
  return resolved;
};

/**
 * An opened large object. The descriptor belongs to the transaction it was
 * opened in: the server closes it when that transaction ends, so a handle must
 * never be kept past its scope.
 *
 * The read/write position lives on the server. Nothing is cached here, so
 * `tell()` and `size()` always round-trip.
 *
 * Iterating the handle reads it front to back in `bufferSize` chunks and closes
 * it afterwards; iteration is single-pass.
 */
export class LargeObject implements AsyncIterable<Buffer> {
  private closed = false;

  private constructor(
    readonly backend: LargeObjectBackend,
    readonly objectId: number,
    readonly descriptor: number,
    readonly bufferSize: number,
    readonly mode: OpenMode,
  ) {}

  /** Allocates a new, empty object and opens it (read/write unless told otherwise). */
  static async create(backend: LargeObjectBackend, options: OpenOptions = {}): Promise<LargeObject> {
    if (options.mode !== undefined && !isOpenMode(options.mode)) {
      throw new LargeObjectError('InvalidMode', `invalid mode: ${String(options.mode)}`);
    }
    const objectId = await backend.create(0);
    return LargeObject.open(backend, objectId, { ...options, mode: options.mode ?? 'readWrite' });
  }

  static async open(backend: LargeObjectBackend, objectId: number, options: OpenOptions = {}): Promise<LargeObject> {
    assertObjectId(objectId);
    const mode = options.mode ?? 'read';
    if (!isOpenMode(mode)) {
      throw new LargeObjectError('InvalidMode', `invalid mode: ${String(mode)}`, { objectId });
    }
    const bufferSize = resolveBufferSize(options.bufferSize);

    const descriptor = await backend.open(objectId, MODE_FLAGS[mode]);
    const lob = new LargeObject(backend, objectId, descriptor, bufferSize, mode);
    if (mode === 'append') {
      await lob.seek(0, 'end');
    }
    return lob;
  }

  /** Deletes the object and its data, whether or not it is open anywhere. */
  static async remove(backend: LargeObjectBackend, objectId: number): Promise<void> {
    assertObjectId(objectId);
    await backend.unlink(objectId);
  }

  get isClosed() {
    return this.closed;
  }

  async close(): Promise<void> {
    await this.backend.close(this.descriptor);
    this.closed = true;
  }

  read(length: number = this.bufferSize): Promise<Buffer> {
    return this.backend.read(this.descriptor, length);
  }

  write(data: Uint8Array): Promise<void> {
    return this.backend.write(this.descriptor, data);
  }

  /**
   * Moves the position and returns it as an absolute offset. Offsets from the
   * start must not be negative, offsets from the end must not be positive.
   */
  async seek(offset: number, anchor: SeekAnchor = 'start'): Promise<number> {
    if (!isSeekAnchor(anchor)) {
      throw new LargeObjectError('InvalidArgument', `invalid seek anchor: ${String(anchor)}`, {
        objectId: this.objectId,
        descriptor: this.descriptor,
      });
    }
    if ((anchor === 'start' && offset < 0) || (anchor === 'end' && offset > 0)) {
      throw new LargeObjectError('InvalidOffset', `invalid offset ${offset} relative to ${anchor}`, {
        operation: 'seek',
        objectId: this.objectId,
        descriptor: this.descriptor,
      });
    }
    return this.backend.seek(this.descriptor, offset, ANCHORS[anchor]);
  }

  tell(): Promise<number> {
    return this.backend.tell(this.descriptor);
  }

  async size(): Promise<number> {
    const position = await this.tell();
    const size = await this.seek(0, 'end');
    const restored = await this.seek(position, 'start');
    if (restored !== position) {
      throw new LargeObjectError('InvalidOffset', `failed to restore position ${position} (now ${restored})`, {
        operation: 'size',
        objectId: this.objectId,
        descriptor: this.descriptor,
      });
    }
    return size;
  }

  /** Truncates or zero-extends the object to exactly `size` bytes; the position is left alone. */
  resize(size: number): Promise<void> {
    return this.backend.resize(this.descriptor, size);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Buffer, void, undefined> {
    try {
      while (true) {
        const chunk = await this.read();
        if (chunk.length === 0) {
          return;
        }
        yield chunk;
      }
    } finally {
      await this.close();
    }
  }

  toReadable(): Readable {
    return Readable.from(this, { objectMode: false });
  }

  /**
   * Sink writing every chunk at the current position. `end()` closes the
   * handle; `abort()` tries to and logs when it cannot.
   */
  writer(): ByteChunkConsumer {
    return {
      write: (chunk) => this.write(chunk),
      end: () => this.close(),
      abort: async (reason) => {
        if (this.closed) {
          return;
        }
        try {
          await this.close();
        } catch (error) {
          console.warn(`[lob] failed to close large object ${this.objectId} after abort`, { reason, error });
        }
      },
    };
  }

  /** Number of `bufferSize` chunks the object currently spans. */
  async count(): Promise<number> {
    const size = await this.size();
    return Math.ceil(size / this.bufferSize);
  }

  async chunkAt(index: number): Promise<Buffer> {
    if (!Number.isSafeInteger(index) || index < 0) {
      throw new LargeObjectError('InvalidArgument', `chunk index must be a non-negative integer, got ${index}`);
    }
    await this.seek(index * this.bufferSize, 'start');
    return this.read();
  }

  /** Reads the chunks at `start`, `start + step`, ... below `start + length`, seeking before each one. */
  async slice(start: number, length: number, step = 1): Promise<Buffer[]> {
    if (!Number.isSafeInteger(step) || step <= 0) {
      throw new LargeObjectError('InvalidArgument', `step must be a positive integer, got ${step}`);
    }
    const chunks: Buffer[] = [];
    for (let i = 0; i < length; i += step) {
      chunks.push(await this.chunkAt(start + i));
    }
    return chunks;
  }
}

/**
 * Runs `fn` with a freshly acquired handle and closes it on the way out,
 * unless `fn` already did (for instance by iterating it to the end).
 */
export const withLargeObject = async <T>(
  acquire: () => Promise<LargeObject>,
  fn: (lob: LargeObject) => Promise<T>,
): Promise<T> => {
  const lob = await acquire();
  let result: T;
  try {
    result = await fn(lob);
  } catch (error) {
    if (!lob.isClosed) {
      await lob.close().catch((closeError: unknown) => {
        console.warn(`[lob] failed to close large object ${lob.objectId}`, closeError);
      });
    }
    throw error;
  }
  if (!lob.isClosed) {
    await lob.close();
  }
  return result;
};
