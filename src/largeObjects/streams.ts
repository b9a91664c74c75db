/** A push-based sink for byte chunks. */
export interface ByteChunkConsumer {
  write(chunk: Uint8Array): Promise<void>;
  /** Called once after the last chunk of a stream that completed normally. */
  end(): Promise<void>;
  /** Called when the stream terminated early; never rejects. */
  abort(reason?: unknown): Promise<void>;
}

/** Anything that yields bytes: one buffer, or a (possibly async) sequence of chunks. */
export type ByteSource = Uint8Array | Iterable<Uint8Array | string> | AsyncIterable<Uint8Array | string>;

export function* rechunk(buffer: Uint8Array, size: number): Generator<Uint8Array> {
  if (!Number.isSafeInteger(size) || size <= 0) {
    throw new RangeError(`chunk size must be a positive integer, got ${size}`);
  }
  for (let offset = 0; offset < buffer.byteLength; offset += size) {
    yield buffer.subarray(offset, Math.min(offset + size, buffer.byteLength));
  }
}

const toBytes = (chunk: Uint8Array | string): Uint8Array =>
  typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;

/**
 * Normalizes a {@link ByteSource} into an async sequence of chunks. A single
 * buffer is split into `chunkSize` pieces so no single write exceeds it.
 */
export async function* iterateChunks(source: ByteSource, chunkSize: number): AsyncGenerator<Uint8Array> {
  if (source instanceof Uint8Array) {
    yield* rechunk(source, chunkSize);
    return;
  }
  for await (const chunk of source) {
    yield toBytes(chunk);
  }
}

export const drainInto = async (
  source: AsyncIterable<Uint8Array> | Iterable<Uint8Array>,
  consumer: ByteChunkConsumer,
): Promise<void> => {
  try {
    for await (const chunk of source) {
      await consumer.write(chunk);
    }
  } catch (error) {
    await consumer.abort(error);
    throw error;
  }
  await consumer.end();
};

export const collect = async (source: AsyncIterable<Uint8Array> | Iterable<Uint8Array>): Promise<Buffer> => {
  const chunks: Buffer[] = [];
  for await (const chunk of source) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
};
