import type { Queryable } from '../db/queryable.js';
import { readColumn } from '../db/queryable.js';
import { LargeObjectError, fromPgError } from './errors.js';
import { largeObjectSql } from './sql.js';
import type { LargeObjectPrimitive } from './sql.js';

// Values from libpq/libpq-fs.h; they travel over the wire as-is.
export const INV_READ = 0x00040000;
export const INV_WRITE = 0x00020000;

export enum SeekWhence {
  Start = 0,
  Current = 1,
  End = 2,
}

/**
 * Primitive large object operations. Every method is a single round trip and
 * rejects with a {@link LargeObjectError} for the failures the server reports
 * about objects and descriptors.
 */
export interface LargeObjectBackend {
  create(desiredId: number): Promise<number>;
  unlink(objectId: number): Promise<void>;
  open(objectId: number, flags: number): Promise<number>;
  close(descriptor: number): Promise<void>;
  write(descriptor: number, data: Uint8Array): Promise<void>;
  read(descriptor: number, length: number): Promise<Buffer>;
  seek(descriptor: number, offset: number, whence: SeekWhence): Promise<number>;
  tell(descriptor: number): Promise<number>;
  resize(descriptor: number, size: number): Promise<void>;
}

// int4 and oid columns come back as numbers, int8 ones as strings.
const toSafeInteger = (value: unknown, label: string): number => {
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed)) {
    throw new Error(`Unexpected ${label} returned by server: ${String(value)}`);
  }
  return parsed;
};

const STATEMENTS = {
  create: `SELECT ${largeObjectSql.create('$1')} AS oid`,
  unlink: `SELECT ${largeObjectSql.unlink('$1')} AS result`,
  open: `SELECT ${largeObjectSql.open('$1', '$2')} AS fd`,
  close: `SELECT ${largeObjectSql.close('$1')} AS result`,
  write: `SELECT ${largeObjectSql.write('$1', '$2')} AS written`,
  read: `SELECT ${largeObjectSql.read('$1', '$2')} AS data`,
  seek: `SELECT ${largeObjectSql.seek('$1', '$2', '$3')} AS position`,
  tell: `SELECT ${largeObjectSql.tell('$1')} AS position`,
  resize: `SELECT ${largeObjectSql.resize('$1', '$2')} AS result`,
} satisfies Record<LargeObjectPrimitive, string>;

const assertInteger = (value: number, name: string, min: number) => {
  if (!Number.isSafeInteger(value) || value < min) {
    throw new LargeObjectError('InvalidArgument', `${name} must be an integer >= ${min}, got ${value}`);
  }
};

export class PgLargeObjectBackend implements LargeObjectBackend {
  constructor(private readonly db: Queryable) {}

  private async call(
    text: string,
    values: unknown[],
    context: { operation: string; objectId?: number; descriptor?: number },
  ) {
    try {
      return await this.db.query(text, values);
    } catch (error) {
      throw fromPgError(error, context);
    }
  }

  async create(desiredId: number): Promise<number> {
    assertInteger(desiredId, 'desiredId', 0);
    const result = await this.call(STATEMENTS.create, [desiredId], {
      operation: 'create',
      objectId: desiredId > 0 ? desiredId : undefined,
    });
    return toSafeInteger(readColumn(result, 'oid'), 'object id');
  }

  async unlink(objectId: number): Promise<void> {
    assertInteger(objectId, 'objectId', 1);
    await this.call(STATEMENTS.unlink, [objectId], {
      operation: 'unlink',
      objectId,
    });
  }

  async open(objectId: number, flags: number): Promise<number> {
    assertInteger(objectId, 'objectId', 1);
    assertInteger(flags, 'flags', 0);
    const result = await this.call(STATEMENTS.open, [objectId, flags], {
      operation: 'open',
      objectId,
    });
    return toSafeInteger(readColumn(result, 'fd'), 'descriptor');
  }

  async close(descriptor: number): Promise<void> {
    assertInteger(descriptor, 'descriptor', 0);
    await this.call(STATEMENTS.close, [descriptor], {
      operation: 'close',
      descriptor,
    });
  }

  async write(descriptor: number, data: Uint8Array): Promise<void> {
    assertInteger(descriptor, 'descriptor', 0);
    const payload = Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    await this.call(STATEMENTS.write, [descriptor, payload], {
      operation: 'write',
      descriptor,
    });
  }

  async read(descriptor: number, length: number): Promise<Buffer> {
    assertInteger(descriptor, 'descriptor', 0);
    assertInteger(length, 'length', 0);
    const result = await this.call(STATEMENTS.read, [descriptor, length], {
      operation: 'read',
      descriptor,
    });
    const data = readColumn(result, 'data');
    if (!Buffer.isBuffer(data)) {
      throw new Error(`Unexpected read result for descriptor ${descriptor}`);
    }
    return data;
  }

  async seek(descriptor: number, offset: number, whence: SeekWhence): Promise<number> {
    assertInteger(descriptor, 'descriptor', 0);
    if (!Number.isSafeInteger(offset)) {
      throw new LargeObjectError('InvalidOffset', `offset must be an integer, got ${offset}`, { descriptor });
    }
    const result = await this.call(STATEMENTS.seek, [descriptor, offset, whence], { operation: 'seek', descriptor });
    return toSafeInteger(readColumn(result, 'position'), 'position');
  }

  async tell(descriptor: number): Promise<number> {
    assertInteger(descriptor, 'descriptor', 0);
    const result = await this.call(STATEMENTS.tell, [descriptor], {
      operation: 'tell',
      descriptor,
    });
    return toSafeInteger(readColumn(result, 'position'), 'position');
  }

  async resize(descriptor: number, size: number): Promise<void> {
    assertInteger(descriptor, 'descriptor', 0);
    assertInteger(size, 'size', 0);
    await this.call(STATEMENTS.resize, [descriptor, size], {
      operation: 'resize',
      descriptor,
    });
  }
}
