import { Readable } from 'node:stream';
import { LargeObjectError } from '../largeObjects/errors.js';
import type { ByteSource } from '../largeObjects/streams.js';

export interface ObjectParams {
  objectId: string;
}

export const parseObjectId = (value: string): number => {
  const trimmed = String(value ?? '').trim();
  const parsed = /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new LargeObjectError('InvalidArgument', `invalid object id: ${trimmed}`);
  }
  return parsed;
};

export const parseNonNegativeInt = (value: unknown, name: string): number => {
  const raw = String(value ?? '').trim();
  const parsed = /^\d+$/.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isSafeInteger(parsed)) {
    throw new LargeObjectError('InvalidArgument', `${name} must be a non-negative integer`);
  }
  return parsed;
};

/** Request body as a byte source; octet-stream bodies arrive unbuffered. */
export const requireBinaryBody = (body: unknown): ByteSource => {
  if (body instanceof Readable || body instanceof Uint8Array) {
    return body;
  }
  if (body === undefined || body === null) {
    return Buffer.alloc(0);
  }
  throw new LargeObjectError('InvalidArgument', 'expected an application/octet-stream body');
};
