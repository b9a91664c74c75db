import assert from 'node:assert/strict';
import { LargeObjectStore } from '../store.js';
import { LargeObjectUploadWriter, UploadOffsetError } from '../uploadWriter.js';
import { FakeLargeObjectDatabase, pgError } from '../../../tests/support/fakeLargeObjectDatabase.js';
import { countStatements, makePayload } from '../../../tests/support/fixtures.js';

let passed = 0;
let failed = 0;

const test = async (name: string, fn: () => Promise<void> | void) => {
  try {
    await fn();
    passed += 1;
  } catch (error) {
    failed += 1;
    console.error(`FAIL: ${name}`);
    console.error(`  ${error}`);
  }
};

const setup = () => {
  const db = new FakeLargeObjectDatabase();
  const writer = new LargeObjectUploadWriter(new LargeObjectStore(db));
  return { db, writer };
};

await test('init creates an empty object', async () => {
  const { db, writer } = setup();
  const state = await writer.init();
  assert.deepEqual(state, { objectId: 16_384, bytesWritten: 0 });
  assert.deepEqual(db.get(state.objectId), Buffer.alloc(0));
  assert.deepEqual(writer.meta(state), state);
});

await test('every chunk is appended in its own transaction', async () => {
  const { db, writer } = setup();
  const payload = makePayload(1_048_576, 9);
  let state = await writer.init();
  for (let offset = 0; offset < payload.length; offset += 100_000) {
    state = await writer.writeChunk(payload.subarray(offset, offset + 100_000), state);
  }
  assert.equal(state.bytesWritten, payload.length);
  assert.equal(db.get(state.objectId)?.equals(payload), true);
  assert.equal(countStatements(db, 'BEGIN'), 12);
  assert.equal(countStatements(db, 'COMMIT'), 12);
});

await test('a failed chunk rolls back only itself', async () => {
  const { db, writer } = setup();
  const first = await writer.writeChunk(Buffer.from('abc'), await writer.init());
  db.failNext(/lowrite/, pgError('53100', 'could not extend file'));
  await assert.rejects(writer.writeChunk(Buffer.from('def'), first), /could not extend file/);
  assert.equal(db.get(first.objectId)?.toString(), 'abc');

  const second = await writer.writeChunk(Buffer.from('def'), first);
  assert.deepEqual(second, { objectId: first.objectId, bytesWritten: 6 });
  assert.equal(db.get(first.objectId)?.toString(), 'abcdef');
});

await test('close keeps a finished upload and removes a cancelled one', async () => {
  const { db, writer } = setup();
  const finished = await writer.writeChunk(Buffer.from('kept'), await writer.init());
  assert.deepEqual(await writer.close(finished, 'done'), finished);
  assert.equal(db.get(finished.objectId)?.toString(), 'kept');

  const cancelled = await writer.writeChunk(Buffer.from('dropped'), await writer.init());
  await writer.close(cancelled, 'cancel');
  assert.equal(db.objects.has(cancelled.objectId), false);
  await writer.close(cancelled, 'cancel');

  const errored = await writer.init();
  await writer.close(errored, { error: new Error('client went away') });
  assert.equal(db.objects.has(errored.objectId), false);
});

await test('writeChunkAt appends when the offset matches the object size', async () => {
  const { db, writer } = setup();
  const first = await writer.writeChunkAt(Buffer.from('abc'), await writer.init());
  const second = await writer.writeChunkAt(Buffer.from('def'), first);
  assert.deepEqual(second, { objectId: 16_384, bytesWritten: 6 });
  assert.equal(db.get(16_384)?.toString(), 'abcdef');
  assert.equal(countStatements(db, 'SELECT pg_advisory_xact_lock'), 2);
});

await test('writeChunkAt rejects a stale offset and writes nothing', async () => {
  const { db, writer } = setup();
  const started = await writer.init();
  await writer.writeChunkAt(Buffer.from('abc'), started);
  await assert.rejects(writer.writeChunkAt(Buffer.from('abc'), started), (error: unknown) => {
    assert.ok(error instanceof UploadOffsetError);
    assert.equal(error.offset, 0);
    assert.equal(error.size, 3);
    assert.equal(error.message, 'offset 0 does not match uploaded size 3');
    return true;
  });
  assert.equal(db.get(started.objectId)?.toString(), 'abc');
  assert.equal(db.statements.at(-1), 'ROLLBACK');
});

await test('concurrent writeChunkAt calls for one offset append once', async () => {
  const { db, writer } = setup();
  const started = await writer.init();
  const results = await Promise.allSettled([
    writer.writeChunkAt(Buffer.from('xyz'), started),
    writer.writeChunkAt(Buffer.from('xyz'), started),
  ]);
  assert.deepEqual(results.map((result) => result.status).sort(), ['fulfilled', 'rejected']);
  const rejected = results.find((result) => result.status === 'rejected');
  assert.ok(rejected?.status === 'rejected' && rejected.reason instanceof UploadOffsetError);
  assert.equal(db.get(started.objectId)?.toString(), 'xyz');
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
