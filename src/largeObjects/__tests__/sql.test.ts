import assert from 'node:assert/strict';
import { largeObjectSql, lockLargeObject, unlinkReferencedObjects } from '../sql.js';
import { LargeObjectError } from '../errors.js';
import type { QueryResultLike, Queryable } from '../../db/queryable.js';

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

await test('fragments name one server function per primitive', () => {
  assert.equal(largeObjectSql.create(), 'lo_create(0)');
  assert.equal(largeObjectSql.create('$1'), 'lo_create($1)');
  assert.equal(largeObjectSql.unlink('u.object_id'), 'lo_unlink(u.object_id)');
  assert.equal(largeObjectSql.open('$1', '262144'), 'lo_open($1, 262144)');
  assert.equal(largeObjectSql.close('$1'), 'lo_close($1)');
  assert.equal(largeObjectSql.write('$1', '$2'), 'lowrite($1, $2)');
  assert.equal(largeObjectSql.read('$1', '$2'), 'loread($1, $2)');
  assert.equal(largeObjectSql.seek('$1', '$2', '$3'), 'lo_lseek64($1, $2, $3)');
  assert.equal(largeObjectSql.tell('$1'), 'lo_tell64($1)');
  assert.equal(largeObjectSql.resize('$1', '$2'), 'lo_truncate64($1, $2)');
  assert.deepEqual(Object.keys(largeObjectSql), [
    'create', 'unlink', 'open', 'close', 'write', 'read', 'seek', 'tell', 'resize',
  ]);
});

await test('unlinkReferencedObjects removes matching objects in one statement', async () => {
  const calls: Array<{ text: string; values?: unknown[] }> = [];
  const db: Queryable = {
    query: async (text, values): Promise<QueryResultLike> => {
      calls.push({ text, values });
      return { rows: [{ unlinked: 1 }, { unlinked: 1 }] };
    },
  };
  const removed = await unlinkReferencedObjects(db, {
    table: 'uploads',
    column: 'object_id',
    where: 'user_id = $1',
    params: ['user-1'],
  });
  assert.equal(removed, 2);
  assert.deepEqual(calls, [
    {
      text: 'SELECT lo_unlink("object_id") AS unlinked FROM "uploads" WHERE user_id = $1',
      values: ['user-1'],
    },
  ]);
});

await test('unlinkReferencedObjects escapes identifiers and works without a filter', async () => {
  const texts: string[] = [];
  const db: Queryable = {
    query: async (text) => {
      texts.push(text);
      return { rows: [] };
    },
  };
  assert.equal(await unlinkReferencedObjects(db, { table: 'odd"table', column: 'oid' }), 0);
  assert.deepEqual(texts, ['SELECT lo_unlink("oid") AS unlinked FROM "odd""table"']);
});

await test('unlinkReferencedObjects reports a dangling reference as NotFound', async () => {
  const db: Queryable = {
    query: async () => {
      throw Object.assign(new Error('large object 16390 does not exist'), { code: '42704' });
    },
  };
  await assert.rejects(unlinkReferencedObjects(db, { table: 'uploads', column: 'object_id' }), (error: unknown) => {
    assert.ok(error instanceof LargeObjectError);
    assert.equal(error.kind, 'NotFound');
    assert.equal(error.operation, 'unlinkReferenced');
    assert.equal(error.message, 'unlinkReferenced failed on large object: large object 16390 does not exist');
    return true;
  });
});

await test('lockLargeObject takes a transaction advisory lock on the object id', async () => {
  const calls: Array<{ text: string; values?: unknown[] }> = [];
  const db: Queryable = {
    query: async (text, values) => {
      calls.push({ text, values });
      return { rows: [{ locked: '' }] };
    },
  };
  await lockLargeObject(db, 16_384);
  assert.deepEqual(calls, [{ text: 'SELECT pg_advisory_xact_lock($1) AS locked', values: [16_384] }]);
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
