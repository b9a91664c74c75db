// Structural views of the parts of `pg` this package talks to. `Pool`,
// `PoolClient` and `Client` all satisfy them, and so do the test doubles.

export interface QueryResultLike {
  rows: unknown[];
  rowCount?: number | null;
}

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
}

export interface PoolClientLike extends Queryable {
  release(error?: Error | boolean): void;
}

export interface Connectable {
  connect(): Promise<PoolClientLike>;
}

export const readColumn = (result: QueryResultLike, column: string): unknown => {
  const row = result.rows[0];
  if (typeof row !== 'object' || row === null || !Object.hasOwn(row, column)) {
    throw new Error(`Expected a row with column "${column}"`);
  }
  const value: unknown = Reflect.get(row, column);
  return value;
};
