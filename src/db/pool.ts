import { Pool } from 'pg';

export const createPool = (connectionString: string) =>
  new Pool({
    connectionString,
    max: 25,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
  });
