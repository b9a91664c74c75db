export interface Env {
  nodeEnv: string;
  host: string;
  port: number;
  apiAdminToken: string;
  databaseUrl: string | undefined;
  largeObjects: {
    bufferSize: number;
    transferBufferSize: number;
    timeoutMs: number;
  };
}

const positiveInt = (value: string | undefined, name: string, fallback: number): number => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: ${value}`);
  }
  return parsed;
};

export const loadEnv = (source: NodeJS.ProcessEnv): Env => ({
  nodeEnv: source.NODE_ENV ?? 'development',
  host: source.HOST ?? '0.0.0.0',
  port: positiveInt(source.PORT, 'PORT', 3000),
  apiAdminToken: source.API_ADMIN_TOKEN ?? '',
  databaseUrl: source.DATABASE_URL || undefined,
  largeObjects: {
    bufferSize: positiveInt(source.LOB_BUFFER_SIZE, 'LOB_BUFFER_SIZE', 1_048_576),
    transferBufferSize: positiveInt(source.LOB_TRANSFER_BUFFER_SIZE, 'LOB_TRANSFER_BUFFER_SIZE', 65_536),
    timeoutMs: positiveInt(source.LOB_TRANSFER_TIMEOUT_MS, 'LOB_TRANSFER_TIMEOUT_MS', 60_000),
  },
});

export const requireDatabaseUrl = (env: Env): string => {
  if (!env.databaseUrl) {
    throw new Error('Missing required DATABASE_URL');
  }
  return env.databaseUrl;
};
