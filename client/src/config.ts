export interface ClientConfig {
  serverUrl: string;
  apiKey?: string;
  redisUrl?: string;
  progressChannel: string;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  return {
    serverUrl: (env.SERVER_URL || "http://localhost:8080").replace(/\/+$/, ""),
    apiKey: env.SERVER_API_KEY || undefined,
    redisUrl: env.REDIS_URL || undefined,
    progressChannel: env.PROGRESS_CHANNEL || "progress:transfers",
    maxRetries: intFromEnv(env.UPLOAD_MAX_RETRIES, 5),
    baseDelayMs: intFromEnv(env.UPLOAD_RETRY_BASE_MS, 1000),
    maxDelayMs: intFromEnv(env.UPLOAD_RETRY_MAX_MS, 30000),
  };
}
