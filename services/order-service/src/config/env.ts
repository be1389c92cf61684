export interface OrderServiceEnv {
  port: number;
  databaseUrl?: string;
  redisUrl?: string;
  jwtSecret: string;
  firebaseServiceAccountBase64?: string;
  categoryCacheTtlSeconds: number;
  liveFeedWindow: number;
  liveFeedHeartbeatMs: number;
  recentOrdersLimit: number;
  submitIdempotencyTtlSeconds: number;
  exposeErrorDetails: boolean;
  sentryDsn?: string;
  appEnv: string;
}

function asNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function getOrderServiceEnv(): OrderServiceEnv {
  return {
    port: asNumber(process.env.ORDER_SERVICE_PORT, 4002),
    databaseUrl: process.env.ORDER_DATABASE_URL || process.env.DATABASE_URL,
    redisUrl: process.env.REDIS_URL,
    jwtSecret: process.env.AUTH_JWT_SECRET || "change-me-in-production",
    firebaseServiceAccountBase64: process.env.FIREBASE_SERVICE_ACCOUNT_BASE64,
    categoryCacheTtlSeconds: asNumber(process.env.CATEGORY_CACHE_TTL_SEC, 300),
    liveFeedWindow: asNumber(process.env.LIVE_FEED_WINDOW, 50),
    liveFeedHeartbeatMs: asNumber(process.env.LIVE_FEED_HEARTBEAT_MS, 30_000),
    recentOrdersLimit: asNumber(process.env.RECENT_ORDERS_LIMIT, 10),
    submitIdempotencyTtlSeconds: asNumber(process.env.SUBMIT_IDEMPOTENCY_TTL_SEC, 900),
    exposeErrorDetails: process.env.EXPOSE_ERROR_DETAILS === "true",
    sentryDsn: process.env.SENTRY_DSN_BACKEND,
    appEnv: process.env.APP_ENV || process.env.NODE_ENV || "local",
  };
}
