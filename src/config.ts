function getEnvOrThrow(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function getNumberEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

const nodeEnv = getEnvOrDefault("NODE_ENV", "development");

export const config = {
  nodeEnv,
  isProduction: nodeEnv === "production",
  databaseUrl: getEnvOrDefault("DATABASE_URL", "file:./data/ecospark.db"),
  port: getNumberEnv("PORT", 8000),
  host: getEnvOrDefault("HOST", "0.0.0.0"),
  // Production must not fall back to the development pepper
  sessionSecret:
    nodeEnv === "production"
      ? getEnvOrThrow("SESSION_SECRET")
      : getEnvOrDefault("SESSION_SECRET", "dev-session-secret"),
  sessionTtlDays: getNumberEnv("SESSION_TTL_DAYS", 14),
  openRouterApiKey: getEnvOrDefault("OPENROUTER_API_KEY", ""),
  sentryDsn: getEnvOrDefault("SENTRY_DSN", ""),

  // Nearby search
  nearbyDefaultRadiusKm: 10,
  nearbyMinRadiusKm: 1,
  nearbyMaxRadiusKm: 50,

  // Credits
  pointsPerGramOfMetal: 10,
} as const;
