/**
 * Environment configuration
 *
 * GEMINI_API_KEY and BANNERBEAR_API_KEY are required; without them the
 * assistant cannot decide or render anything. Listing lookup (RESO_*) and
 * image uploads (GCS_BUCKET) are optional and degrade per feature.
 */

export const CORE_ENV_KEYS = ["GEMINI_API_KEY", "BANNERBEAR_API_KEY"] as const;

export class ConfigurationError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required configuration: ${missing.join(", ")}`);
    this.name = "ConfigurationError";
    this.missing = missing;
  }
}

export function readEnv(name: string): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function getEnvInt(name: string, fallback: number): number {
  const raw = readEnv(name);
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

export interface AppConfig {
  geminiApiKey: string | null;
  bannerbearApiKey: string | null;
  bannerbearApiUrl: string;
  resoEndpoint: string | null;
  resoApiKey: string | null;
  resoIdField: string;
  gcsBucket: string | null;
  renderPoll: {
    maxAttempts: number;
    intervalMs: number;
    maxIntervalMs: number;
  };
  sessionTtlMs: number;
}

export function loadAppConfig(): AppConfig {
  return {
    geminiApiKey: readEnv("GEMINI_API_KEY") ?? null,
    bannerbearApiKey: readEnv("BANNERBEAR_API_KEY") ?? null,
    bannerbearApiUrl: (readEnv("BANNERBEAR_API_URL") ?? "https://api.bannerbear.com/v2").replace(/\/+$/, ""),
    resoEndpoint: readEnv("RESO_API_ENDPOINT")?.replace(/\/+$/, "") ?? null,
    resoApiKey: readEnv("RESO_API_KEY") ?? null,
    resoIdField: readEnv("RESO_ID_FIELD") ?? "ListingId",
    gcsBucket: readEnv("GCS_BUCKET") ?? null,
    renderPoll: {
      maxAttempts: getEnvInt("RENDER_POLL_MAX_ATTEMPTS", 20),
      intervalMs: getEnvInt("RENDER_POLL_INTERVAL_MS", 1500),
      maxIntervalMs: getEnvInt("RENDER_POLL_MAX_INTERVAL_MS", 5000),
    },
    sessionTtlMs: getEnvInt("SESSION_TTL_MS", 2 * 60 * 60 * 1000),
  };
}

/**
 * Throws ConfigurationError listing every missing core key.
 */
export function assertCoreConfig(): void {
  const missing = CORE_ENV_KEYS.filter((key) => !readEnv(key));
  if (missing.length > 0) {
    throw new ConfigurationError([...missing]);
  }
}
