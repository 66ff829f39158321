export type BackoffOptions = {
  baseMs?: number;
  factor?: number;
  maxMs?: number;
  jitterRatio?: number;
  random?: () => number;
};

export type RetryBackoffConfig = Readonly<Required<Omit<BackoffOptions, 'random'>>>;

const DEFAULT_BACKOFF: RetryBackoffConfig = {
  baseMs: 1_000,
  factor: 2,
  maxMs: 60_000,
  jitterRatio: 0.2
};

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}

/**
 * Delay before retry number `attempt` (1-based): `baseMs * factor^(attempt - 1)`,
 * capped at `maxMs`, then spread by up to `jitterRatio` in either direction.
 * The jittered value never leaves `[baseMs, maxMs]`.
 */
export function computeExponentialBackoff(attempt: number, options: BackoffOptions = {}): number {
  const normalizedAttempt = Math.max(1, Math.floor(attempt));
  const {
    baseMs = DEFAULT_BACKOFF.baseMs,
    factor = DEFAULT_BACKOFF.factor,
    maxMs = DEFAULT_BACKOFF.maxMs,
    jitterRatio = DEFAULT_BACKOFF.jitterRatio,
    random = Math.random
  } = options;

  const cappedDelay = clamp(baseMs * Math.pow(factor, normalizedAttempt - 1), baseMs, maxMs);
  if (jitterRatio <= 0) {
    return Math.round(cappedDelay);
  }

  const jitter = (random() * 2 - 1) * cappedDelay * jitterRatio;
  return Math.round(clamp(cappedDelay + jitter, baseMs, maxMs));
}

function readPositive(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw.trim());
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function readRatio(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw.trim());
  return Number.isFinite(parsed) ? clamp(parsed, 0, 1) : fallback;
}

/**
 * Reads `<prefix>_BASE_MS`, `<prefix>_FACTOR`, `<prefix>_MAX_MS` and
 * `<prefix>_JITTER_RATIO`, falling back to `defaults` for unset or invalid values.
 */
export function resolveRetryBackoffConfig(
  prefix: string,
  defaults: Partial<RetryBackoffConfig> = {},
  env: Record<string, string | undefined> = process.env
): RetryBackoffConfig {
  const merged = { ...DEFAULT_BACKOFF, ...defaults };
  const baseMs = readPositive(env[`${prefix}_BASE_MS`], merged.baseMs);
  const maxMs = readPositive(env[`${prefix}_MAX_MS`], merged.maxMs);
  return Object.freeze({
    baseMs,
    factor: readPositive(env[`${prefix}_FACTOR`], merged.factor),
    maxMs: Math.max(baseMs, maxMs),
    jitterRatio: readRatio(env[`${prefix}_JITTER_RATIO`], merged.jitterRatio)
  });
}
