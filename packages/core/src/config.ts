/** Records per message when chunking by count. */
export const DEFAULT_CHUNK_SIZE = 1000;

/** Payload ceiling of the accounting service's POST endpoint (256 KiB). */
export const DEFAULT_MAX_PAYLOAD_BYTES = 256 * 1024;

/** tslog level names, indexed by level id. */
export const LOG_LEVELS = [
  "silly",
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const v = value?.trim();
  if (!v || !/^\d+$/.test(v)) return fallback;
  const parsed = Number.parseInt(v, 10);
  return parsed > 0 ? parsed : fallback;
}

/** Resolve the chunk size, respecting AMIE_USAGE_CHUNK_SIZE env var. */
export function resolveChunkSize(
  env: Record<string, string | undefined> = process.env,
): number {
  return parsePositiveInt(env.AMIE_USAGE_CHUNK_SIZE, DEFAULT_CHUNK_SIZE);
}

/** Resolve the payload ceiling in bytes, respecting AMIE_USAGE_MAX_PAYLOAD_BYTES env var. */
export function resolveMaxPayloadBytes(
  env: Record<string, string | undefined> = process.env,
): number {
  return parsePositiveInt(env.AMIE_USAGE_MAX_PAYLOAD_BYTES, DEFAULT_MAX_PAYLOAD_BYTES);
}

/**
 * Resolve the minimum log level id.
 *
 * AMIE_USAGE_LOG_LEVEL takes a level name ("debug") or id ("2"). Without it,
 * production logs from info upwards and everything else logs all levels.
 */
export function resolveLogLevel(
  env: Record<string, string | undefined> = process.env,
): number {
  const fallback = env.NODE_ENV === "production" ? 3 : 0;
  const v = env.AMIE_USAGE_LOG_LEVEL?.trim().toLowerCase();
  if (!v) return fallback;

  const byName = LOG_LEVELS.findIndex((name) => name === v);
  if (byName !== -1) return byName;

  if (/^\d$/.test(v)) {
    const id = Number(v);
    if (id < LOG_LEVELS.length) return id;
  }
  return fallback;
}
