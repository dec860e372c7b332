export const DEFAULT_TTL_HOURS = 20;

const HOUR_MS = 60 * 60 * 1000;

/**
 * Returns `raw` when it is a finite positive number, otherwise the
 * default TTL.
 */
export function resolveTtlHours(raw: number | undefined): number {
  if (raw === undefined) return DEFAULT_TTL_HOURS;
  if (!Number.isFinite(raw) || raw <= 0) return DEFAULT_TTL_HOURS;
  return raw;
}

/**
 * Decides whether the stored artifact is old enough to refresh.
 *
 * - no previous artifact → refresh
 * - age >= ttlHours      → refresh
 * - otherwise (including a timestamp ahead of `now`) → skip
 *
 * Pure function, no I/O.
 */
export function shouldRefresh(
  lastArtifactTimestamp: Date | null,
  ttlHours: number,
  now: Date,
): boolean {
  if (lastArtifactTimestamp === null) return true;

  const ageMs = now.getTime() - lastArtifactTimestamp.getTime();
  return ageMs >= resolveTtlHours(ttlHours) * HOUR_MS;
}

/** Artifact age in hours, rounded to two decimals. */
export function artifactAgeHours(lastArtifactTimestamp: Date, now: Date): number {
  const hours = (now.getTime() - lastArtifactTimestamp.getTime()) / HOUR_MS;
  return Math.round(hours * 100) / 100;
}
