import type { EarningsIndex } from '../domain/index.js';

/**
 * Returns a copy of `value` with object keys sorted at every depth.
 * Arrays keep their order.
 */
export function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => canonicalize(item));
  }

  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, child]) => [key, canonicalize(child)] as const),
    );
  }

  return value;
}

/**
 * Canonical artifact text: sorted keys, two-space indent, trailing newline.
 * Identical indexes always produce identical bytes.
 */
export function serializeIndex(index: EarningsIndex): string {
  return `${JSON.stringify(canonicalize(index), null, 2)}\n`;
}

/**
 * True when `candidate` differs structurally from `previous`.
 *
 * A missing previous index always counts as a change. Key iteration
 * order and formatting never do.
 */
export function hasChanged(previous: EarningsIndex | null, candidate: EarningsIndex): boolean {
  if (previous === null) return true;
  return serializeIndex(previous) !== serializeIndex(candidate);
}
