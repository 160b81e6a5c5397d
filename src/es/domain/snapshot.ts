/**
 * Snapshot policy: take one whenever an append moves the stream across a
 * multiple of `every`. A multi-event batch can skip the exact multiple
 * (23 -> 26 with every=25), so this compares buckets rather than `v % n`.
 */
export function shouldTakeSnapshot(fromVersion: number, toVersion: number, every: number): boolean {
  const from = Number(fromVersion);
  const to = Number(toVersion);
  const n = Number(every);

  if (!Number.isFinite(from) || !Number.isFinite(to) || !Number.isFinite(n)) return false;
  if (n <= 0 || to <= 0 || to <= from) return false;

  return Math.floor(to / n) > Math.floor(from / n);
}
