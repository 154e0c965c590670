/**
 * Clamp to [0, 1]; NaN and infinities read as 0
 */
export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
