/**
 * Clamp a numeric option into bounds; non-numbers and NaN fall back to the default.
 */
export const toBoundedInt = (value: unknown, fallback: number, bounds: { min: number; max?: number }): number => {
  if (typeof value !== 'number' || !Number.isFinite(value)) return fallback;
  const floored = Math.floor(value);
  const max = bounds.max ?? Number.POSITIVE_INFINITY;
  return Math.min(max, Math.max(bounds.min, floored));
};
