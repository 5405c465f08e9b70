// /src/lib/estimation/format.ts

export const MS_PER_MINUTE = 60_000;

export function minutesToMs(minutes: number): number {
  return minutes * MS_PER_MINUTE;
}

export function msToMinutes(ms: number): number {
  return ms / MS_PER_MINUTE;
}

/** Whole numbers print as-is, everything else with two decimals. */
export function formatQuantity(x: number): string {
  return Number.isInteger(x) ? String(x) : x.toFixed(2);
}

/**
 * Format a duration for humans (e.g., "45 min", "3h 20m").
 */
export function formatDuration(ms: number): string {
  const totalMinutes = Math.round(msToMinutes(ms));
  if (totalMinutes < 60) return `${totalMinutes} min`;
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return minutes === 0 ? `${hours}h` : `${hours}h ${minutes}m`;
}
