/**
 * Date helpers for artifact names and progress output.
 */

/**
 * Format a date as `YYYYMMDD_HHMMSS` (UTC) for use in file names.
 */
export function formatFileTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15)
}

/**
 * Format a duration in seconds in human-readable form.
 */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds))
  if (total < 60) return `${total}s`
  const minutes = Math.floor(total / 60)
  const remainingSecs = total % 60
  if (minutes < 60) return `${minutes}m ${remainingSecs}s`
  const hours = Math.floor(minutes / 60)
  const remainingMins = minutes % 60
  return `${hours}h ${remainingMins}m`
}
