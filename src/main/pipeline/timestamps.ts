/**
 * Timestamp helpers for `[TIMESTAMP: ...]` tags.
 */

/**
 * Convert "MM:SS" or "HH:MM:SS" to seconds.
 *
 * Any other shape, or a non-numeric part, yields 0 instead of throwing.
 * TODO: decide whether a malformed time should leave the tag unresolved
 * rather than snapshot the first frame.
 */
export function timeStringToSeconds(time: string): number {
  const parts = time.trim().split(':').map((part) => Number.parseInt(part, 10));
  if (parts.some((part) => Number.isNaN(part))) {
    return 0;
  }

  if (parts.length === 2) {
    const [minutes, seconds] = parts;
    return minutes * 60 + seconds;
  }
  if (parts.length === 3) {
    const [hours, minutes, seconds] = parts;
    return hours * 3600 + minutes * 60 + seconds;
  }
  return 0;
}

/**
 * Format seconds as MM:SS, or HH:MM:SS from one hour up (e.g. 90 -> "01:30").
 */
export function formatTimestamp(totalSeconds: number): string {
  const whole = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const seconds = whole % 60;
  const pad = (n: number) => n.toString().padStart(2, '0');

  return hours > 0
    ? `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`
    : `${pad(minutes)}:${pad(seconds)}`;
}
