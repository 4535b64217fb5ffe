const DURATION_PATTERN = /^P(?:(\d+)D)?T?(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?$/;

/**
 * Parse ISO 8601 duration (PT4M13S) to a clock string (4:13).
 * Videos longer than a day come back as P1DT2H..., the days are folded into hours.
 */
export function decodeDuration(raw: string): string {
  const match = raw.trim().match(DURATION_PATTERN);
  if (!match) return '0:00';

  const [days, hours, minutes, seconds] = match.slice(1, 5).map(part => parseInt(part || '0', 10));
  // Carry overflowing components (PT100S) so the clock fields stay in range
  const total = ((days * 24 + hours) * 60 + minutes) * 60 + seconds;

  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const ss = (total % 60).toString().padStart(2, '0');
  if (h > 0) {
    return `${h}:${m.toString().padStart(2, '0')}:${ss}`;
  }
  return `${m}:${ss}`;
}
