/**
 * RFC 2822 date formatting for changelog trailers.
 *
 * dpkg-parsechangelog expects `Ddd, DD Mon YYYY HH:MM:SS +HHMM` with a
 * numeric offset, the same shape `date -R` prints.
 */

const DAY_NAMES = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"] as const;

const MONTH_NAMES = [
  "Jan", "Feb", "Mar", "Apr", "May", "Jun",
  "Jul", "Aug", "Sep", "Oct", "Nov", "Dec",
] as const;

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Render a UTC offset in minutes as `+HHMM` / `-HHMM`.
 */
export function formatUtcOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? "-" : "+";
  const absolute = Math.abs(offsetMinutes);
  return `${sign}${pad2(Math.floor(absolute / 60))}${pad2(absolute % 60)}`;
}

/**
 * The host's local UTC offset at `date`, in minutes east of UTC.
 */
export function localUtcOffset(date: Date): number {
  // getTimezoneOffset() is minutes WEST of UTC; flip it, and avoid -0.
  return date.getTimezoneOffset() === 0 ? 0 : -date.getTimezoneOffset();
}

/**
 * Format `date` as RFC 2822 in the zone `offsetMinutes` east of UTC.
 *
 * @param date          - Instant to format
 * @param offsetMinutes - Zone offset; defaults to the host's local offset
 */
export function formatRfc2822(date: Date, offsetMinutes: number = localUtcOffset(date)): string {
  // Shift the instant so the UTC getters read wall-clock time in the target zone.
  const shifted = new Date(date.getTime() + offsetMinutes * 60_000);

  const day = DAY_NAMES[shifted.getUTCDay()];
  const month = MONTH_NAMES[shifted.getUTCMonth()];
  const time = [
    pad2(shifted.getUTCHours()),
    pad2(shifted.getUTCMinutes()),
    pad2(shifted.getUTCSeconds()),
  ].join(":");

  return `${day}, ${pad2(shifted.getUTCDate())} ${month} ${shifted.getUTCFullYear()} ${time} ${formatUtcOffset(offsetMinutes)}`;
}
