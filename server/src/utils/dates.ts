const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

/** Post display date, e.g. "October 05, 2026" (local time). */
export function formatPostDate(date: Date = new Date()): string {
  const day = String(date.getDate()).padStart(2, "0");
  return `${MONTHS[date.getMonth()]} ${day}, ${date.getFullYear()}`;
}

/**
 * SQLite datetime('now') text ("YYYY-MM-DD HH:MM:SS", UTC) to a short display string.
 * Unparseable values are returned unchanged.
 */
export function formatTimestamp(value: string): string {
  const parsed = new Date(`${value.replace(" ", "T")}Z`);
  if (Number.isNaN(parsed.getTime())) return value;
  const day = String(parsed.getUTCDate()).padStart(2, "0");
  const time = parsed.toISOString().slice(11, 16);
  return `${MONTHS[parsed.getUTCMonth()]} ${day}, ${parsed.getUTCFullYear()} ${time} UTC`;
}
