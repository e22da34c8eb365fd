/**
 * Org timestamps: `<2025-12-26 Fri 01:45>` (active) and
 * `[2025-12-26 Fri 01:45]` (inactive). Both are naive local time.
 */
const DAY_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatOrgTimestamp(date: Date, active: boolean): string {
  const day = DAY_NAMES[date.getDay()] ?? '';
  const body = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ${day} ${pad2(
    date.getHours()
  )}:${pad2(date.getMinutes())}`;
  return active ? `<${body}>` : `[${body}]`;
}

/** `YYYY-MM-DD` for a local date. */
export function formatIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

/** `HH:MM` for a local time. */
export function formatClockTime(date: Date): string {
  return `${pad2(date.getHours())}:${pad2(date.getMinutes())}`;
}

/** `YYYYMMDD_HHMMSS`, used for backup file names. */
export function formatCompactStamp(date: Date): string {
  return `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}_${pad2(
    date.getHours()
  )}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`;
}
