/**
 * Timestamp helpers for terminal output.
 */

const MONTHS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
] as const;

function pad(value: number, width: number, fill = "0"): string {
  return String(value).padStart(width, fill);
}

/**
 * Format a date in local time with millisecond precision.
 * Example: "Mar  7 09:05:03.007 2026" (day of month is space-padded).
 */
export function formatLocalTimestamp(date: Date = new Date()): string {
  const month = MONTHS[date.getMonth()] ?? "???";
  const day = pad(date.getDate(), 2, " ");
  const time = [
    pad(date.getHours(), 2),
    pad(date.getMinutes(), 2),
    pad(date.getSeconds(), 2),
  ].join(":");
  const millis = pad(date.getMilliseconds(), 3);

  return `${month} ${day} ${time}.${millis} ${date.getFullYear()}`;
}

/**
 * Prefix console.error/warn output with local timestamps.
 * stdout is left alone: traffic lines carry their own timestamps.
 */
export function installTimestampLogging(): void {
  const originalError = console.error;
  const originalWarn = console.warn;

  console.error = (...args: unknown[]) => {
    originalError(`[${formatLocalTimestamp()}]`, ...args);
  };

  console.warn = (...args: unknown[]) => {
    originalWarn(`[${formatLocalTimestamp()}]`, ...args);
  };
}
