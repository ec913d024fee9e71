/**
 * Time utilities for WebVTT timestamps. Times are carried as integer milliseconds.
 */

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;

// HH:MM:SS.mmm --> HH:MM:SS.mmm, optionally followed by cue settings
const TIMING_LINE_REGEX =
  /^(\d{2,}):(\d{2}):(\d{2})\.(\d{3})\s+-->\s+(\d{2,}):(\d{2}):(\d{2})\.(\d{3})(?:\s+.*)?$/;

/**
 * Converts milliseconds to a timestamp string in format HH:MM:SS.mmm
 */
export function msToTimestamp(totalMs: number): string {
  const ms = Math.max(0, Math.round(totalMs));
  const hours = Math.floor(ms / MS_PER_HOUR);
  const minutes = Math.floor((ms % MS_PER_HOUR) / MS_PER_MINUTE);
  const secs = Math.floor((ms % MS_PER_MINUTE) / MS_PER_SECOND);
  const millis = ms % MS_PER_SECOND;

  return `${hours.toString().padStart(2, "0")}:${minutes
    .toString()
    .padStart(2, "0")}:${secs.toString().padStart(2, "0")}.${millis
    .toString()
    .padStart(3, "0")}`;
}

function partsToMs(
  hours: string,
  minutes: string,
  seconds: string,
  millis: string
): number | null {
  const m = Number(minutes);
  const s = Number(seconds);
  if (m > 59 || s > 59) {
    return null;
  }
  return (
    Number(hours) * MS_PER_HOUR +
    m * MS_PER_MINUTE +
    s * MS_PER_SECOND +
    Number(millis)
  );
}

/**
 * Parse a WebVTT timing line (start --> end)
 * @param timingLine e.g. "00:01:23.456 --> 00:01:45.678 align:start"
 * @returns Start and end in milliseconds, or null if the line does not match the pattern
 */
export function parseVttTiming(
  timingLine: string
): { startTimeMs: number; endTimeMs: number } | null {
  const match = TIMING_LINE_REGEX.exec(timingLine.trim());
  if (!match) {
    return null;
  }
  const [, sh, sm, ss, sms, eh, em, es, ems] = match;
  const startTimeMs = partsToMs(sh, sm, ss, sms);
  const endTimeMs = partsToMs(eh, em, es, ems);
  if (startTimeMs === null || endTimeMs === null) {
    return null;
  }
  return { startTimeMs, endTimeMs };
}

/**
 * Format a start and end time in milliseconds as a WebVTT timing line
 * @returns e.g. "00:01:23.456 --> 00:01:45.678"
 */
export function formatVttTiming(startTimeMs: number, endTimeMs: number): string {
  return `${msToTimestamp(startTimeMs)} --> ${msToTimestamp(endTimeMs)}`;
}
