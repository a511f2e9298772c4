const WINDOW_HOURS = new Map<string, number>([
  ["1h", 1],
  ["12h", 12],
  ["24h", 24],
  ["1d", 24],
  ["3d", 72],
  ["7d", 168],
]);

export const DEFAULT_WINDOW_HOURS = 24;

/**
 * Maps a window token to hours. Unknown tokens fall back to 24h instead of
 * failing; `recognized` lets reports say so.
 */
export const parseTimeWindow = (
  token: string
): { hours: number; recognized: boolean } => {
  const hours = WINDOW_HOURS.get(token.trim().toLowerCase());
  return hours === undefined
    ? { hours: DEFAULT_WINDOW_HOURS, recognized: false }
    : { hours, recognized: true };
};

/** `YYYY-MM-DD HH:MM:SS` (as stored) or ISO text, read as UTC. */
export const parseDbTimestamp = (value: string): number | null => {
  const iso = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}/.test(value)
    ? `${value.replace(" ", "T")}Z`
    : value;
  const t = Date.parse(iso);
  return Number.isNaN(t) ? null : t;
};

const pad2 = (n: number): string => String(n).padStart(2, "0");

export const hourLabel = (hour: number): string =>
  `${pad2(hour)}:00-${pad2(hour + 1)}:00`;

export type SessionDuration = {
  hours: number;
  minutes: number;
  seconds: number;
  formatted: string;
};

export const formatDuration = (
  hours: number,
  minutes: number,
  seconds: number
): string => {
  const parts: string[] = [];
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (seconds > 0 || parts.length === 0) parts.push(`${seconds}s`);
  return parts.join(" ");
};

/** Span between two activity timestamps; days fold into hours. */
export const sessionDuration = (
  first: string | null,
  last: string | null
): SessionDuration => {
  const start = first ? parseDbTimestamp(first) : null;
  const end = last ? parseDbTimestamp(last) : null;
  if (start === null || end === null) {
    return { hours: 0, minutes: 0, seconds: 0, formatted: "0s" };
  }
  const total = Math.floor(Math.abs(end - start) / 1000);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  return { hours, minutes, seconds, formatted: formatDuration(hours, minutes, seconds) };
};
