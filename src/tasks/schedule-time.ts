const RELATIVE_UNITS_MS = {
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
} as const;

const RELATIVE_PATTERN = /^\+(\d+)([smh])$/;
const CLOCK_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const ISO_PATTERN = /^\d{4}-\d{2}-\d{2}/;

// Largest epoch millisecond a Date can hold.
const MAX_DATE_MS = 8.64e15;

export const isRepresentableTime = (value: number): boolean =>
  Number.isSafeInteger(value) && value >= 0 && value <= MAX_DATE_MS;

// Queue times have whole-second granularity.
export const truncateToSecond = ({ ms }: { ms: number }): number => Math.floor(ms / 1000) * 1000;

const isRelativeUnit = (value: string): value is keyof typeof RELATIVE_UNITS_MS =>
  value === "s" || value === "m" || value === "h";

const parseClockTime = ({
  match,
  nowMs,
}: {
  match: RegExpMatchArray;
  nowMs: number;
}): number | null => {
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] ? Number(match[3]) : 0;
  if (hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }
  const date = new Date(nowMs);
  date.setHours(hours, minutes, seconds, 0);
  return date.getTime();
};

/**
 * Resolves an operator-entered schedule time to epoch milliseconds.
 *
 * Accepts `now`, a relative offset (`+90s`, `+5m`, `+1h`), a clock time for
 * today in local time (`HH:MM` or `HH:MM:SS`) or an ISO timestamp. Returns
 * null for anything else.
 */
export const parseScheduleTime = ({
  input,
  nowMs,
}: {
  input: string;
  nowMs: number;
}): number | null => {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return null;
  }
  if (trimmed.toLowerCase() === "now") {
    return truncateToSecond({ ms: nowMs });
  }
  const relative = trimmed.match(RELATIVE_PATTERN);
  if (relative) {
    const amount = Number(relative[1]);
    const unit = relative[2] ?? "";
    if (!isRelativeUnit(unit)) {
      return null;
    }
    return truncateToSecond({ ms: nowMs + amount * RELATIVE_UNITS_MS[unit] });
  }
  const clock = trimmed.match(CLOCK_PATTERN);
  if (clock) {
    return parseClockTime({ match: clock, nowMs });
  }
  if (ISO_PATTERN.test(trimmed)) {
    const parsed = Date.parse(trimmed);
    return Number.isFinite(parsed) ? truncateToSecond({ ms: parsed }) : null;
  }
  return null;
};

const pad = (value: number): string => `${value}`.padStart(2, "0");

export const formatClock = ({ ms }: { ms: number }): string => {
  const date = new Date(ms);
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
};
