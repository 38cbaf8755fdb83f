import { addDays, format } from "date-fns";
import type { SendWindow, SendWindowState } from "./types.js";

type ZonedParts = {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
};

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(timezone, formatter);
  }
  return formatter;
}

/** Wall-clock fields of an instant in the given timezone. */
export function zonedParts(nowMs: number, timezone: string): ZonedParts {
  const parts: Record<string, number> = {};
  for (const part of formatterFor(timezone).formatToParts(new Date(nowMs))) {
    if (part.type !== "literal") {
      parts[part.type] = Number(part.value);
    }
  }
  return {
    year: parts.year ?? 1970,
    month: parts.month ?? 1,
    day: parts.day ?? 1,
    hour: (parts.hour ?? 0) % 24,
    minute: parts.minute ?? 0,
    second: parts.second ?? 0,
  };
}

/** Calendar date (`yyyy-MM-dd`) in the timezone, shifted by whole days. */
export function dateKey(nowMs: number, timezone: string, offsetDays = 0): string {
  const { year, month, day } = zonedParts(nowMs, timezone);
  return format(addDays(new Date(year, month - 1, day), offsetDays), "yyyy-MM-dd");
}

/**
 * Where `now` falls relative to the window. Sending is allowed from
 * `startHour` until `endHour + graceHours`; after that the day is cut off.
 */
export function resolveSendWindowState(nowMs: number, window: SendWindow): SendWindowState {
  const { hour, minute, second } = zonedParts(nowMs, window.timezone);
  const secondsOfDay = hour * 3600 + minute * 60 + second;
  if (secondsOfDay < window.startHour * 3600) {
    return "wait";
  }
  if (secondsOfDay < (window.endHour + window.graceHours) * 3600) {
    return "send";
  }
  return "cutoff";
}

/** Zero unless the window has yet to open today. */
export function msUntilWindowOpens(nowMs: number, window: SendWindow): number {
  const { hour, minute, second } = zonedParts(nowMs, window.timezone);
  const secondsOfDay = hour * 3600 + minute * 60 + second;
  const openAt = window.startHour * 3600;
  if (secondsOfDay >= openAt) {
    return 0;
  }
  return (openAt - secondsOfDay) * 1000 - (nowMs % 1000);
}
