import type { FleetdeckEvent, FleetdeckEventType } from "../state/events.js";
import { formatClock } from "../tasks/schedule-time.js";
import { TAG_COLORS, type EventTag } from "./palette.js";

const LINE_LIMIT = 140;

export const tagFromType = ({ type }: { type: FleetdeckEventType }): EventTag => {
  switch (type) {
    case "DISPATCH_FAILED":
    case "TASK_ORPHANED":
    case "MODE_REQUEST_FAILED":
    case "INBOUND_REJECTED":
    case "FATAL":
      return "FAIL";
    case "DISPATCH_RETRY":
      return "RTRY";
    case "TASK_DISPATCHED":
      return "SENT";
    case "TASK_QUEUED":
    case "TASK_EDITED":
    case "TASK_DELETED":
      return "QUEU";
    case "ROBOT_PAUSED":
    case "ROBOT_RESUMED":
      return "MODE";
    default:
      return "INFO";
  }
};

const colorizeTag = ({ tag }: { tag: EventTag }): string => `{${TAG_COLORS[tag]}-fg}${tag}{/}`;

const clip = ({ line, limit }: { line: string; limit: number }): string =>
  line.length > limit ? `${line.slice(0, limit - 1)}…` : line;

const formatSubject = ({ event }: { event: FleetdeckEvent }): string => {
  if (event.fleet && event.robot) {
    return `${event.fleet}/${event.robot}`;
  }
  return event.fleet ?? "-";
};

const formatEventClock = ({ ts }: { ts: string }): string => {
  const ms = Date.parse(ts);
  return Number.isFinite(ms) ? formatClock({ ms }) : "--:--:--";
};

/** Blessed-tagged log line; `stripTags` turns it into plain text. */
export const formatEventLine = ({ event }: { event: FleetdeckEvent }): string => {
  const tag = tagFromType({ type: event.type });
  const line = `${tag} | ${formatEventClock({ ts: event.ts })} | ${formatSubject({ event })} | ${event.msg}`;
  return clip({ line, limit: LINE_LIMIT }).replace(tag, colorizeTag({ tag }));
};

export const stripTags = ({ line }: { line: string }): string => line.replace(/\{[^}]+\}/g, "");
