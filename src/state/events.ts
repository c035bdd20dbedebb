import { appendFile } from "node:fs/promises";

export type FleetdeckEventType =
  | "CONSOLE_START"
  | "CONSOLE_STOP"
  | "FLEET_DISCOVERED"
  | "GRAPH_LOADED"
  | "GRAPH_MISSING"
  | "TASK_QUEUED"
  | "TASK_EDITED"
  | "TASK_DELETED"
  | "TASK_DISPATCHED"
  | "TASK_ORPHANED"
  | "DISPATCH_RETRY"
  | "DISPATCH_FAILED"
  | "ROBOT_PAUSED"
  | "ROBOT_RESUMED"
  | "MODE_REQUEST_FAILED"
  | "INBOUND_REJECTED"
  | "FATAL";

export interface FleetdeckEvent {
  ts: string;
  type: FleetdeckEventType;
  msg: string;
  fleet?: string;
  robot?: string;
  taskId?: string;
  data?: Record<string, unknown>;
}

export type EventSink = (event: FleetdeckEvent) => void;

export const appendEvent = async ({
  eventsLog,
  event,
}: {
  eventsLog: string;
  event: FleetdeckEvent;
}): Promise<void> => {
  const line = `${JSON.stringify(event)}\n`;
  await appendFile(eventsLog, line, "utf-8");
};

/**
 * Serializes appends to the events log so lines land in emit order. Write
 * failures go to `onError`.
 */
export const createEventLogSink = ({
  eventsLog,
  onError,
}: {
  eventsLog: string;
  onError: (error: unknown) => void;
}): { sink: EventSink; flush: () => Promise<void> } => {
  let pending: Promise<void> = Promise.resolve();
  const sink: EventSink = (event) => {
    pending = pending.then(() => appendEvent({ eventsLog, event })).catch(onError);
  };
  return { sink, flush: () => pending };
};
