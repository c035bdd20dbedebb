import type { FleetStateTable } from "../fleet/fleet-state-table.js";
import type { ConsoleError } from "../result.js";
import type { EventSink } from "../state/events.js";
import {
  buildTaskRequest,
  describeTaskPayload,
  type ModeRequest,
  type OutboundTaskRequest,
} from "./task-payload.js";
import type { ScheduledEntry, TaskQueue } from "./task-queue.js";

export type OrphanPolicy = "dispatch" | "drop";

export interface TaskPublisher {
  /** Rejects when the outbound channel did not take the request. */
  publishTask: ({ request }: { request: OutboundTaskRequest }) => Promise<void>;
  publishMode: ({ request }: { request: ModeRequest }) => Promise<void>;
}

export interface DispatchError {
  at: number;
  sequenceId: number;
  taskId: string;
  description: string;
  error: ConsoleError;
}

export interface DispatchErrorLog {
  record: ({ entry }: { entry: DispatchError }) => void;
  list: () => DispatchError[];
}

export interface DispatchTickReport {
  skipped?: "paused" | "busy";
  dispatched: ScheduledEntry[];
  retried: ScheduledEntry[];
  dropped: DispatchError[];
}

export interface Dispatcher {
  tick: ({ now }: { now: number }) => Promise<DispatchTickReport>;
  isBusy: () => boolean;
}

export const createDispatchErrorLog = ({ limit }: { limit: number }): DispatchErrorLog => {
  const entries: DispatchError[] = [];
  return {
    record: ({ entry }) => {
      entries.push(entry);
      if (entries.length > limit) {
        entries.splice(0, entries.length - limit);
      }
    },
    list: () => entries.map((entry) => ({ ...entry, error: { ...entry.error } })),
  };
};

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const emptyReport = (skipped?: DispatchTickReport["skipped"]): DispatchTickReport => ({
  ...(skipped ? { skipped } : {}),
  dispatched: [],
  retried: [],
  dropped: [],
});

/**
 * Moves due queue entries onto the outbound channel.
 *
 * Per entry: queued -> due -> dispatching -> dispatched, or back to the queue
 * at `now` after a failed publish until `maxAttempts` failures, then dropped
 * and reported. Only one tick publishes at a time.
 */
export const createDispatcher = ({
  queue,
  table,
  publisher,
  errorLog,
  maxAttempts,
  orphanPolicy,
  isPaused,
  emit,
}: {
  queue: TaskQueue;
  table: FleetStateTable;
  publisher: TaskPublisher;
  errorLog: DispatchErrorLog;
  maxAttempts: number;
  orphanPolicy: OrphanPolicy;
  isPaused: () => boolean;
  emit: EventSink;
}): Dispatcher => {
  let busy = false;

  const drop = ({
    entry,
    now,
    error,
    report,
  }: {
    entry: ScheduledEntry;
    now: number;
    error: ConsoleError;
    report: DispatchTickReport;
  }): void => {
    const dropped: DispatchError = {
      at: now,
      sequenceId: entry.sequenceId,
      taskId: entry.taskId,
      description: describeTaskPayload({ payload: entry.payload }),
      error,
    };
    errorLog.record({ entry: dropped });
    report.dropped.push(dropped);
  };

  const dispatchEntry = async ({
    entry,
    now,
    report,
  }: {
    entry: ScheduledEntry;
    now: number;
    report: DispatchTickReport;
  }): Promise<void> => {
    const fleetName = entry.payload.fleetName;
    if (orphanPolicy === "drop" && !table.hasFleet({ fleetName })) {
      drop({
        entry,
        now,
        error: { kind: "NotFound", message: `fleet ${fleetName} is not reporting` },
        report,
      });
      emit({
        ts: new Date(now).toISOString(),
        type: "TASK_ORPHANED",
        msg: `dropped #${entry.sequenceId}: fleet ${fleetName} is not reporting`,
        fleet: fleetName,
        taskId: entry.taskId,
      });
      return;
    }
    const request = buildTaskRequest({ taskId: entry.taskId, payload: entry.payload });
    try {
      await publisher.publishTask({ request });
    } catch (error) {
      const attempts = entry.attempts + 1;
      const message = describeError(error);
      if (attempts >= maxAttempts) {
        drop({
          entry,
          now,
          error: {
            kind: "DispatchFailure",
            message: `${message} (after ${attempts} attempts)`,
          },
          report,
        });
        emit({
          ts: new Date(now).toISOString(),
          type: "DISPATCH_FAILED",
          msg: `dropped #${entry.sequenceId} after ${attempts} attempts: ${message}`,
          fleet: fleetName,
          taskId: entry.taskId,
        });
        return;
      }
      report.retried.push(queue.requeue({ entry, scheduledAt: now }));
      emit({
        ts: new Date(now).toISOString(),
        type: "DISPATCH_RETRY",
        msg: `publish failed for #${entry.sequenceId} (attempt ${attempts}/${maxAttempts}): ${message}`,
        fleet: fleetName,
        taskId: entry.taskId,
      });
      return;
    }
    // An authoritative summary may already have arrived while publishing.
    if (!table.hasTaskSummary({ taskId: entry.taskId })) {
      table.applyTaskSummary({
        summary: { taskId: entry.taskId, state: "queued", fleetName, submittedAt: now },
      });
    }
    report.dispatched.push(entry);
    emit({
      ts: new Date(now).toISOString(),
      type: "TASK_DISPATCHED",
      msg: `dispatched #${entry.sequenceId} ${describeTaskPayload({ payload: entry.payload })}`,
      fleet: fleetName,
      taskId: entry.taskId,
    });
  };

  return {
    tick: async ({ now }) => {
      if (busy) {
        return emptyReport("busy");
      }
      if (isPaused()) {
        return emptyReport("paused");
      }
      busy = true;
      const report = emptyReport();
      try {
        const due = queue.extractDue({ now });
        for (const entry of due) {
          await dispatchEntry({ entry, now, report });
        }
      } finally {
        busy = false;
      }
      return report;
    },
    isBusy: () => busy,
  };
};
