import { fail, succeed, type ConsoleResult } from "../result.js";
import { isRepresentableTime } from "./schedule-time.js";
import { validateTaskPayload, type TaskKind, type TaskPayload } from "./task-payload.js";

export interface ScheduledEntry {
  sequenceId: number;
  scheduledAt: number;
  kind: TaskKind;
  payload: TaskPayload;
  taskId: string;
  attempts: number;
}

export interface TaskQueue {
  enqueue: ({
    scheduledAt,
    payload,
    taskId,
  }: {
    scheduledAt: number;
    payload: TaskPayload;
    taskId: string;
  }) => ConsoleResult<ScheduledEntry>;
  edit: ({
    sequenceId,
    scheduledAt,
    payload,
  }: {
    sequenceId: number;
    scheduledAt?: number;
    payload?: TaskPayload;
  }) => ConsoleResult<ScheduledEntry>;
  delete: ({ sequenceId }: { sequenceId: number }) => ConsoleResult<ScheduledEntry>;
  extractDue: ({ now }: { now: number }) => ScheduledEntry[];
  requeue: ({ entry, scheduledAt }: { entry: ScheduledEntry; scheduledAt: number }) => ScheduledEntry;
  get: ({ sequenceId }: { sequenceId: number }) => ScheduledEntry | undefined;
  list: () => ScheduledEntry[];
  size: () => number;
}

const compareEntries = (a: ScheduledEntry, b: ScheduledEntry): number =>
  a.scheduledAt - b.scheduledAt || a.sequenceId - b.sequenceId;

const copyEntry = (entry: ScheduledEntry): ScheduledEntry => ({
  ...entry,
  payload: { ...entry.payload },
});

const checkSchedule = ({
  scheduledAt,
  payload,
}: {
  scheduledAt?: number;
  payload?: TaskPayload;
}): ConsoleResult<null> => {
  if (scheduledAt !== undefined && !isRepresentableTime(scheduledAt)) {
    return fail({ kind: "InvalidSchedule", message: `unrepresentable time: ${scheduledAt}` });
  }
  if (payload) {
    const validation = validateTaskPayload({ payload });
    if (!validation.isValid) {
      return fail({ kind: "InvalidSchedule", message: validation.errors.join(", ") });
    }
  }
  return succeed(null);
};

/**
 * Pending task entries kept sorted by (scheduledAt, sequenceId).
 *
 * Every method is synchronous; callers on the event loop never observe the
 * queue mid-update, so extraction cannot interleave with an edit of the same
 * entry.
 */
export const createTaskQueue = (): TaskQueue => {
  const entries: ScheduledEntry[] = [];
  let nextSequenceId = 1;

  // First index whose entry sorts after `entry`.
  const upperBound = (entry: ScheduledEntry): number => {
    let low = 0;
    let high = entries.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      const current = entries[mid];
      if (current && compareEntries(current, entry) <= 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low;
  };

  const insert = (entry: ScheduledEntry): void => {
    entries.splice(upperBound(entry), 0, entry);
  };

  const indexOf = (sequenceId: number): number =>
    entries.findIndex((entry) => entry.sequenceId === sequenceId);

  const notFound = (sequenceId: number): ConsoleResult<ScheduledEntry> =>
    fail({ kind: "NotFound", message: `no queued entry #${sequenceId}` });

  return {
    enqueue: ({ scheduledAt, payload, taskId }) => {
      const check = checkSchedule({ scheduledAt, payload });
      if (!check.ok) {
        return check;
      }
      const entry: ScheduledEntry = {
        sequenceId: nextSequenceId,
        scheduledAt,
        kind: payload.kind,
        payload: { ...payload },
        taskId,
        attempts: 0,
      };
      nextSequenceId += 1;
      insert(entry);
      return succeed(copyEntry(entry));
    },
    edit: ({ sequenceId, scheduledAt, payload }) => {
      const index = indexOf(sequenceId);
      const current = entries[index];
      if (!current) {
        return notFound(sequenceId);
      }
      const check = checkSchedule({ scheduledAt, payload });
      if (!check.ok) {
        return check;
      }
      if (payload && payload.kind !== current.kind) {
        return fail({
          kind: "InvalidSchedule",
          message: `entry #${sequenceId} is a ${current.kind} task, not ${payload.kind}`,
        });
      }
      const next: ScheduledEntry = {
        ...current,
        scheduledAt: scheduledAt ?? current.scheduledAt,
        payload: payload ? { ...payload } : current.payload,
      };
      if (next.scheduledAt === current.scheduledAt) {
        entries[index] = next;
      } else {
        entries.splice(index, 1);
        insert(next);
      }
      return succeed(copyEntry(next));
    },
    delete: ({ sequenceId }) => {
      const index = indexOf(sequenceId);
      const current = entries[index];
      if (!current) {
        return notFound(sequenceId);
      }
      entries.splice(index, 1);
      return succeed(copyEntry(current));
    },
    extractDue: ({ now }) => {
      let count = 0;
      while (count < entries.length) {
        const entry = entries[count];
        if (!entry || entry.scheduledAt > now) {
          break;
        }
        count += 1;
      }
      return entries.splice(0, count);
    },
    requeue: ({ entry, scheduledAt }) => {
      const next: ScheduledEntry = {
        ...entry,
        scheduledAt,
        attempts: entry.attempts + 1,
      };
      insert(next);
      return copyEntry(next);
    },
    get: ({ sequenceId }) => {
      const entry = entries[indexOf(sequenceId)];
      return entry ? copyEntry(entry) : undefined;
    },
    list: () => entries.map(copyEntry),
    size: () => entries.length,
  };
};
