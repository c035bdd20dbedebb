import { createFleetStateTable, type FleetStateTable } from "../fleet/fleet-state-table.js";
import {
  parseDispenserStateMessage,
  parseDoorStateMessage,
  parseFleetStateMessage,
  parseTaskSummaryMessage,
} from "../fleet/messages.js";
import { createGraphCache, findWaypoint } from "../graph/graph-cache.js";
import type { GraphInfo, GraphSource, Waypoint } from "../graph/nav-graph.js";
import { fail, succeed, type ConsoleResult } from "../result.js";
import type { EventSink } from "../state/events.js";
import {
  createDispatchErrorLog,
  createDispatcher,
  type DispatchTickReport,
  type OrphanPolicy,
  type TaskPublisher,
} from "../tasks/dispatcher.js";
import {
  createTaskId as defaultCreateTaskId,
  describeTaskPayload,
  validateTaskPayload,
  type DeliveryPayload,
  type LoopPayload,
  type ModeRequest,
  type ModeTarget,
  type TaskKind,
  type TaskPayload,
} from "../tasks/task-payload.js";
import { isRepresentableTime } from "../tasks/schedule-time.js";
import { createTaskQueue, type ScheduledEntry, type TaskQueue } from "../tasks/task-queue.js";
import { buildConsoleView, type ConsoleSelection, type ConsoleView } from "./view-model.js";

export interface ConsoleControllerSettings {
  maxDispatchAttempts: number;
  orphanPolicy: OrphanPolicy;
  workcellsOnly: boolean;
  errorLogLimit: number;
}

export interface DeliverySubmission {
  fleetName: string;
  pickupWaypoint: string;
  dropoffWaypoint: string;
  pickupDispenser?: string;
  dropoffIngestor?: string;
  scheduledAt: number;
}

export interface LoopSubmission {
  fleetName: string;
  startWaypoint: string;
  endWaypoint: string;
  repeatCount: number;
  scheduledAt: number;
}

export type EntryChanges = Partial<Omit<LoopPayload, "kind">> &
  Partial<Omit<DeliveryPayload, "kind">>;

export interface ConsoleController {
  currentView: ({ selection }?: { selection?: ConsoleSelection }) => ConsoleView;
  submitDelivery: (submission: DeliverySubmission) => Promise<ConsoleResult<ScheduledEntry>>;
  submitLoop: (submission: LoopSubmission) => Promise<ConsoleResult<ScheduledEntry>>;
  editEntry: ({
    sequenceId,
    scheduledAt,
    changes,
  }: {
    sequenceId: number;
    scheduledAt?: number;
    changes?: EntryChanges;
  }) => Promise<ConsoleResult<ScheduledEntry>>;
  deleteEntry: ({ sequenceId }: { sequenceId: number }) => ConsoleResult<ScheduledEntry>;
  pauseRobot: ({
    fleetName,
    robotName,
  }: {
    fleetName: string;
    robotName: string;
  }) => Promise<ConsoleResult<ModeRequest>>;
  resumeRobot: ({
    fleetName,
    robotName,
  }: {
    fleetName: string;
    robotName: string;
  }) => Promise<ConsoleResult<ModeRequest>>;
  applyFleetState: ({ payload }: { payload: unknown }) => void;
  applyTaskSummary: ({ payload }: { payload: unknown }) => void;
  applyDoorState: ({ payload }: { payload: unknown }) => void;
  applyDispenserState: ({ payload }: { payload: unknown }) => void;
  getGraph: ({ fleetName }: { fleetName: string }) => Promise<ConsoleResult<GraphInfo>>;
  setSchedulePaused: ({ paused }: { paused: boolean }) => void;
  setWorkcellsOnly: ({ enabled }: { enabled: boolean }) => void;
  tick: ({ now }: { now: number }) => Promise<DispatchTickReport>;
}

const checkWaypoint = ({
  graph,
  name,
  role,
  workcellsOnly,
}: {
  graph: GraphInfo;
  name: string;
  role: string;
  workcellsOnly: boolean;
}): ConsoleResult<Waypoint> => {
  const waypoint = findWaypoint({ graph, name });
  if (!waypoint) {
    return fail({
      kind: "InvalidSelection",
      message: `${role} waypoint ${name} is not in the ${graph.fleetName} graph`,
    });
  }
  if (workcellsOnly && !waypoint.hasWorkcell) {
    return fail({
      kind: "InvalidSelection",
      message: `${role} waypoint ${name} has no workcell`,
    });
  }
  return succeed(waypoint);
};

const resolveLoop = ({
  graph,
  payload,
  workcellsOnly,
}: {
  graph: GraphInfo;
  payload: LoopPayload;
  workcellsOnly: boolean;
}): ConsoleResult<LoopPayload> => {
  const start = checkWaypoint({ graph, name: payload.startWaypoint, role: "start", workcellsOnly });
  if (!start.ok) {
    return start;
  }
  const end = checkWaypoint({ graph, name: payload.endWaypoint, role: "end", workcellsOnly });
  if (!end.ok) {
    return end;
  }
  return succeed(payload);
};

const resolveDelivery = ({
  graph,
  fleetName,
  pickupWaypoint,
  dropoffWaypoint,
  pickupDispenser,
  dropoffIngestor,
  workcellsOnly,
}: {
  graph: GraphInfo;
  fleetName: string;
  pickupWaypoint: string;
  dropoffWaypoint: string;
  pickupDispenser?: string;
  dropoffIngestor?: string;
  workcellsOnly: boolean;
}): ConsoleResult<DeliveryPayload> => {
  const pickup = checkWaypoint({ graph, name: pickupWaypoint, role: "pickup", workcellsOnly });
  if (!pickup.ok) {
    return pickup;
  }
  const dropoff = checkWaypoint({ graph, name: dropoffWaypoint, role: "dropoff", workcellsOnly });
  if (!dropoff.ok) {
    return dropoff;
  }
  const dispenser = pickupDispenser ?? pickup.value.dispenser;
  if (!dispenser) {
    return fail({
      kind: "InvalidSelection",
      message: `pickup waypoint ${pickupWaypoint} has no dispenser`,
    });
  }
  const ingestor = dropoffIngestor ?? dropoff.value.ingestor;
  if (!ingestor) {
    return fail({
      kind: "InvalidSelection",
      message: `dropoff waypoint ${dropoffWaypoint} has no ingestor`,
    });
  }
  return succeed({
    kind: "delivery",
    fleetName,
    pickupWaypoint,
    pickupDispenser: dispenser,
    dropoffWaypoint,
    dropoffIngestor: ingestor,
  });
};

const missingFields = ({ fields }: { fields: Record<string, string> }): string[] =>
  Object.entries(fields)
    .filter(([, value]) => value.trim().length === 0)
    .map(([label]) => `missing ${label}`);

const checkSubmission = ({
  scheduledAt,
  fields,
}: {
  scheduledAt?: number;
  fields: Record<string, string>;
}): ConsoleResult<null> => {
  if (scheduledAt !== undefined && !isRepresentableTime(scheduledAt)) {
    return fail({ kind: "InvalidSchedule", message: `unrepresentable time: ${scheduledAt}` });
  }
  const missing = missingFields({ fields });
  if (missing.length > 0) {
    return fail({ kind: "InvalidSchedule", message: missing.join(", ") });
  }
  return succeed(null);
};

const KIND_ONLY_FIELDS: Record<TaskKind, Record<string, string>> = {
  loop: {
    pickupWaypoint: "pickup waypoint",
    dropoffWaypoint: "dropoff waypoint",
    pickupDispenser: "pickup dispenser",
    dropoffIngestor: "dropoff ingestor",
  },
  delivery: {
    startWaypoint: "start waypoint",
    endWaypoint: "end waypoint",
    repeatCount: "repeat count",
  },
};

// An edit may only name fields the entry's own kind carries.
const checkChangeFields = ({
  kind,
  changes,
}: {
  kind: TaskKind;
  changes: EntryChanges;
}): ConsoleResult<null> => {
  const foreign = Object.entries(changes)
    .filter(([key, value]) => value !== undefined && key in KIND_ONLY_FIELDS[kind])
    .map(([key]) => KIND_ONLY_FIELDS[kind][key]);
  if (foreign.length > 0) {
    return fail({ kind: "InvalidSchedule", message: `${kind} entries have no ${foreign.join(", ")}` });
  }
  return succeed(null);
};

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * One console session: the fleet state table, graph cache, task queue and
 * dispatcher, plus the operations the presentation layer calls.
 *
 * Reads and mutations are synchronous. The only awaits are the graph load
 * that precedes a submission and the outbound publish, and neither sits in the
 * middle of a state change.
 */
export const createConsoleController = ({
  settings,
  graphSource,
  publisher,
  emit = () => undefined,
  now = () => Date.now(),
  createTaskId = defaultCreateTaskId,
}: {
  settings: ConsoleControllerSettings;
  graphSource: GraphSource;
  publisher: TaskPublisher;
  emit?: EventSink;
  now?: () => number;
  createTaskId?: ({ kind }: { kind: TaskKind | "mode" }) => string;
}): ConsoleController => {
  const table: FleetStateTable = createFleetStateTable();
  const queue: TaskQueue = createTaskQueue();
  const errorLog = createDispatchErrorLog({ limit: settings.errorLogLimit });
  const graphs = createGraphCache({
    source: graphSource,
    onLoadError: ({ fleetName, error }) => {
      emit({
        ts: new Date(now()).toISOString(),
        type: "GRAPH_MISSING",
        msg: `graph load failed for ${fleetName}: ${describeError(error)}`,
        fleet: fleetName,
      });
    },
  });
  let schedulePaused = false;
  let workcellsOnly = settings.workcellsOnly;

  const dispatcher = createDispatcher({
    queue,
    table,
    publisher,
    errorLog,
    maxAttempts: settings.maxDispatchAttempts,
    orphanPolicy: settings.orphanPolicy,
    isPaused: () => schedulePaused,
    emit,
  });

  const timestamp = (): string => new Date(now()).toISOString();

  const prefetchGraph = async ({ fleetName }: { fleetName: string }): Promise<void> => {
    const result = await graphs.getGraph({ fleetName });
    emit(
      result.ok
        ? {
            ts: timestamp(),
            type: "GRAPH_LOADED",
            msg: `loaded ${result.value.waypoints.length} waypoints for ${fleetName}`,
            fleet: fleetName,
          }
        : {
            ts: timestamp(),
            type: "GRAPH_MISSING",
            msg: result.error.message,
            fleet: fleetName,
          },
    );
  };

  const enqueue = ({
    scheduledAt,
    payload,
  }: {
    scheduledAt: number;
    payload: TaskPayload;
  }): ConsoleResult<ScheduledEntry> => {
    const result = queue.enqueue({
      scheduledAt,
      payload,
      taskId: createTaskId({ kind: payload.kind }),
    });
    if (result.ok) {
      emit({
        ts: timestamp(),
        type: "TASK_QUEUED",
        msg: `queued #${result.value.sequenceId} ${describeTaskPayload({ payload })}`,
        fleet: payload.fleetName,
        taskId: result.value.taskId,
      });
    }
    return result;
  };

  const mergePayload = async ({
    current,
    changes,
  }: {
    current: TaskPayload;
    changes: EntryChanges;
  }): Promise<ConsoleResult<TaskPayload>> => {
    const fields = checkChangeFields({ kind: current.kind, changes });
    if (!fields.ok) {
      return fields;
    }
    const fleetName = changes.fleetName ?? current.fleetName;
    if (current.kind === "loop") {
      const payload: LoopPayload = {
        kind: "loop",
        fleetName,
        startWaypoint: changes.startWaypoint ?? current.startWaypoint,
        endWaypoint: changes.endWaypoint ?? current.endWaypoint,
        repeatCount: changes.repeatCount ?? current.repeatCount,
      };
      const validation = validateTaskPayload({ payload });
      if (!validation.isValid) {
        return fail({ kind: "InvalidSchedule", message: validation.errors.join(", ") });
      }
      const graph = await graphs.getGraph({ fleetName });
      if (!graph.ok) {
        return graph;
      }
      return resolveLoop({ graph: graph.value, payload, workcellsOnly });
    }
    const pickupWaypoint = changes.pickupWaypoint ?? current.pickupWaypoint;
    const dropoffWaypoint = changes.dropoffWaypoint ?? current.dropoffWaypoint;
    const check = checkSubmission({
      fields: { fleet: fleetName, "pickup waypoint": pickupWaypoint, "dropoff waypoint": dropoffWaypoint },
    });
    if (!check.ok) {
      return check;
    }
    const graph = await graphs.getGraph({ fleetName });
    if (!graph.ok) {
      return graph;
    }
    // A moved pickup or dropoff takes its workcell from the graph unless one is given.
    return resolveDelivery({
      graph: graph.value,
      fleetName,
      pickupWaypoint,
      dropoffWaypoint,
      pickupDispenser:
        changes.pickupDispenser ?? (changes.pickupWaypoint ? undefined : current.pickupDispenser),
      dropoffIngestor:
        changes.dropoffIngestor ?? (changes.dropoffWaypoint ? undefined : current.dropoffIngestor),
      workcellsOnly,
    });
  };

  const requestMode = async ({
    fleetName,
    robotName,
    mode,
  }: {
    fleetName: string;
    robotName: string;
    mode: ModeTarget;
  }): Promise<ConsoleResult<ModeRequest>> => {
    const robot = table.getRobot({ fleetName, robotName });
    if (!robot) {
      return fail({ kind: "NotFound", message: `no robot ${robotName} in fleet ${fleetName}` });
    }
    const request: ModeRequest = {
      fleet_name: fleetName,
      robot_name: robotName,
      mode,
      task_id: createTaskId({ kind: "mode" }),
    };
    try {
      await publisher.publishMode({ request });
    } catch (error) {
      const message = describeError(error);
      emit({
        ts: timestamp(),
        type: "MODE_REQUEST_FAILED",
        msg: `${mode} request for ${fleetName}/${robotName} failed: ${message}`,
        fleet: fleetName,
        robot: robotName,
      });
      return fail({ kind: "DispatchFailure", message });
    }
    emit({
      ts: timestamp(),
      type: mode === "paused" ? "ROBOT_PAUSED" : "ROBOT_RESUMED",
      msg: `${mode === "paused" ? "paused" : "resumed"} ${fleetName}/${robotName}`,
      fleet: fleetName,
      robot: robotName,
      taskId: request.task_id,
    });
    return succeed(request);
  };

  return {
    currentView: ({ selection = {} } = {}) =>
      buildConsoleView({
        snapshot: table.snapshot(),
        queue: queue.list(),
        peekGraph: graphs.peekGraph,
        dispatchErrors: errorLog.list(),
        selection,
        schedulePaused,
        workcellsOnly,
      }),
    submitDelivery: async ({
      fleetName,
      pickupWaypoint,
      dropoffWaypoint,
      pickupDispenser,
      dropoffIngestor,
      scheduledAt,
    }) => {
      const check = checkSubmission({
        scheduledAt,
        fields: {
          fleet: fleetName,
          "pickup waypoint": pickupWaypoint,
          "dropoff waypoint": dropoffWaypoint,
        },
      });
      if (!check.ok) {
        return check;
      }
      const graph = await graphs.getGraph({ fleetName });
      if (!graph.ok) {
        return graph;
      }
      const payload = resolveDelivery({
        graph: graph.value,
        fleetName,
        pickupWaypoint,
        dropoffWaypoint,
        pickupDispenser,
        dropoffIngestor,
        workcellsOnly,
      });
      if (!payload.ok) {
        return payload;
      }
      return enqueue({ scheduledAt, payload: payload.value });
    },
    submitLoop: async ({ fleetName, startWaypoint, endWaypoint, repeatCount, scheduledAt }) => {
      const payload: LoopPayload = {
        kind: "loop",
        fleetName,
        startWaypoint,
        endWaypoint,
        repeatCount,
      };
      const check = checkSubmission({ scheduledAt, fields: {} });
      if (!check.ok) {
        return check;
      }
      const validation = validateTaskPayload({ payload });
      if (!validation.isValid) {
        return fail({ kind: "InvalidSchedule", message: validation.errors.join(", ") });
      }
      const graph = await graphs.getGraph({ fleetName });
      if (!graph.ok) {
        return graph;
      }
      const resolved = resolveLoop({ graph: graph.value, payload, workcellsOnly });
      if (!resolved.ok) {
        return resolved;
      }
      return enqueue({ scheduledAt, payload: resolved.value });
    },
    editEntry: async ({ sequenceId, scheduledAt, changes }) => {
      const current = queue.get({ sequenceId });
      if (!current) {
        return fail({ kind: "NotFound", message: `no queued entry #${sequenceId}` });
      }
      let payload: TaskPayload | undefined;
      if (changes && Object.keys(changes).length > 0) {
        const merged = await mergePayload({ current: current.payload, changes });
        if (!merged.ok) {
          return merged;
        }
        payload = merged.value;
      }
      // The entry may have been dispatched while the graph was loading.
      const result = queue.edit({ sequenceId, scheduledAt, payload });
      if (result.ok) {
        emit({
          ts: timestamp(),
          type: "TASK_EDITED",
          msg: `edited #${sequenceId} ${describeTaskPayload({ payload: result.value.payload })}`,
          fleet: result.value.payload.fleetName,
          taskId: result.value.taskId,
        });
      }
      return result;
    },
    deleteEntry: ({ sequenceId }) => {
      const result = queue.delete({ sequenceId });
      if (result.ok) {
        emit({
          ts: timestamp(),
          type: "TASK_DELETED",
          msg: `deleted #${sequenceId} ${describeTaskPayload({ payload: result.value.payload })}`,
          fleet: result.value.payload.fleetName,
          taskId: result.value.taskId,
        });
      }
      return result;
    },
    pauseRobot: ({ fleetName, robotName }) => requestMode({ fleetName, robotName, mode: "paused" }),
    resumeRobot: ({ fleetName, robotName }) =>
      requestMode({ fleetName, robotName, mode: "moving" }),
    applyFleetState: ({ payload }) => {
      const update = parseFleetStateMessage({ payload });
      const { discoveredFleet } = table.applyFleetState({ update });
      if (!discoveredFleet) {
        return;
      }
      emit({
        ts: timestamp(),
        type: "FLEET_DISCOVERED",
        msg: `fleet ${update.fleetName} reporting ${update.robots.length} robots`,
        fleet: update.fleetName,
      });
      void prefetchGraph({ fleetName: update.fleetName });
    },
    applyTaskSummary: ({ payload }) => {
      table.applyTaskSummary({ summary: parseTaskSummaryMessage({ payload, nowMs: now() }) });
    },
    applyDoorState: ({ payload }) => {
      table.applyDoorState({ door: parseDoorStateMessage({ payload, nowMs: now() }) });
    },
    applyDispenserState: ({ payload }) => {
      table.applyDispenserState({
        dispenser: parseDispenserStateMessage({ payload, nowMs: now() }),
      });
    },
    getGraph: ({ fleetName }) => graphs.getGraph({ fleetName }),
    setSchedulePaused: ({ paused }) => {
      schedulePaused = paused;
    },
    setWorkcellsOnly: ({ enabled }) => {
      workcellsOnly = enabled;
    },
    tick: ({ now: tickNow }) => dispatcher.tick({ now: tickNow }),
  };
};
