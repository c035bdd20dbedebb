import type { FleetSnapshot } from "../fleet/fleet-state-table.js";
import type {
  DispenserState,
  DoorState,
  RobotState,
  TaskSummary,
} from "../fleet/robot-state.js";
import type { GraphInfo } from "../graph/nav-graph.js";
import type { DispatchError } from "../tasks/dispatcher.js";
import { describeTaskPayload, type TaskKind } from "../tasks/task-payload.js";
import type { ScheduledEntry } from "../tasks/task-queue.js";

export interface ConsoleSelection {
  fleetName?: string;
  robotName?: string;
}

export interface QueueItemView {
  sequenceId: number;
  scheduledAt: number;
  kind: TaskKind;
  fleetName: string;
  taskId: string;
  description: string;
  attempts: number;
}

export interface ConsoleSelectors {
  fleets: string[];
  robots: string[];
  waypoints: string[];
  selectedFleet?: string;
  selectedRobot?: string;
}

export interface ConsoleStatus {
  robots: RobotState[];
  taskSummaries: TaskSummary[];
  queue: QueueItemView[];
  doors: DoorState[];
  dispensers: DispenserState[];
  dispatchErrors: DispatchError[];
}

export interface ConsoleView {
  revision: number;
  selectors: ConsoleSelectors;
  status: ConsoleStatus;
  schedulePaused: boolean;
  workcellsOnly: boolean;
}

const pickSelected = ({
  requested,
  options,
}: {
  requested?: string;
  options: string[];
}): string | undefined => {
  if (requested && options.includes(requested)) {
    return requested;
  }
  return options[0];
};

export const toQueueItemView = ({ entry }: { entry: ScheduledEntry }): QueueItemView => ({
  sequenceId: entry.sequenceId,
  scheduledAt: entry.scheduledAt,
  kind: entry.kind,
  fleetName: entry.payload.fleetName,
  taskId: entry.taskId,
  description: describeTaskPayload({ payload: entry.payload }),
  attempts: entry.attempts,
});

/**
 * Projects the state table snapshot, the queue and the loaded graphs into the
 * view the presentation layer renders. A requested selection that no longer
 * exists falls back to the first available option.
 */
export const buildConsoleView = ({
  snapshot,
  queue,
  peekGraph,
  dispatchErrors,
  selection,
  schedulePaused,
  workcellsOnly,
}: {
  snapshot: FleetSnapshot;
  queue: ScheduledEntry[];
  peekGraph: ({ fleetName }: { fleetName: string }) => GraphInfo | undefined;
  dispatchErrors: DispatchError[];
  selection: ConsoleSelection;
  schedulePaused: boolean;
  workcellsOnly: boolean;
}): ConsoleView => {
  const selectedFleet = pickSelected({ requested: selection.fleetName, options: snapshot.fleets });
  const robots = selectedFleet ? (snapshot.robotsByFleet[selectedFleet] ?? []) : [];
  const selectedRobot = pickSelected({ requested: selection.robotName, options: robots });
  const graph = selectedFleet ? peekGraph({ fleetName: selectedFleet }) : undefined;
  const waypoints = (graph?.waypoints ?? [])
    .filter((waypoint) => !workcellsOnly || waypoint.hasWorkcell)
    .map((waypoint) => waypoint.name);

  const robotStates = snapshot.fleets.flatMap((fleetName) =>
    (snapshot.robotsByFleet[fleetName] ?? []).flatMap((robotName) => {
      const state = snapshot.robotState[fleetName]?.[robotName];
      return state ? [state] : [];
    }),
  );

  return {
    revision: snapshot.revision,
    selectors: {
      fleets: snapshot.fleets,
      robots,
      waypoints,
      ...(selectedFleet ? { selectedFleet } : {}),
      ...(selectedRobot ? { selectedRobot } : {}),
    },
    status: {
      robots: robotStates,
      taskSummaries: snapshot.taskSummaries,
      queue: queue.map((entry) => toQueueItemView({ entry })),
      doors: snapshot.doors,
      dispensers: snapshot.dispensers,
      dispatchErrors,
    },
    schedulePaused,
    workcellsOnly,
  };
};
