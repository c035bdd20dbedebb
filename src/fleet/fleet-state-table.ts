import type { FleetStateUpdate } from "./messages.js";
import {
  copyRobotState,
  type DispenserState,
  type DoorState,
  type RobotState,
  type TaskSummary,
} from "./robot-state.js";

export interface FleetSnapshot {
  revision: number;
  fleets: string[];
  robotsByFleet: Record<string, string[]>;
  robotState: Record<string, Record<string, RobotState>>;
  taskSummaries: TaskSummary[];
  doors: DoorState[];
  dispensers: DispenserState[];
}

export interface FleetStateTable {
  applyRobotState: ({ state }: { state: RobotState }) => { discoveredFleet: boolean };
  applyFleetState: ({ update }: { update: FleetStateUpdate }) => { discoveredFleet: boolean };
  applyTaskSummary: ({ summary }: { summary: TaskSummary }) => void;
  applyDoorState: ({ door }: { door: DoorState }) => void;
  applyDispenserState: ({ dispenser }: { dispenser: DispenserState }) => void;
  hasFleet: ({ fleetName }: { fleetName: string }) => boolean;
  hasTaskSummary: ({ taskId }: { taskId: string }) => boolean;
  getRobot: ({
    fleetName,
    robotName,
  }: {
    fleetName: string;
    robotName: string;
  }) => RobotState | undefined;
  snapshot: () => FleetSnapshot;
}

const byName = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const compareSummaries = (a: TaskSummary, b: TaskSummary): number =>
  a.submittedAt - b.submittedAt || byName(a.taskId, b.taskId);

/**
 * Latest known state per fleet, robot, task and workcell. Updates replace the
 * stored record wholesale.
 */
export const createFleetStateTable = (): FleetStateTable => {
  const robots = new Map<string, Map<string, RobotState>>();
  const summaries = new Map<string, TaskSummary>();
  const doors = new Map<string, DoorState>();
  const dispensers = new Map<string, DispenserState>();
  let revision = 0;

  const applyRobotState = ({ state }: { state: RobotState }): { discoveredFleet: boolean } => {
    let fleet = robots.get(state.fleetName);
    const discoveredFleet = !fleet;
    if (!fleet) {
      fleet = new Map();
      robots.set(state.fleetName, fleet);
    }
    fleet.set(state.robotName, copyRobotState(state));
    revision += 1;
    return { discoveredFleet };
  };

  return {
    applyRobotState,
    applyFleetState: ({ update }) => {
      let discoveredFleet = false;
      for (const state of update.robots) {
        discoveredFleet = applyRobotState({ state }).discoveredFleet || discoveredFleet;
      }
      return { discoveredFleet };
    },
    applyTaskSummary: ({ summary }) => {
      summaries.set(summary.taskId, { ...summary });
      revision += 1;
    },
    applyDoorState: ({ door }) => {
      doors.set(door.name, { ...door });
      revision += 1;
    },
    applyDispenserState: ({ dispenser }) => {
      dispensers.set(dispenser.name, { ...dispenser });
      revision += 1;
    },
    hasFleet: ({ fleetName }) => robots.has(fleetName),
    hasTaskSummary: ({ taskId }) => summaries.has(taskId),
    getRobot: ({ fleetName, robotName }) => {
      const state = robots.get(fleetName)?.get(robotName);
      return state ? copyRobotState(state) : undefined;
    },
    snapshot: () => {
      const fleets = [...robots.keys()].sort(byName);
      const robotsByFleet: Record<string, string[]> = {};
      const robotState: Record<string, Record<string, RobotState>> = {};
      for (const fleetName of fleets) {
        const fleet = robots.get(fleetName) ?? new Map<string, RobotState>();
        const names = [...fleet.keys()].sort(byName);
        robotsByFleet[fleetName] = names;
        const states: Record<string, RobotState> = {};
        for (const robotName of names) {
          const state = fleet.get(robotName);
          if (state) {
            states[robotName] = copyRobotState(state);
          }
        }
        robotState[fleetName] = states;
      }
      return {
        revision,
        fleets,
        robotsByFleet,
        robotState,
        taskSummaries: [...summaries.values()]
          .map((summary) => ({ ...summary }))
          .sort(compareSummaries),
        doors: [...doors.values()].map((door) => ({ ...door })).sort((a, b) => byName(a.name, b.name)),
        dispensers: [...dispensers.values()]
          .map((dispenser) => ({ ...dispenser }))
          .sort((a, b) => byName(a.name, b.name)),
      };
    },
  };
};
