import {
  DISPENSER_MODES,
  DOOR_MODES,
  ROBOT_MODES,
  TASK_STATES,
  type DispenserMode,
  type DispenserState,
  type DoorMode,
  type DoorState,
  type RobotLocation,
  type RobotMode,
  type RobotState,
  type TaskState,
  type TaskSummary,
} from "./robot-state.js";

export interface FleetStateUpdate {
  fleetName: string;
  robots: RobotState[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const requireString = ({ value, label }: { value: unknown; label: string }): string => {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new Error(`Missing ${label}`);
  }
  return value;
};

const optionalString = (value: unknown): string | undefined =>
  typeof value === "string" && value.length > 0 ? value : undefined;

const optionalNumber = (value: unknown): number | undefined =>
  typeof value === "number" && Number.isFinite(value) ? value : undefined;

const requireRecord = ({
  value,
  label,
}: {
  value: unknown;
  label: string;
}): Record<string, unknown> => {
  if (!isRecord(value)) {
    throw new Error(`Missing ${label}`);
  }
  return value;
};

const pickEnum = <T extends string>({
  value,
  options,
  label,
}: {
  value: unknown;
  options: readonly T[];
  label: string;
}): T => {
  if (typeof value === "number" && Number.isInteger(value)) {
    const byCode = options[value];
    if (byCode) {
      return byCode;
    }
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    const match = options.find((option) => option === normalized);
    if (match) {
      return match;
    }
  }
  throw new Error(`Invalid ${label}: ${String(value)}`);
};

const parseRobotMode = ({ value }: { value: unknown }): RobotMode => {
  // Adapters send either a bare mode or a { mode } wrapper.
  const raw = isRecord(value) ? value.mode : value;
  return pickEnum({ value: raw, options: ROBOT_MODES, label: "robot mode" });
};

const parseLocation = ({ value }: { value: unknown }): RobotLocation => {
  const location = requireRecord({ value, label: "robot location" });
  return {
    x: optionalNumber(location.x) ?? 0,
    y: optionalNumber(location.y) ?? 0,
    yaw: optionalNumber(location.yaw) ?? 0,
    levelName: optionalString(location.level_name) ?? "",
  };
};

const parseRobot = ({ fleetName, value }: { fleetName: string; value: unknown }): RobotState => {
  const robot = requireRecord({ value, label: "robot state" });
  const taskId = optionalString(robot.task_id);
  const batteryPercent = optionalNumber(robot.battery_percent);
  return {
    fleetName,
    robotName: requireString({ value: robot.name, label: "robot name" }),
    mode: parseRobotMode({ value: robot.mode }),
    location: parseLocation({ value: robot.location }),
    ...(taskId ? { taskId } : {}),
    ...(batteryPercent !== undefined ? { batteryPercent } : {}),
  };
};

/** Validates a `fleet_state` message. Throws on any malformed robot. */
export const parseFleetStateMessage = ({ payload }: { payload: unknown }): FleetStateUpdate => {
  const message = requireRecord({ value: payload, label: "fleet state" });
  const fleetName = requireString({ value: message.name, label: "fleet name" });
  if (!Array.isArray(message.robots)) {
    throw new Error("Missing robots");
  }
  const robots = message.robots.map((value) => parseRobot({ fleetName, value }));
  return { fleetName, robots };
};

const parseSubmissionTime = ({ value, nowMs }: { value: unknown; nowMs: number }): number => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string") {
    const parsed = Date.parse(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return nowMs;
};

export const parseTaskSummaryMessage = ({
  payload,
  nowMs,
}: {
  payload: unknown;
  nowMs: number;
}): TaskSummary => {
  const message = requireRecord({ value: payload, label: "task summary" });
  const state: TaskState = pickEnum({
    value: message.state,
    options: TASK_STATES,
    label: "task state",
  });
  const robotName = optionalString(message.robot_name);
  const statusText = optionalString(message.status);
  return {
    taskId: requireString({ value: message.task_id, label: "task id" }),
    state,
    fleetName: requireString({ value: message.fleet_name, label: "fleet name" }),
    submittedAt: parseSubmissionTime({ value: message.submission_time, nowMs }),
    ...(robotName ? { robotName } : {}),
    ...(statusText ? { statusText } : {}),
  };
};

export const parseDoorStateMessage = ({
  payload,
  nowMs,
}: {
  payload: unknown;
  nowMs: number;
}): DoorState => {
  const message = requireRecord({ value: payload, label: "door state" });
  const rawMode = isRecord(message.current_mode) ? message.current_mode.value : message.current_mode;
  const mode: DoorMode = pickEnum({
    value: rawMode,
    options: DOOR_MODES,
    label: "door mode",
  });
  return {
    name: requireString({ value: message.door_name, label: "door name" }),
    mode,
    updatedAt: nowMs,
  };
};

export const parseDispenserStateMessage = ({
  payload,
  nowMs,
}: {
  payload: unknown;
  nowMs: number;
}): DispenserState => {
  const message = requireRecord({ value: payload, label: "dispenser state" });
  const mode: DispenserMode = pickEnum({
    value: message.mode,
    options: DISPENSER_MODES,
    label: "dispenser mode",
  });
  return {
    name: requireString({ value: message.guid, label: "dispenser guid" }),
    mode,
    updatedAt: nowMs,
  };
};
