// Index order matches the numeric mode codes fleet adapters send.
export const ROBOT_MODES = [
  "idle",
  "charging",
  "moving",
  "paused",
  "waiting",
  "emergency",
  "going_home",
  "docking",
  "error",
] as const;

export type RobotMode = (typeof ROBOT_MODES)[number];

export const TASK_STATES = ["queued", "active", "completed", "failed"] as const;

export type TaskState = (typeof TASK_STATES)[number];

export const DOOR_MODES = ["closed", "moving", "open", "offline", "unknown"] as const;

export type DoorMode = (typeof DOOR_MODES)[number];

export const DISPENSER_MODES = ["idle", "busy", "offline"] as const;

export type DispenserMode = (typeof DISPENSER_MODES)[number];

export interface RobotLocation {
  x: number;
  y: number;
  yaw: number;
  levelName: string;
}

export interface RobotState {
  fleetName: string;
  robotName: string;
  mode: RobotMode;
  location: RobotLocation;
  taskId?: string;
  batteryPercent?: number;
}

export interface TaskSummary {
  taskId: string;
  state: TaskState;
  fleetName: string;
  submittedAt: number;
  robotName?: string;
  statusText?: string;
}

export interface DoorState {
  name: string;
  mode: DoorMode;
  updatedAt: number;
}

export interface DispenserState {
  name: string;
  mode: DispenserMode;
  updatedAt: number;
}

export const copyRobotState = (state: RobotState): RobotState => ({
  ...state,
  location: { ...state.location },
});
