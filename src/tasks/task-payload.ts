import { randomUUID } from "node:crypto";

export type TaskKind = "delivery" | "loop";

export interface LoopPayload {
  kind: "loop";
  fleetName: string;
  startWaypoint: string;
  endWaypoint: string;
  repeatCount: number;
}

export interface DeliveryPayload {
  kind: "delivery";
  fleetName: string;
  pickupWaypoint: string;
  pickupDispenser: string;
  dropoffWaypoint: string;
  dropoffIngestor: string;
}

export type TaskPayload = LoopPayload | DeliveryPayload;

export interface DeliveryRequest {
  task_id: string;
  pickup_place_name: string;
  pickup_dispenser: string;
  dropoff_place_name: string;
  dropoff_ingestor: string;
}

export interface LoopRequest {
  task_id: string;
  robot_type: string;
  num_loops: number;
  start_name: string;
  finish_name: string;
}

export type OutboundTaskRequest =
  | { type: "delivery_request"; message: DeliveryRequest }
  | { type: "loop_request"; message: LoopRequest };

export type ModeTarget = "paused" | "moving";

export interface ModeRequest {
  fleet_name: string;
  robot_name: string;
  mode: ModeTarget;
  task_id: string;
}

export interface TaskPayloadValidation {
  isValid: boolean;
  errors: string[];
}

const isNonEmpty = (value: unknown): value is string =>
  typeof value === "string" && value.trim().length > 0;

export const validateTaskPayload = ({
  payload,
}: {
  payload: TaskPayload;
}): TaskPayloadValidation => {
  const errors: string[] = [];
  if (!isNonEmpty(payload.fleetName)) {
    errors.push("missing fleet");
  }
  if (payload.kind === "loop") {
    if (!isNonEmpty(payload.startWaypoint)) {
      errors.push("missing start waypoint");
    }
    if (!isNonEmpty(payload.endWaypoint)) {
      errors.push("missing end waypoint");
    }
    if (!Number.isInteger(payload.repeatCount) || payload.repeatCount < 1) {
      errors.push("repeat count must be a positive integer");
    }
  } else if (payload.kind === "delivery") {
    if (!isNonEmpty(payload.pickupWaypoint)) {
      errors.push("missing pickup waypoint");
    }
    if (!isNonEmpty(payload.dropoffWaypoint)) {
      errors.push("missing dropoff waypoint");
    }
    if (!isNonEmpty(payload.pickupDispenser)) {
      errors.push("missing pickup dispenser");
    }
    if (!isNonEmpty(payload.dropoffIngestor)) {
      errors.push("missing dropoff ingestor");
    }
  } else {
    errors.push("unknown task kind");
  }
  return { isValid: errors.length === 0, errors };
};

export const createTaskId = ({ kind }: { kind: TaskKind | "mode" }): string =>
  `${kind}-${randomUUID()}`;

export const buildTaskRequest = ({
  taskId,
  payload,
}: {
  taskId: string;
  payload: TaskPayload;
}): OutboundTaskRequest => {
  if (payload.kind === "delivery") {
    return {
      type: "delivery_request",
      message: {
        task_id: taskId,
        pickup_place_name: payload.pickupWaypoint,
        pickup_dispenser: payload.pickupDispenser,
        dropoff_place_name: payload.dropoffWaypoint,
        dropoff_ingestor: payload.dropoffIngestor,
      },
    };
  }
  return {
    type: "loop_request",
    message: {
      task_id: taskId,
      robot_type: payload.fleetName,
      num_loops: payload.repeatCount,
      start_name: payload.startWaypoint,
      finish_name: payload.endWaypoint,
    },
  };
};

export const describeTaskPayload = ({ payload }: { payload: TaskPayload }): string => {
  if (payload.kind === "delivery") {
    return `delivery ${payload.pickupWaypoint} -> ${payload.dropoffWaypoint} by ${payload.fleetName}`;
  }
  const times = payload.repeatCount === 1 ? "" : ` x${payload.repeatCount}`;
  return `loop ${payload.startWaypoint} <-> ${payload.endWaypoint}${times} by ${payload.fleetName}`;
};
