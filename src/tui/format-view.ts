import type { QueueItemView } from "../console/view-model.js";
import type { DispenserState, DoorState, RobotState, TaskSummary } from "../fleet/robot-state.js";
import type { DispatchError } from "../tasks/dispatcher.js";
import { formatClock } from "../tasks/schedule-time.js";

const formatCoordinate = (value: number): string => value.toFixed(1);

export const formatRobotLine = ({ robot }: { robot: RobotState }): string => {
  const { x, y, levelName } = robot.location;
  const level = levelName.length > 0 ? `${levelName} ` : "";
  const battery =
    robot.batteryPercent === undefined ? "" : ` ${Math.round(robot.batteryPercent)}%`;
  const task = robot.taskId ? ` task:${robot.taskId}` : "";
  return `${robot.fleetName}/${robot.robotName} ${robot.mode} @ ${level}(${formatCoordinate(x)}, ${formatCoordinate(y)})${battery}${task}`;
};

export const formatQueueLine = ({ item }: { item: QueueItemView }): string => {
  const retry = item.attempts > 0 ? ` (retry ${item.attempts})` : "";
  return `#${item.sequenceId} ${formatClock({ ms: item.scheduledAt })} ${item.description}${retry}`;
};

export const formatSummaryLine = ({ summary }: { summary: TaskSummary }): string => {
  const robot = summary.robotName ? `/${summary.robotName}` : "";
  const status = summary.statusText ? ` - ${summary.statusText}` : "";
  return `${summary.taskId} ${summary.state} ${summary.fleetName}${robot}${status}`;
};

export const formatDispatchErrorLine = ({ error }: { error: DispatchError }): string =>
  `${formatClock({ ms: error.at })} #${error.sequenceId} ${error.description}: ${error.error.kind} ${error.error.message}`;

export const formatWorkcellLine = ({
  workcell,
  label,
}: {
  workcell: DoorState | DispenserState;
  label: "door" | "dispenser";
}): string => `${label} ${workcell.name} ${workcell.mode}`;
