import { buildConsoleCommands, runConsoleCommand } from "../console/console-commands.js";
import type { ConsoleController } from "../console/console-controller.js";
import type { ConsoleSelection } from "../console/view-model.js";
import type { EventSink } from "../state/events.js";
import type { IpcHandler, IpcHandlers } from "./server.js";
import type { InboundMessageType } from "./protocol.js";

const readOptionalString = ({
  payload,
  key,
}: {
  payload: unknown;
  key: string;
}): string | undefined => {
  if (!payload || typeof payload !== "object") {
    return undefined;
  }
  const value: unknown = Reflect.get(payload, key);
  return typeof value === "string" && value.length > 0 ? value : undefined;
};

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const buildConsoleIpcHandlers = ({
  controller,
  emit,
  now = () => Date.now(),
  getSelection,
  setSelection,
}: {
  controller: ConsoleController;
  emit: EventSink;
  now?: () => number;
  getSelection: () => ConsoleSelection;
  setSelection: (selection: ConsoleSelection) => void;
}): IpcHandlers => {
  const inbound = ({
    type,
    apply,
  }: {
    type: InboundMessageType;
    apply: ({ payload }: { payload: unknown }) => void;
  }): IpcHandler => {
    return async ({ payload }) => {
      try {
        apply({ payload });
      } catch (error) {
        emit({
          ts: new Date(now()).toISOString(),
          type: "INBOUND_REJECTED",
          msg: `${type} rejected: ${describeError(error)}`,
        });
        throw error;
      }
      return { applied: true };
    };
  };

  return {
    fleet_state: inbound({ type: "fleet_state", apply: controller.applyFleetState }),
    task_summary: inbound({ type: "task_summary", apply: controller.applyTaskSummary }),
    door_state: inbound({ type: "door_state", apply: controller.applyDoorState }),
    dispenser_state: inbound({ type: "dispenser_state", apply: controller.applyDispenserState }),
    command: async ({ payload }) => {
      const line = readOptionalString({ payload, key: "line" });
      if (!line) {
        throw new Error("Missing line");
      }
      const lines: string[] = [];
      const writeLine = (value: string): void => {
        lines.push(...value.split("\n"));
      };
      const commands = buildConsoleCommands({
        controller,
        writeLine,
        now,
        getSelection,
        setSelection,
      });
      await runConsoleCommand({ commands, input: line, writeLine });
      return { lines };
    },
    view: async ({ payload }) => {
      const fleetName = readOptionalString({ payload, key: "fleet" });
      const robotName = readOptionalString({ payload, key: "robot" });
      const selection = fleetName ? { fleetName, robotName } : getSelection();
      return controller.currentView({ selection });
    },
  };
};
