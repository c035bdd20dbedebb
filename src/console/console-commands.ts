import { formatConsoleError, type ConsoleResult } from "../result.js";
import type { CommandHistory } from "../state/command-history.js";
import { describeTaskPayload } from "../tasks/task-payload.js";
import { formatClock, parseScheduleTime } from "../tasks/schedule-time.js";
import type { ScheduledEntry } from "../tasks/task-queue.js";
import { formatQueueLine } from "../tui/format-view.js";
import type { ConsoleController, EntryChanges } from "./console-controller.js";
import {
  filterSlashCommands,
  formatSlashCommandList,
  parseSlashArgs,
  parseSlashInput,
  type SlashCommandDefinition,
} from "./slash-commands.js";
import type { ConsoleSelection } from "./view-model.js";

export interface SlashCommandHandler extends SlashCommandDefinition {
  run: ({ args }: { args: string }) => Promise<string | null> | string | null;
}

export type CommandHandler = (value: string) => void;

const EDIT_USAGE =
  "/edit <seq> [--at time] [--fleet f] [--start w] [--end w] [--repeat n] [--pickup w] [--dropoff w] [--dispenser id] [--ingestor id]";

const EDIT_OPTIONS = [
  "at",
  "fleet",
  "start",
  "end",
  "repeat",
  "pickup",
  "dropoff",
  "dispenser",
  "ingestor",
] as const;

const parseSequenceId = ({ value }: { value?: string }): number | null => {
  if (!value) {
    return null;
  }
  const normalized = value.startsWith("#") ? value.slice(1) : value;
  const parsed = Number(normalized);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : null;
};

const parseRepeat = ({ value }: { value?: string }): number | undefined =>
  value === undefined ? undefined : Number(value);

const describeEntry = ({ entry }: { entry: ScheduledEntry }): string =>
  `#${entry.sequenceId} ${describeTaskPayload({ payload: entry.payload })} at ${formatClock({ ms: entry.scheduledAt })}`;

export const buildConsoleCommands = ({
  controller,
  writeLine,
  now,
  getSelection,
  setSelection,
}: {
  controller: ConsoleController;
  writeLine: (line: string) => void;
  now: () => number;
  getSelection: () => ConsoleSelection;
  setSelection: (selection: ConsoleSelection) => void;
}): SlashCommandHandler[] => {
  const report = <T>({
    result,
    describe,
  }: {
    result: ConsoleResult<T>;
    describe: (value: T) => string;
  }): string | null => {
    if (!result.ok) {
      writeLine(formatConsoleError({ error: result.error }));
      return null;
    }
    return describe(result.value);
  };

  const resolveTime = ({ value }: { value?: string }): number | null => {
    const scheduledAt = parseScheduleTime({ input: value ?? "now", nowMs: now() });
    if (scheduledAt === null) {
      writeLine(
        formatConsoleError({
          error: { kind: "InvalidSchedule", message: `unrecognized time: ${value ?? ""}` },
        }),
      );
    }
    return scheduledAt;
  };

  const resolveRobot = ({
    positional,
    commandName,
  }: {
    positional: string[];
    commandName: string;
  }): { fleetName: string; robotName: string } | null => {
    const selection = getSelection();
    const fleetName = positional[0] ?? selection.fleetName;
    const robotName = positional[1] ?? selection.robotName;
    if (!fleetName || !robotName) {
      writeLine(`usage: /${commandName} <fleet> <robot>`);
      return null;
    }
    return { fleetName, robotName };
  };

  const commands: SlashCommandHandler[] = [];
  commands.push(
    {
      name: "help",
      description: "list console commands",
      usage: "/help",
      run: () => {
        writeLine(formatSlashCommandList({ commands }).join("\n"));
        return "listed commands";
      },
    },
    {
      name: "loop",
      description: "queue a loop task",
      usage: "/loop <fleet> <start> <end> [--repeat n] [--at time]",
      run: async ({ args }) => {
        const { positional, options } = parseSlashArgs({ args, options: ["repeat", "at"] });
        const [fleetName, startWaypoint, endWaypoint] = positional;
        if (!fleetName || !startWaypoint || !endWaypoint) {
          writeLine("usage: /loop <fleet> <start> <end> [--repeat n] [--at time]");
          return null;
        }
        const scheduledAt = resolveTime({ value: options.at });
        if (scheduledAt === null) {
          return null;
        }
        const result = await controller.submitLoop({
          fleetName,
          startWaypoint,
          endWaypoint,
          repeatCount: parseRepeat({ value: options.repeat }) ?? 1,
          scheduledAt,
        });
        return report({ result, describe: (entry) => `queued ${describeEntry({ entry })}` });
      },
    },
    {
      name: "delivery",
      description: "queue a delivery task",
      usage:
        "/delivery <fleet> <pickup> <dropoff> [--dispenser id] [--ingestor id] [--at time]",
      run: async ({ args }) => {
        const { positional, options } = parseSlashArgs({
          args,
          options: ["dispenser", "ingestor", "at"],
        });
        const [fleetName, pickupWaypoint, dropoffWaypoint] = positional;
        if (!fleetName || !pickupWaypoint || !dropoffWaypoint) {
          writeLine("usage: /delivery <fleet> <pickup> <dropoff> [--dispenser id] [--ingestor id] [--at time]");
          return null;
        }
        const scheduledAt = resolveTime({ value: options.at });
        if (scheduledAt === null) {
          return null;
        }
        const result = await controller.submitDelivery({
          fleetName,
          pickupWaypoint,
          dropoffWaypoint,
          pickupDispenser: options.dispenser,
          dropoffIngestor: options.ingestor,
          scheduledAt,
        });
        return report({ result, describe: (entry) => `queued ${describeEntry({ entry })}` });
      },
    },
    {
      name: "edit",
      description: "change the time or fields of a queued task",
      usage: EDIT_USAGE,
      run: async ({ args }) => {
        const { positional, options } = parseSlashArgs({ args, options: EDIT_OPTIONS });
        const sequenceId = parseSequenceId({ value: positional[0] });
        if (sequenceId === null) {
          writeLine(`usage: ${EDIT_USAGE}`);
          return null;
        }
        let scheduledAt: number | undefined;
        if (options.at) {
          const resolved = resolveTime({ value: options.at });
          if (resolved === null) {
            return null;
          }
          scheduledAt = resolved;
        }
        const repeatCount = parseRepeat({ value: options.repeat });
        const changes: EntryChanges = {
          ...(options.fleet ? { fleetName: options.fleet } : {}),
          ...(options.start ? { startWaypoint: options.start } : {}),
          ...(options.end ? { endWaypoint: options.end } : {}),
          ...(repeatCount !== undefined ? { repeatCount } : {}),
          ...(options.pickup ? { pickupWaypoint: options.pickup } : {}),
          ...(options.dropoff ? { dropoffWaypoint: options.dropoff } : {}),
          ...(options.dispenser ? { pickupDispenser: options.dispenser } : {}),
          ...(options.ingestor ? { dropoffIngestor: options.ingestor } : {}),
        };
        if (scheduledAt === undefined && Object.keys(changes).length === 0) {
          writeLine("nothing to change");
          return null;
        }
        const result = await controller.editEntry({ sequenceId, scheduledAt, changes });
        return report({ result, describe: (entry) => `edited ${describeEntry({ entry })}` });
      },
    },
    {
      name: "delete",
      description: "remove a queued task",
      usage: "/delete <seq>",
      run: ({ args }) => {
        const sequenceId = parseSequenceId({ value: args.trim().split(/\s+/)[0] });
        if (sequenceId === null) {
          writeLine("usage: /delete <seq>");
          return null;
        }
        const result = controller.deleteEntry({ sequenceId });
        return report({ result, describe: (entry) => `deleted ${describeEntry({ entry })}` });
      },
    },
    {
      name: "pause",
      description: "pause a robot now",
      usage: "/pause <fleet> <robot>",
      run: async ({ args }) => {
        const { positional } = parseSlashArgs({ args, options: [] });
        const target = resolveRobot({ positional, commandName: "pause" });
        if (!target) {
          return null;
        }
        const result = await controller.pauseRobot(target);
        return report({
          result,
          describe: (request) => `pause sent to ${request.fleet_name}/${request.robot_name}`,
        });
      },
    },
    {
      name: "resume",
      description: "resume a paused robot now",
      usage: "/resume <fleet> <robot>",
      run: async ({ args }) => {
        const { positional } = parseSlashArgs({ args, options: [] });
        const target = resolveRobot({ positional, commandName: "resume" });
        if (!target) {
          return null;
        }
        const result = await controller.resumeRobot(target);
        return report({
          result,
          describe: (request) => `resume sent to ${request.fleet_name}/${request.robot_name}`,
        });
      },
    },
    {
      name: "schedule",
      description: "hold or release dispatch of queued tasks",
      usage: "/schedule pause|resume",
      run: ({ args }) => {
        const token = args.trim().toLowerCase();
        if (token !== "pause" && token !== "resume") {
          writeLine("usage: /schedule pause|resume");
          return null;
        }
        controller.setSchedulePaused({ paused: token === "pause" });
        return token === "pause" ? "schedule paused" : "schedule running";
      },
    },
    {
      name: "workcells",
      description: "restrict waypoint choices to workcells",
      usage: "/workcells on|off",
      run: ({ args }) => {
        const token = args.trim().toLowerCase();
        if (token !== "on" && token !== "off") {
          writeLine("usage: /workcells on|off");
          return null;
        }
        controller.setWorkcellsOnly({ enabled: token === "on" });
        return `workcells only ${token}`;
      },
    },
    {
      name: "select",
      description: "choose the fleet and robot shown in the selectors",
      usage: "/select <fleet> [robot]",
      run: ({ args }) => {
        const [fleetName, robotName] = args
          .trim()
          .split(/\s+/)
          .filter((token) => token.length > 0);
        if (!fleetName) {
          writeLine("usage: /select <fleet> [robot]");
          return null;
        }
        const view = controller.currentView({ selection: { fleetName, robotName } });
        if (view.selectors.selectedFleet !== fleetName) {
          writeLine(`NotFound: fleet ${fleetName} is not reporting`);
          return null;
        }
        setSelection({ fleetName, robotName: view.selectors.selectedRobot });
        return `selected ${fleetName}${view.selectors.selectedRobot ? `/${view.selectors.selectedRobot}` : ""}`;
      },
    },
    {
      name: "queue",
      description: "list queued tasks",
      usage: "/queue",
      run: () => {
        const { queue } = controller.currentView({ selection: getSelection() }).status;
        if (queue.length === 0) {
          writeLine("queue empty");
        } else {
          writeLine(queue.map((item) => formatQueueLine({ item })).join("\n"));
        }
        return `${queue.length} queued`;
      },
    },
    {
      name: "graph",
      description: "list a fleet's waypoints",
      usage: "/graph <fleet>",
      run: async ({ args }) => {
        const fleetName = args.trim().split(/\s+/)[0] || getSelection().fleetName;
        if (!fleetName) {
          writeLine("usage: /graph <fleet>");
          return null;
        }
        const result = await controller.getGraph({ fleetName });
        return report({
          result,
          describe: (graph) => {
            writeLine(
              graph.waypoints
                .map((waypoint) => `${waypoint.name}${waypoint.hasWorkcell ? " [workcell]" : ""}`)
                .join("\n"),
            );
            return `${graph.waypoints.length} waypoints`;
          },
        });
      },
    },
  );
  return commands;
};

/**
 * Runs one line of console input against the command table. Output, including
 * failures, goes through `writeLine`.
 */
export const runConsoleCommand = async ({
  commands,
  input,
  writeLine,
}: {
  commands: SlashCommandHandler[];
  input: string;
  writeLine: (line: string) => void;
}): Promise<void> => {
  const parsed = parseSlashInput({ input });
  if (!parsed.hasLeadingSlash) {
    writeLine("commands must start with '/'");
    return;
  }
  if (parsed.name.length === 0) {
    writeLine(["commands:", ...formatSlashCommandList({ commands })].join("\n"));
    return;
  }
  const { exact, matches } = filterSlashCommands({ commands, token: parsed.name });
  if (!exact) {
    if (matches.length > 0) {
      const lines = formatSlashCommandList({ commands: matches });
      writeLine([`matches for /${parsed.name}:`, ...lines].join("\n"));
    } else {
      writeLine(`unknown command: /${parsed.name}`);
    }
    return;
  }
  const runArgs = parsed.rest.trim();
  const commandLabel = runArgs.length > 0 ? `/${exact.name} ${runArgs}` : `/${exact.name}`;
  try {
    const result = await exact.run({ args: runArgs });
    if (result) {
      writeLine(`ran ${commandLabel} (${result})`);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    writeLine(`command failed: ${message}`);
  }
};

export const makeConsoleCommandHandler = ({
  commands,
  history,
  writeLine,
  onHistoryError,
}: {
  commands: SlashCommandHandler[];
  history: CommandHistory;
  writeLine: (line: string) => void;
  onHistoryError: (error: unknown) => void;
}): CommandHandler => {
  return (raw: string) => {
    const value = raw.trim();
    if (!value) {
      return;
    }
    void history.record({ entry: value }).catch(onHistoryError);
    void runConsoleCommand({ commands, input: value, writeLine });
  };
};
