import blessed from "blessed";
import type { ConsoleView } from "../console/view-model.js";
import type { FleetdeckEvent } from "../state/events.js";
import { formatEventLine } from "./format-event.js";
import {
  formatDispatchErrorLine,
  formatQueueLine,
  formatRobotLine,
  formatSummaryLine,
  formatWorkcellLine,
} from "./format-view.js";
import { PALETTE } from "./palette.js";

const OUTPUT_LINES = 4;

export interface ConsoleScreenHandle {
  updateView: ({ view }: { view: ConsoleView }) => void;
  updateTail: ({ events }: { events: FleetdeckEvent[] }) => void;
  writeLine: (line: string) => void;
  destroy: () => void;
}

const panel = ({
  label,
  top,
  left,
  width,
  height,
  tags = false,
}: {
  label: string;
  top: number | string;
  left: number | string;
  width: number | string;
  height: number | string;
  tags?: boolean;
}): blessed.Widgets.BoxElement =>
  blessed.box({
    label: ` ${label} `,
    top,
    left,
    width,
    height,
    tags,
    scrollable: true,
    border: {
      type: "line",
    },
    style: {
      fg: PALETTE.fg,
      border: {
        fg: PALETTE.accent,
      },
    },
  });

export const formatHeaderLine = ({
  view,
  version,
}: {
  view: ConsoleView;
  version: string;
}): string => {
  const { selectors, status } = view;
  const selection = selectors.selectedFleet
    ? `${selectors.selectedFleet}${selectors.selectedRobot ? `/${selectors.selectedRobot}` : ""}`
    : "none";
  return [
    ` fleetdeck v${version}`,
    `fleets:${selectors.fleets.length}`,
    `robots:${status.robots.length}`,
    `queued:${status.queue.length}`,
    `schedule:${view.schedulePaused ? "paused" : "running"}`,
    `workcells-only:${view.workcellsOnly ? "on" : "off"}`,
    `selected:${selection}`,
  ].join("  ");
};

const orPlaceholder = ({ lines, empty }: { lines: string[]; empty: string }): string =>
  lines.length > 0 ? lines.join("\n") : empty;

export const startConsoleScreen = ({
  version,
  tailLimit,
  onCommand,
  recallHistory,
  onExit,
}: {
  version: string;
  tailLimit: number;
  onCommand: (value: string) => void;
  recallHistory: () => string[];
  onExit: () => void;
}): ConsoleScreenHandle => {
  const screen = blessed.screen({
    smartCSR: true,
    title: "fleetdeck",
  });

  const header = blessed.box({
    top: 0,
    left: 0,
    width: "100%",
    height: 1,
    content: " fleetdeck",
    style: {
      fg: PALETTE.fg,
      bg: PALETTE.bg,
    },
  });

  const bodyHeight = `100%-${tailLimit + OUTPUT_LINES + 9}`;
  const robots = panel({ label: "robots", top: 1, left: 0, width: "50%", height: bodyHeight });
  const queue = panel({ label: "queue", top: 1, left: "50%", width: "50%", height: bodyHeight });
  const lowerTop = `100%-${tailLimit + OUTPUT_LINES + 8}`;
  const summaries = panel({ label: "tasks", top: lowerTop, left: 0, width: "40%", height: 5 });
  const workcells = panel({ label: "workcells", top: lowerTop, left: "40%", width: "25%", height: 5 });
  const errors = panel({ label: "dispatch errors", top: lowerTop, left: "65%", width: "35%", height: 5 });

  const output = blessed.box({
    top: `100%-${tailLimit + OUTPUT_LINES + 3}`,
    left: 0,
    width: "100%",
    height: OUTPUT_LINES,
    content: "type / for commands, q to quit",
    style: {
      fg: PALETTE.muted,
    },
  });

  const tail = panel({
    label: "events",
    top: `100%-${tailLimit + 3}`,
    left: 0,
    width: "100%",
    height: tailLimit + 2,
    tags: true,
  });
  tail.setContent("tail: no events");

  const commandInput = blessed.textbox({
    bottom: 0,
    left: 0,
    width: "100%",
    height: 1,
    inputOnFocus: true,
    hidden: true,
    style: {
      fg: PALETTE.fg,
      bg: PALETTE.bg,
    },
  });

  for (const element of [header, robots, queue, summaries, workcells, errors, output, tail, commandInput]) {
    screen.append(element);
  }

  screen.key(["q", "C-c"], () => {
    onExit();
  });
  // Offset back from the newest entry; 0 is the line being typed.
  let recallOffset = 0;
  screen.key(["/"], () => {
    recallOffset = 0;
    commandInput.show();
    commandInput.setValue("/");
    commandInput.focus();
    screen.render();
  });
  const recall = (step: number): void => {
    const entries = recallHistory();
    recallOffset = Math.min(Math.max(recallOffset + step, 0), entries.length);
    commandInput.setValue(recallOffset === 0 ? "/" : (entries[entries.length - recallOffset] ?? "/"));
    screen.render();
  };
  commandInput.key(["up"], () => {
    recall(1);
  });
  commandInput.key(["down"], () => {
    recall(-1);
  });
  commandInput.on("submit", (value: string) => {
    onCommand(value.trim());
    commandInput.clearValue();
    commandInput.hide();
    screen.render();
  });
  commandInput.on("cancel", () => {
    commandInput.clearValue();
    commandInput.hide();
    screen.render();
  });

  screen.render();

  let outputLines: string[] = [];

  return {
    updateView: ({ view }) => {
      header.setContent(formatHeaderLine({ view, version }));
      robots.setContent(
        orPlaceholder({
          lines: view.status.robots.map((robot) => formatRobotLine({ robot })),
          empty: "no fleets reporting",
        }),
      );
      queue.setContent(
        orPlaceholder({
          lines: view.status.queue.map((item) => formatQueueLine({ item })),
          empty: "queue empty",
        }),
      );
      summaries.setContent(
        orPlaceholder({
          lines: view.status.taskSummaries.map((summary) => formatSummaryLine({ summary })),
          empty: "no task summaries",
        }),
      );
      workcells.setContent(
        orPlaceholder({
          lines: [
            ...view.status.doors.map((door) => formatWorkcellLine({ workcell: door, label: "door" })),
            ...view.status.dispensers.map((dispenser) =>
              formatWorkcellLine({ workcell: dispenser, label: "dispenser" }),
            ),
          ],
          empty: "none",
        }),
      );
      errors.setContent(
        orPlaceholder({
          lines: view.status.dispatchErrors.map((error) => formatDispatchErrorLine({ error })),
          empty: "none",
        }),
      );
      screen.render();
    },
    updateTail: ({ events }) => {
      tail.setContent(
        orPlaceholder({
          lines: events.map((event) => formatEventLine({ event })),
          empty: "tail: no events",
        }),
      );
      screen.render();
    },
    writeLine: (line) => {
      outputLines = [...outputLines, ...line.split("\n")].slice(-OUTPUT_LINES);
      output.setContent(outputLines.join("\n"));
      screen.render();
    },
    destroy: () => {
      screen.destroy();
    },
  };
};
