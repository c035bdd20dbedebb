import { ensureConfigFile, loadConfig } from "../config.js";
import { COMMAND_HISTORY_LIMIT, EVENT_TAIL_LIMIT } from "../constants.js";
import {
  buildConsoleCommands,
  makeConsoleCommandHandler,
  type CommandHandler,
} from "../console/console-commands.js";
import { createConsoleController } from "../console/console-controller.js";
import { startControlLoop } from "../console/control-loop.js";
import type { ConsoleSelection } from "../console/view-model.js";
import { createFileGraphSource } from "../graph/nav-graph.js";
import { createIpcClient } from "../ipc/client.js";
import { buildConsoleIpcHandlers } from "../ipc/console-handlers.js";
import { startIpcServer } from "../ipc/server.js";
import { createIpcTaskPublisher } from "../ipc/task-publisher.js";
import { getFleetdeckPaths } from "../paths.js";
import { loadCommandHistory } from "../state/command-history.js";
import { ensureStateDirs } from "../state/ensure-state.js";
import { createEventLogSink } from "../state/events.js";
import { readRecentEvents } from "../state/read-events.js";
import { startConsoleScreen } from "../tui/console-screen.js";
import { readPackageVersion } from "../version.js";
import { getWorkspaceRoot } from "../workspace-root.js";

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const runConsole = async ({}: {}): Promise<void> => {
  const root = getWorkspaceRoot();
  const paths = getFleetdeckPaths({ root });
  await ensureStateDirs({ paths });
  await ensureConfigFile({ root });
  const config = await loadConfig({ root });
  const version = await readPackageVersion();

  let writeLine: (line: string) => void = (line) => {
    process.stderr.write(`${line}\n`);
  };
  const reportError = (error: unknown): void => {
    writeLine(`error: ${describeError(error)}`);
  };

  const { sink: emit, flush } = createEventLogSink({
    eventsLog: paths.eventsLog,
    onError: reportError,
  });

  const controller = createConsoleController({
    settings: {
      maxDispatchAttempts: config.maxDispatchAttempts,
      orphanPolicy: config.orphanPolicy,
      workcellsOnly: config.workcellsOnly,
      errorLogLimit: config.errorLogLimit,
    },
    graphSource: createFileGraphSource({
      graphDir: config.graphDir,
      graphFiles: config.graphFiles,
    }),
    publisher: createIpcTaskPublisher({
      client: createIpcClient({ socketPath: config.outboundSocket }),
    }),
    emit,
  });

  let selection: ConsoleSelection = {};
  const getSelection = (): ConsoleSelection => selection;
  const setSelection = (next: ConsoleSelection): void => {
    selection = next;
  };

  const server = await startIpcServer({
    socketPath: config.inboundSocket,
    handlers: buildConsoleIpcHandlers({ controller, emit, getSelection, setSelection }),
    onError: reportError,
  });

  let handleCommand: CommandHandler = () => undefined;
  let stopping = false;
  const shutdown = async (): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    loop.stop();
    await server.close();
    emit({ ts: new Date().toISOString(), type: "CONSOLE_STOP", msg: "console stopped" });
    await flush();
    screen.destroy();
    process.exit(0);
  };
  const requestShutdown = (): void => {
    void shutdown().catch((error: unknown) => {
      process.stderr.write(`shutdown failed: ${describeError(error)}\n`);
      process.exit(1);
    });
  };

  const history = await loadCommandHistory({
    path: paths.commandHistoryPath,
    maxEntries: COMMAND_HISTORY_LIMIT,
  });

  const screen = startConsoleScreen({
    version,
    tailLimit: EVENT_TAIL_LIMIT,
    onCommand: (value) => handleCommand(value),
    recallHistory: history.list,
    onExit: requestShutdown,
  });
  writeLine = screen.writeLine;

  handleCommand = makeConsoleCommandHandler({
    commands: buildConsoleCommands({
      controller,
      writeLine: (line) => writeLine(line),
      now: () => Date.now(),
      getSelection,
      setSelection,
    }),
    history,
    writeLine: (line) => writeLine(line),
    onHistoryError: reportError,
  });

  emit({
    ts: new Date().toISOString(),
    type: "CONSOLE_START",
    msg: `console v${version} listening on ${config.inboundSocket}`,
    data: { outboundSocket: config.outboundSocket, graphDir: config.graphDir },
  });

  const loop = startControlLoop({
    controller,
    dispatchIntervalMs: config.dispatchIntervalMs,
    refreshIntervalMs: config.refreshIntervalMs,
    render: () => {
      screen.updateView({ view: controller.currentView({ selection }) });
      void readRecentEvents({ eventsLog: paths.eventsLog, limit: EVENT_TAIL_LIMIT })
        .then((events) => {
          screen.updateTail({ events });
        })
        .catch(reportError);
    },
    onError: reportError,
  });

  process.on("SIGINT", requestShutdown);
  process.on("SIGTERM", requestShutdown);
};
