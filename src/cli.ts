#!/usr/bin/env node

import yargs from "yargs";
import { getCliHelp } from "./cli-help.js";
import { runConsole } from "./commands/console.js";
import { runGraph } from "./commands/graph.js";
import { runSend } from "./commands/send.js";
import { runTail } from "./commands/tail.js";
import { getFleetdeckPaths } from "./paths.js";
import { setRuntimeOverrides, type RuntimeOverrides } from "./runtime/overrides.js";
import { ensureStateDirs } from "./state/ensure-state.js";
import { appendEvent } from "./state/events.js";
import { getWorkspaceRoot } from "./workspace-root.js";

interface CommandSpec {
  name: string;
  args: string[];
}

interface ParsedArgs {
  command: CommandSpec;
  helpRequested: boolean;
  overrides: RuntimeOverrides;
}

export const parseArgs = ({ argv }: { argv: string[] }): ParsedArgs => {
  const parsed = yargs(argv)
    .parserConfiguration({ "unknown-options-as-args": true })
    .option("graph-dir", { type: "string" })
    .option("inbound-socket", { type: "string" })
    .option("outbound-socket", { type: "string" })
    // help(false) drops any help option declared before it.
    .help(false)
    .version(false)
    .option("help", { type: "boolean", alias: "h", default: false })
    .parseSync();
  const [name, ...args] = parsed._.map((value) => String(value));
  return {
    command: {
      name: name ?? "",
      args,
    },
    helpRequested: Boolean(parsed.help) || argv.includes("-h") || argv.includes("--help"),
    overrides: {
      graphDir: parsed.graphDir,
      inboundSocket: parsed.inboundSocket,
      outboundSocket: parsed.outboundSocket,
    },
  };
};

const reportFatal = async ({ label, error }: { label: string; error: unknown }): Promise<void> => {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;
  console.error(`${label}: ${message}`);
  if (stack) {
    console.error(stack);
  }
  try {
    const paths = getFleetdeckPaths({ root: getWorkspaceRoot() });
    await ensureStateDirs({ paths });
    await appendEvent({
      eventsLog: paths.eventsLog,
      event: {
        ts: new Date().toISOString(),
        type: "FATAL",
        msg: `${label}: ${message}`,
        data: stack ? { stack } : undefined,
      },
    });
  } catch (logError) {
    console.error(`event log unavailable: ${logError instanceof Error ? logError.message : String(logError)}`);
  }
};

const main = async ({ argv }: { argv: string[] }): Promise<void> => {
  const parsed = parseArgs({ argv });
  if (parsed.helpRequested || parsed.command.name === "help") {
    console.log(getCliHelp());
    return;
  }
  setRuntimeOverrides({ overrides: parsed.overrides });
  const command = parsed.command;

  switch (command.name) {
    case "send": {
      await runSend({ args: command.args });
      return;
    }
    case "graph": {
      await runGraph({ args: command.args });
      return;
    }
    case "tail": {
      await runTail({ args: command.args });
      return;
    }
    case "console":
    case "": {
      await runConsole({});
      return;
    }
    default: {
      throw new Error(`Unknown command: ${command.name}`);
    }
  }
};

if (require.main === module) {
  process.on("uncaughtException", (error) => {
    void reportFatal({ label: "uncaughtException", error }).finally(() => {
      process.exit(1);
    });
  });

  process.on("unhandledRejection", (error) => {
    void reportFatal({ label: "unhandledRejection", error }).finally(() => {
      process.exit(1);
    });
  });

  void main({ argv: process.argv.slice(2) }).catch((error: unknown) => {
    void reportFatal({ label: "command failed", error }).finally(() => {
      process.exit(1);
    });
  });
}
