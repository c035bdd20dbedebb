import { createReadStream, watch } from "node:fs";
import { readFile, stat } from "node:fs/promises";
import yargs from "yargs";
import { getFleetdeckPaths } from "../paths.js";
import { ensureStateDirs } from "../state/ensure-state.js";
import { parseEventLines } from "../state/read-events.js";
import { formatEventLine, stripTags } from "../tui/format-event.js";
import { getWorkspaceRoot } from "../workspace-root.js";

export const formatTailLines = ({ raw }: { raw: string }): string[] =>
  parseEventLines({ raw }).map((event) => stripTags({ line: formatEventLine({ event }) }));

const emitEvents = ({ raw }: { raw: string }): void => {
  for (const line of formatTailLines({ raw })) {
    process.stdout.write(`${line}\n`);
  }
};

export const runTail = async ({ args }: { args: string[] }): Promise<void> => {
  const paths = getFleetdeckPaths({ root: getWorkspaceRoot() });
  await ensureStateDirs({ paths });
  const parsed = yargs(args)
    .option("limit", { type: "number", default: 30 })
    .option("follow", { type: "boolean", default: true })
    .help(false)
    .version(false)
    .strict()
    .exitProcess(false)
    .parseSync();
  const limit = parsed.limit;
  if (!Number.isFinite(limit) || limit <= 0) {
    throw new Error("Invalid --limit value");
  }

  const raw = await readFile(paths.eventsLog, "utf-8");
  const lines = raw.split("\n").filter((line) => line.trim().length > 0);
  emitEvents({ raw: lines.slice(-limit).join("\n") });
  let offset = Buffer.byteLength(raw);

  if (!parsed.follow) {
    return;
  }

  let reading = false;
  const readAppended = async (): Promise<void> => {
    const stats = await stat(paths.eventsLog);
    if (stats.size < offset) {
      offset = 0;
    }
    if (stats.size === offset) {
      return;
    }
    const chunk = await new Promise<string>((resolve, reject) => {
      let chunked = "";
      const stream = createReadStream(paths.eventsLog, { start: offset, end: stats.size - 1 });
      stream.on("data", (data) => {
        chunked += data.toString();
      });
      stream.on("error", reject);
      stream.on("end", () => resolve(chunked));
    });
    emitEvents({ raw: chunk });
    offset = stats.size;
  };

  watch(paths.eventsLog, (eventType) => {
    if (eventType !== "change" || reading) {
      return;
    }
    reading = true;
    void readAppended()
      .catch((error: unknown) => {
        process.stderr.write(`tail: ${error instanceof Error ? error.message : String(error)}\n`);
      })
      .finally(() => {
        reading = false;
      });
  });
};
