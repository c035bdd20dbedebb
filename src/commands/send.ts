import yargs from "yargs";
import { loadConfig } from "../config.js";
import { IPC_TIMEOUT_MS } from "../constants.js";
import { createIpcClient, type IpcClient } from "../ipc/client.js";
import { getWorkspaceRoot } from "../workspace-root.js";

export const readOutputLines = ({ data }: { data: unknown }): string[] => {
  if (!data || typeof data !== "object") {
    return [];
  }
  const lines: unknown = Reflect.get(data, "lines");
  if (!Array.isArray(lines)) {
    return [];
  }
  return lines.filter((line): line is string => typeof line === "string");
};

/** Runs one slash command inside a running console and returns its output. */
export const sendConsoleCommand = async ({
  client,
  line,
}: {
  client: IpcClient;
  line: string;
}): Promise<string[]> => {
  const response = await client.request({ type: "command", payload: { line } });
  if (!response.ok) {
    throw new Error(response.error ?? "command rejected");
  }
  return readOutputLines({ data: response.data });
};

export const runSend = async ({ args }: { args: string[] }): Promise<void> => {
  const parsed = yargs(args)
    .option("timeout", { type: "number", default: IPC_TIMEOUT_MS })
    .help(false)
    .version(false)
    .strictOptions()
    .exitProcess(false)
    .parseSync();
  const line = parsed._.map((value) => String(value)).join(" ").trim();
  if (!line) {
    throw new Error('Usage: fleetdeck send "/command ..."');
  }
  if (!Number.isFinite(parsed.timeout) || parsed.timeout <= 0) {
    throw new Error("Invalid --timeout value");
  }
  const root = getWorkspaceRoot();
  const config = await loadConfig({ root });
  const client = createIpcClient({ socketPath: config.inboundSocket, timeoutMs: parsed.timeout });
  const lines = await sendConsoleCommand({ client, line: line.startsWith("/") ? line : `/${line}` });
  for (const output of lines) {
    process.stdout.write(`${output}\n`);
  }
};
