import { formatGraphListing } from "../commands/graph.js";
import { readOutputLines, sendConsoleCommand } from "../commands/send.js";
import { formatTailLines } from "../commands/tail.js";
import type { IpcClient } from "../ipc/client.js";
import { makeIpcResponse } from "../ipc/protocol.js";

describe("formatGraphListing", () => {
  test("lists waypoints with their workcells", () => {
    expect(
      formatGraphListing({
        graph: {
          fleetName: "tinyRobot",
          waypoints: [
            { name: "pantry", hasWorkcell: true, dispenser: "coke_dispenser" },
            { name: "lounge", hasWorkcell: false },
          ],
        },
      }),
    ).toEqual(["tinyRobot: 2 waypoints", "  pantry [workcell] dispenser=coke_dispenser", "  lounge"]);
  });
});

describe("send", () => {
  test("reads string lines from a command response", () => {
    expect(readOutputLines({ data: { lines: ["a", 2, "b"] } })).toEqual(["a", "b"]);
    expect(readOutputLines({ data: null })).toEqual([]);
    expect(readOutputLines({ data: { lines: "a" } })).toEqual([]);
  });

  test("sends the line as a command request", async () => {
    const requests: Array<{ type: string; payload?: unknown }> = [];
    const client: IpcClient = {
      request: async ({ type, payload }) => {
        requests.push({ type, payload });
        return makeIpcResponse({ ok: true, data: { lines: ["ran /queue (0 queued)"] } });
      },
    };
    await expect(sendConsoleCommand({ client, line: "/queue" })).resolves.toEqual([
      "ran /queue (0 queued)",
    ]);
    expect(requests).toEqual([{ type: "command", payload: { line: "/queue" } }]);
  });

  test("throws the console's error", async () => {
    const client: IpcClient = {
      request: async () => makeIpcResponse({ ok: false, error: "Missing line" }),
    };
    await expect(sendConsoleCommand({ client, line: "/" })).rejects.toThrow("Missing line");
  });
});

describe("formatTailLines", () => {
  test("formats parseable events as plain text", () => {
    const raw = [
      JSON.stringify({ ts: "bad", type: "TASK_QUEUED", msg: "queued #1 loop a <-> b by f", fleet: "f" }),
      "not json",
      JSON.stringify({ ts: "bad", type: "CONSOLE_START", msg: "console v0.1.0 listening" }),
    ].join("\n");
    expect(formatTailLines({ raw })).toEqual([
      "QUEU | --:--:-- | f | queued #1 loop a <-> b by f",
      "INFO | --:--:-- | - | console v0.1.0 listening",
    ]);
  });
});
