import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  loadCommandHistory,
  normalizeHistoryEntries,
  parseCommandHistory,
} from "../state/command-history.js";

const makeHistoryPath = async (): Promise<string> => {
  const root = await mkdtemp(join(tmpdir(), "fleetdeck-history-"));
  return join(root, "command-history.json");
};

describe("normalizeHistoryEntries", () => {
  test("trims, drops blanks and caps length", () => {
    expect(
      normalizeHistoryEntries({
        entries: ["", " /queue ", " ", "/schedule pause", "/delete 3"],
        maxEntries: 2,
      }),
    ).toEqual(["/schedule pause", "/delete 3"]);
  });

  test("moves a repeated command to the end", () => {
    expect(
      normalizeHistoryEntries({
        entries: ["/queue", "/pause tinyRobot r1", "/queue"],
        maxEntries: 10,
      }),
    ).toEqual(["/pause tinyRobot r1", "/queue"]);
  });
});

describe("parseCommandHistory", () => {
  test("ignores bad JSON, missing entries and non-string entries", () => {
    expect(parseCommandHistory({ raw: "{bad", maxEntries: 5 })).toEqual([]);
    expect(parseCommandHistory({ raw: JSON.stringify({ entries: "bad" }), maxEntries: 5 })).toEqual([]);
    expect(
      parseCommandHistory({ raw: JSON.stringify({ entries: ["/queue", 4, "/help"] }), maxEntries: 5 }),
    ).toEqual(["/queue", "/help"]);
  });
});

describe("loadCommandHistory", () => {
  test("starts empty without a file", async () => {
    const history = await loadCommandHistory({ path: await makeHistoryPath(), maxEntries: 5 });
    expect(history.list()).toEqual([]);
  });

  test("loads saved entries and persists new ones", async () => {
    const path = await makeHistoryPath();
    await writeFile(path, JSON.stringify({ entries: ["/queue", "/help"] }), "utf-8");
    const history = await loadCommandHistory({ path, maxEntries: 2, now: () => 0 });
    expect(history.list()).toEqual(["/queue", "/help"]);

    await history.record({ entry: " /schedule pause " });
    expect(history.list()).toEqual(["/help", "/schedule pause"]);
    expect(JSON.parse(await readFile(path, "utf-8"))).toEqual({
      entries: ["/help", "/schedule pause"],
      updatedAt: "1970-01-01T00:00:00.000Z",
    });
  });
});
