import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createFileGraphSource, parseNavGraph, resolveGraphPath } from "../graph/nav-graph.js";

const OFFICE_GRAPH = `
building_name: office
levels:
  L1:
    vertices:
      - [1.0, 2.0, {name: pantry, pickup_dispenser: coke_dispenser}]
      - [3.0, 4.0, {name: ""}]
      - [5.0, 6.0, {name: lounge}]
      - [7.0, 8.0, {}]
    lanes: []
  L2:
    vertices:
      - [1.0, 1.0, {name: hardware_2, dropoff_ingestor: coke_ingestor}]
      - [2.0, 2.0, {name: lounge}]
`;

describe("parseNavGraph", () => {
  test("collects named waypoints and their workcells", () => {
    expect(parseNavGraph({ fleetName: "tinyRobot", raw: OFFICE_GRAPH })).toEqual({
      fleetName: "tinyRobot",
      waypoints: [
        { name: "pantry", hasWorkcell: true, dispenser: "coke_dispenser" },
        { name: "lounge", hasWorkcell: false },
        { name: "hardware_2", hasWorkcell: true, ingestor: "coke_ingestor" },
      ],
    });
  });

  test("returns null for documents without levels", () => {
    expect(parseNavGraph({ fleetName: "f", raw: "building_name: x\n" })).toBeNull();
    expect(parseNavGraph({ fleetName: "f", raw: "levels: [\n" })).toBeNull();
  });
});

describe("resolveGraphPath", () => {
  test("uses per-fleet files before the fleet name", () => {
    expect(
      resolveGraphPath({ fleetName: "a", graphDir: "/maps", graphFiles: { a: "office.yaml" } }),
    ).toBe("/maps/office.yaml");
    expect(
      resolveGraphPath({ fleetName: "a", graphDir: "/maps", graphFiles: { a: "/srv/a.yaml" } }),
    ).toBe("/srv/a.yaml");
    expect(resolveGraphPath({ fleetName: "b", graphDir: "/maps", graphFiles: {} })).toBe(
      "/maps/b.yaml",
    );
  });
});

describe("createFileGraphSource", () => {
  test("loads graphs from the graph directory", async () => {
    const graphDir = await mkdtemp(join(tmpdir(), "fleetdeck-maps-"));
    await writeFile(join(graphDir, "tinyRobot.yaml"), OFFICE_GRAPH, "utf-8");
    const source = createFileGraphSource({ graphDir });

    const graph = await source.load({ fleetName: "tinyRobot" });
    expect(graph?.waypoints.map((waypoint) => waypoint.name)).toEqual([
      "pantry",
      "lounge",
      "hardware_2",
    ]);
  });

  test("resolves null for missing files and directories", async () => {
    const graphDir = await mkdtemp(join(tmpdir(), "fleetdeck-maps-"));
    await mkdir(join(graphDir, "folder.yaml"));
    const source = createFileGraphSource({ graphDir, graphFiles: { weird: "folder.yaml" } });

    await expect(source.load({ fleetName: "absent" })).resolves.toBeNull();
    await expect(source.load({ fleetName: "weird" })).resolves.toBeNull();
  });
});
