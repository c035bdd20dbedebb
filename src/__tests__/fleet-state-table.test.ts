import { createFleetStateTable } from "../fleet/fleet-state-table.js";
import type { RobotState } from "../fleet/robot-state.js";

const robot = (overrides: Partial<RobotState> = {}): RobotState => ({
  fleetName: "tinyRobot",
  robotName: "tinyRobot1",
  mode: "idle",
  location: { x: 1, y: 2, yaw: 0, levelName: "L1" },
  ...overrides,
});

describe("createFleetStateTable", () => {
  test("the last update for a robot wins", () => {
    const table = createFleetStateTable();
    table.applyRobotState({ state: robot({ mode: "moving" }) });
    table.applyRobotState({ state: robot({ mode: "paused", location: { x: 5, y: 6, yaw: 1, levelName: "L2" } }) });

    const snapshot = table.snapshot();
    expect(snapshot.robotState.tinyRobot?.tinyRobot1?.mode).toBe("paused");
    expect(snapshot.robotState.tinyRobot?.tinyRobot1?.location).toEqual({
      x: 5,
      y: 6,
      yaw: 1,
      levelName: "L2",
    });
    expect(snapshot.robotsByFleet).toEqual({ tinyRobot: ["tinyRobot1"] });
  });

  test("reports a fleet as discovered only the first time", () => {
    const table = createFleetStateTable();
    expect(table.applyFleetState({ update: { fleetName: "f", robots: [robot({ fleetName: "f" })] } })).toEqual({
      discoveredFleet: true,
    });
    expect(
      table.applyFleetState({
        update: { fleetName: "f", robots: [robot({ fleetName: "f", robotName: "r2" })] },
      }),
    ).toEqual({ discoveredFleet: false });
    expect(table.snapshot().robotsByFleet).toEqual({ f: ["r2", "tinyRobot1"] });
  });

  test("snapshot is stable without updates and isolated from callers", () => {
    const table = createFleetStateTable();
    table.applyRobotState({ state: robot() });
    table.applyTaskSummary({
      summary: { taskId: "t1", state: "active", fleetName: "tinyRobot", submittedAt: 10 },
    });

    const first = table.snapshot();
    const second = table.snapshot();
    expect(second).toEqual(first);

    const state = first.robotState.tinyRobot?.tinyRobot1;
    if (!state) {
      throw new Error("missing robot");
    }
    state.location.x = 99;
    expect(table.snapshot().robotState.tinyRobot?.tinyRobot1?.location.x).toBe(1);
  });

  test("orders fleets, summaries and workcells", () => {
    const table = createFleetStateTable();
    table.applyRobotState({ state: robot({ fleetName: "zeta" }) });
    table.applyRobotState({ state: robot({ fleetName: "Alpha" }) });
    table.applyTaskSummary({ summary: { taskId: "b", state: "queued", fleetName: "zeta", submittedAt: 5 } });
    table.applyTaskSummary({ summary: { taskId: "a", state: "queued", fleetName: "zeta", submittedAt: 5 } });
    table.applyTaskSummary({ summary: { taskId: "c", state: "queued", fleetName: "zeta", submittedAt: 1 } });
    table.applyDoorState({ door: { name: "main_door", mode: "open", updatedAt: 1 } });
    table.applyDoorState({ door: { name: "coe_door", mode: "closed", updatedAt: 1 } });
    table.applyDispenserState({ dispenser: { name: "coke_dispenser", mode: "busy", updatedAt: 2 } });

    const snapshot = table.snapshot();
    expect(snapshot.fleets).toEqual(["Alpha", "zeta"]);
    expect(snapshot.taskSummaries.map((summary) => summary.taskId)).toEqual(["c", "a", "b"]);
    expect(snapshot.doors.map((door) => door.name)).toEqual(["coe_door", "main_door"]);
    expect(snapshot.dispensers).toEqual([{ name: "coke_dispenser", mode: "busy", updatedAt: 2 }]);
  });

  test("task summaries are upserts keyed by task id", () => {
    const table = createFleetStateTable();
    table.applyTaskSummary({ summary: { taskId: "t1", state: "queued", fleetName: "f", submittedAt: 1 } });
    table.applyTaskSummary({
      summary: { taskId: "t1", state: "completed", fleetName: "f", submittedAt: 1, robotName: "r1" },
    });
    expect(table.snapshot().taskSummaries).toEqual([
      { taskId: "t1", state: "completed", fleetName: "f", submittedAt: 1, robotName: "r1" },
    ]);
    expect(table.hasTaskSummary({ taskId: "t1" })).toBe(true);
  });

  test("revision counts mutations", () => {
    const table = createFleetStateTable();
    expect(table.snapshot().revision).toBe(0);
    table.applyRobotState({ state: robot() });
    table.applyDoorState({ door: { name: "d", mode: "open", updatedAt: 1 } });
    expect(table.snapshot().revision).toBe(2);
  });

  test("getRobot and hasFleet", () => {
    const table = createFleetStateTable();
    table.applyRobotState({ state: robot({ taskId: "loop-1" }) });
    expect(table.hasFleet({ fleetName: "tinyRobot" })).toBe(true);
    expect(table.hasFleet({ fleetName: "other" })).toBe(false);
    expect(table.getRobot({ fleetName: "tinyRobot", robotName: "tinyRobot1" })?.taskId).toBe("loop-1");
    expect(table.getRobot({ fleetName: "tinyRobot", robotName: "nobody" })).toBeUndefined();
  });
});
