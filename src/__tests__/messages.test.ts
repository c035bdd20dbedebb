import {
  parseDispenserStateMessage,
  parseDoorStateMessage,
  parseFleetStateMessage,
  parseTaskSummaryMessage,
} from "../fleet/messages.js";

describe("parseFleetStateMessage", () => {
  test("reads robots with named and numeric modes", () => {
    const update = parseFleetStateMessage({
      payload: {
        name: "tinyRobot",
        robots: [
          {
            name: "tinyRobot1",
            mode: "Moving",
            location: { x: 10.5, y: -3, yaw: 1.2, level_name: "L1" },
            task_id: "loop-1",
            battery_percent: 87.5,
          },
          { name: "tinyRobot2", mode: { mode: 3 }, location: {} },
        ],
      },
    });
    expect(update).toEqual({
      fleetName: "tinyRobot",
      robots: [
        {
          fleetName: "tinyRobot",
          robotName: "tinyRobot1",
          mode: "moving",
          location: { x: 10.5, y: -3, yaw: 1.2, levelName: "L1" },
          taskId: "loop-1",
          batteryPercent: 87.5,
        },
        {
          fleetName: "tinyRobot",
          robotName: "tinyRobot2",
          mode: "paused",
          location: { x: 0, y: 0, yaw: 0, levelName: "" },
        },
      ],
    });
  });

  test("rejects malformed messages", () => {
    expect(() => parseFleetStateMessage({ payload: null })).toThrow("Missing fleet state");
    expect(() => parseFleetStateMessage({ payload: { name: "f" } })).toThrow("Missing robots");
    expect(() =>
      parseFleetStateMessage({ payload: { name: "f", robots: [{ name: "r", mode: "flying", location: {} }] } }),
    ).toThrow("Invalid robot mode: flying");
    expect(() =>
      parseFleetStateMessage({ payload: { name: "f", robots: [{ name: "r", mode: 42, location: {} }] } }),
    ).toThrow("Invalid robot mode: 42");
    expect(() =>
      parseFleetStateMessage({ payload: { name: "f", robots: [{ name: "r", mode: "idle" }] } }),
    ).toThrow("Missing robot location");
  });
});

describe("parseTaskSummaryMessage", () => {
  test("reads fields and parses the submission time", () => {
    expect(
      parseTaskSummaryMessage({
        payload: {
          task_id: "delivery-1",
          state: 1,
          fleet_name: "tinyRobot",
          submission_time: "2024-05-06T10:00:00Z",
          robot_name: "tinyRobot1",
          status: "picking up",
        },
        nowMs: 5,
      }),
    ).toEqual({
      taskId: "delivery-1",
      state: "active",
      fleetName: "tinyRobot",
      submittedAt: Date.UTC(2024, 4, 6, 10, 0, 0),
      robotName: "tinyRobot1",
      statusText: "picking up",
    });
  });

  test("falls back to now without a submission time", () => {
    const summary = parseTaskSummaryMessage({
      payload: { task_id: "t", state: "completed", fleet_name: "f" },
      nowMs: 1234,
    });
    expect(summary.submittedAt).toBe(1234);
    expect(summary.robotName).toBeUndefined();
  });

  test("requires a task id", () => {
    expect(() =>
      parseTaskSummaryMessage({ payload: { state: "queued", fleet_name: "f" }, nowMs: 0 }),
    ).toThrow("Missing task id");
  });
});

describe("workcell messages", () => {
  test("door state accepts a wrapped mode", () => {
    expect(
      parseDoorStateMessage({ payload: { door_name: "main_door", current_mode: { value: 2 } }, nowMs: 7 }),
    ).toEqual({ name: "main_door", mode: "open", updatedAt: 7 });
  });

  test("dispenser state", () => {
    expect(
      parseDispenserStateMessage({ payload: { guid: "coke_dispenser", mode: "BUSY" }, nowMs: 8 }),
    ).toEqual({ name: "coke_dispenser", mode: "busy", updatedAt: 8 });
    expect(() => parseDispenserStateMessage({ payload: { mode: "idle" }, nowMs: 8 })).toThrow(
      "Missing dispenser guid",
    );
  });
});
