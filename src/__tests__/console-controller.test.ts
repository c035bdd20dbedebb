import { jest } from "@jest/globals";
import { createConsoleController } from "../console/console-controller.js";
import type { GraphInfo, GraphSource } from "../graph/nav-graph.js";
import type { FleetdeckEvent } from "../state/events.js";
import type { OrphanPolicy, TaskPublisher } from "../tasks/dispatcher.js";

const OFFICE: GraphInfo = {
  fleetName: "tinyRobot",
  waypoints: [
    { name: "pantry", hasWorkcell: true, dispenser: "coke_dispenser" },
    { name: "lounge", hasWorkcell: false },
    { name: "hardware_2", hasWorkcell: true, ingestor: "coke_ingestor" },
  ],
};

const FLEET_STATE = {
  name: "tinyRobot",
  robots: [
    { name: "tinyRobot2", mode: "idle", location: { x: 0, y: 0, yaw: 0, level_name: "L1" } },
    { name: "tinyRobot1", mode: 2, location: { x: 1, y: 1, yaw: 0, level_name: "L1" } },
  ],
};

const makeController = ({
  orphanPolicy = "dispatch",
  publishTask = async () => undefined,
  publishMode = async () => undefined,
}: {
  orphanPolicy?: OrphanPolicy;
  publishTask?: TaskPublisher["publishTask"];
  publishMode?: TaskPublisher["publishMode"];
} = {}) => {
  const events: FleetdeckEvent[] = [];
  const graphSource: GraphSource = {
    load: async ({ fleetName }) => (fleetName === "tinyRobot" ? OFFICE : null),
  };
  let counter = 0;
  const controller = createConsoleController({
    settings: { maxDispatchAttempts: 3, orphanPolicy, workcellsOnly: false, errorLogLimit: 10 },
    graphSource,
    publisher: { publishTask, publishMode },
    emit: (event) => {
      events.push(event);
    },
    now: () => 50_000,
    createTaskId: ({ kind }) => {
      counter += 1;
      return `${kind}-${counter}`;
    },
  });
  return { controller, events };
};

const flushPromises = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

const DELIVERY = {
  fleetName: "tinyRobot",
  pickupWaypoint: "pantry",
  dropoffWaypoint: "hardware_2",
  scheduledAt: 60_000,
};

describe("createConsoleController", () => {
  test("rejects a dropoff that is not in the graph and leaves the queue alone", async () => {
    const { controller } = makeController();
    const result = await controller.submitDelivery({ ...DELIVERY, dropoffWaypoint: "rooftop" });

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "InvalidSelection",
        message: "dropoff waypoint rooftop is not in the tinyRobot graph",
      },
    });
    expect(controller.currentView().status.queue).toEqual([]);
  });

  test("queues a delivery with workcells taken from the graph", async () => {
    const { controller, events } = makeController();
    const result = await controller.submitDelivery(DELIVERY);

    expect(result).toEqual({
      ok: true,
      value: {
        sequenceId: 1,
        scheduledAt: 60_000,
        kind: "delivery",
        payload: {
          kind: "delivery",
          fleetName: "tinyRobot",
          pickupWaypoint: "pantry",
          pickupDispenser: "coke_dispenser",
          dropoffWaypoint: "hardware_2",
          dropoffIngestor: "coke_ingestor",
        },
        taskId: "delivery-1",
        attempts: 0,
      },
    });
    expect(controller.currentView().status.queue).toEqual([
      {
        sequenceId: 1,
        scheduledAt: 60_000,
        kind: "delivery",
        fleetName: "tinyRobot",
        taskId: "delivery-1",
        description: "delivery pantry -> hardware_2 by tinyRobot",
        attempts: 0,
      },
    ]);
    expect(events.map((event) => event.type)).toEqual(["TASK_QUEUED"]);
  });

  test("reports each kind of submission failure", async () => {
    const { controller } = makeController();
    expect(await controller.submitDelivery({ ...DELIVERY, pickupWaypoint: "lounge" })).toEqual({
      ok: false,
      error: { kind: "InvalidSelection", message: "pickup waypoint lounge has no dispenser" },
    });
    expect(await controller.submitDelivery({ ...DELIVERY, fleetName: "ghost" })).toEqual({
      ok: false,
      error: { kind: "NotFound", message: "no navigation graph for fleet ghost" },
    });
    expect(await controller.submitDelivery({ ...DELIVERY, dropoffWaypoint: "" })).toEqual({
      ok: false,
      error: { kind: "InvalidSchedule", message: "missing dropoff waypoint" },
    });
    expect(await controller.submitDelivery({ ...DELIVERY, scheduledAt: -1 })).toEqual({
      ok: false,
      error: { kind: "InvalidSchedule", message: "unrepresentable time: -1" },
    });
    expect(controller.currentView().status.queue).toHaveLength(0);
  });

  test("restricts waypoints to workcells when asked", async () => {
    const { controller } = makeController();
    controller.setWorkcellsOnly({ enabled: true });
    const result = await controller.submitLoop({
      fleetName: "tinyRobot",
      startWaypoint: "lounge",
      endWaypoint: "pantry",
      repeatCount: 2,
      scheduledAt: 60_000,
    });
    expect(result).toEqual({
      ok: false,
      error: { kind: "InvalidSelection", message: "start waypoint lounge has no workcell" },
    });
    expect(controller.currentView().workcellsOnly).toBe(true);
  });

  test("edits a loop's time and waypoints", async () => {
    const { controller, events } = makeController();
    await controller.submitLoop({
      fleetName: "tinyRobot",
      startWaypoint: "pantry",
      endWaypoint: "lounge",
      repeatCount: 1,
      scheduledAt: 60_000,
    });

    const edited = await controller.editEntry({
      sequenceId: 1,
      scheduledAt: 90_000,
      changes: { endWaypoint: "hardware_2", repeatCount: 4 },
    });
    expect(edited.ok && edited.value.payload).toEqual({
      kind: "loop",
      fleetName: "tinyRobot",
      startWaypoint: "pantry",
      endWaypoint: "hardware_2",
      repeatCount: 4,
    });
    expect(edited.ok && edited.value.scheduledAt).toBe(90_000);
    expect(events.map((event) => event.type)).toEqual(["TASK_QUEUED", "TASK_EDITED"]);

    expect(await controller.editEntry({ sequenceId: 1, changes: { startWaypoint: "rooftop" } })).toEqual({
      ok: false,
      error: { kind: "InvalidSelection", message: "start waypoint rooftop is not in the tinyRobot graph" },
    });
  });

  test("moving a delivery dropoff re-derives its ingestor", async () => {
    const { controller } = makeController();
    await controller.submitDelivery({ ...DELIVERY, dropoffIngestor: "custom_ingestor" });

    const kept = await controller.editEntry({ sequenceId: 1, scheduledAt: 70_000 });
    expect(kept.ok && kept.value.payload).toMatchObject({ dropoffIngestor: "custom_ingestor" });

    const moved = await controller.editEntry({ sequenceId: 1, changes: { dropoffWaypoint: "pantry" } });
    expect(moved).toEqual({
      ok: false,
      error: { kind: "InvalidSelection", message: "dropoff waypoint pantry has no ingestor" },
    });
  });

  test("an edit naming fields of the other task kind is rejected", async () => {
    const { controller, events } = makeController();
    await controller.submitLoop({
      fleetName: "tinyRobot",
      startWaypoint: "pantry",
      endWaypoint: "lounge",
      repeatCount: 1,
      scheduledAt: 60_000,
    });
    await controller.submitDelivery(DELIVERY);

    expect(
      await controller.editEntry({ sequenceId: 1, scheduledAt: 90_000, changes: { pickupWaypoint: "lounge" } }),
    ).toEqual({
      ok: false,
      error: { kind: "InvalidSchedule", message: "loop entries have no pickup waypoint" },
    });
    expect(
      await controller.editEntry({ sequenceId: 2, changes: { startWaypoint: "lounge", repeatCount: 2 } }),
    ).toEqual({
      ok: false,
      error: { kind: "InvalidSchedule", message: "delivery entries have no start waypoint, repeat count" },
    });
    expect(
      controller.currentView().status.queue.map(({ sequenceId, scheduledAt, kind }) => ({ sequenceId, scheduledAt, kind })),
    ).toEqual([
      { sequenceId: 1, scheduledAt: 60_000, kind: "loop" },
      { sequenceId: 2, scheduledAt: 60_000, kind: "delivery" },
    ]);
    expect(events.map((event) => event.type)).toEqual(["TASK_QUEUED", "TASK_QUEUED"]);
  });

  test("times outside the Date range are InvalidSchedule", async () => {
    const { controller } = makeController();
    expect(
      await controller.submitLoop({
        fleetName: "tinyRobot",
        startWaypoint: "pantry",
        endWaypoint: "lounge",
        repeatCount: 1,
        scheduledAt: 36_001_767_601_800_000,
      }),
    ).toEqual({
      ok: false,
      error: { kind: "InvalidSchedule", message: "unrepresentable time: 36001767601800000" },
    });
    expect(await controller.submitDelivery({ ...DELIVERY, scheduledAt: 8.64e15 + 1_000 })).toEqual({
      ok: false,
      error: { kind: "InvalidSchedule", message: "unrepresentable time: 8640000000001000" },
    });
    expect(controller.currentView().status.queue).toEqual([]);
  });

  test("edit and delete of unknown entries are NotFound", async () => {
    const { controller } = makeController();
    expect(await controller.editEntry({ sequenceId: 4, scheduledAt: 1 })).toEqual({
      ok: false,
      error: { kind: "NotFound", message: "no queued entry #4" },
    });
    expect(controller.deleteEntry({ sequenceId: 4 })).toEqual({
      ok: false,
      error: { kind: "NotFound", message: "no queued entry #4" },
    });
  });

  test("deleted entries are never dispatched", async () => {
    const publishTask = jest.fn<TaskPublisher["publishTask"]>(async () => undefined);
    const { controller, events } = makeController({ publishTask });
    await controller.submitDelivery(DELIVERY);

    expect(controller.deleteEntry({ sequenceId: 1 }).ok).toBe(true);
    await controller.tick({ now: 100_000 });
    expect(publishTask).not.toHaveBeenCalled();
    expect(events.map((event) => event.type)).toEqual(["TASK_QUEUED", "TASK_DELETED"]);
  });

  test("tracks fleets and prefetches their graphs", async () => {
    const { controller, events } = makeController();
    controller.applyFleetState({ payload: FLEET_STATE });
    await flushPromises();

    const view = controller.currentView();
    expect(view.selectors).toEqual({
      fleets: ["tinyRobot"],
      robots: ["tinyRobot1", "tinyRobot2"],
      waypoints: ["pantry", "lounge", "hardware_2"],
      selectedFleet: "tinyRobot",
      selectedRobot: "tinyRobot1",
    });
    expect(view.status.robots.map((robot) => robot.mode)).toEqual(["moving", "idle"]);
    expect(events.map((event) => event.type)).toEqual(["FLEET_DISCOVERED", "GRAPH_LOADED"]);

    controller.setWorkcellsOnly({ enabled: true });
    expect(controller.currentView({ selection: { robotName: "tinyRobot2" } }).selectors).toMatchObject({
      waypoints: ["pantry", "hardware_2"],
      selectedRobot: "tinyRobot2",
    });
  });

  test("rejects malformed inbound state", () => {
    const { controller } = makeController();
    expect(() => controller.applyFleetState({ payload: { robots: [] } })).toThrow("Missing fleet name");
    expect(controller.currentView().selectors.fleets).toEqual([]);
  });

  test("pauses and resumes known robots", async () => {
    const publishMode = jest.fn<TaskPublisher["publishMode"]>(async () => undefined);
    const { controller, events } = makeController({ publishMode });
    controller.applyFleetState({ payload: FLEET_STATE });

    expect(await controller.pauseRobot({ fleetName: "tinyRobot", robotName: "tinyRobot1" })).toEqual({
      ok: true,
      value: { fleet_name: "tinyRobot", robot_name: "tinyRobot1", mode: "paused", task_id: "mode-1" },
    });
    expect(await controller.resumeRobot({ fleetName: "tinyRobot", robotName: "tinyRobot1" })).toEqual({
      ok: true,
      value: { fleet_name: "tinyRobot", robot_name: "tinyRobot1", mode: "moving", task_id: "mode-2" },
    });
    expect(publishMode).toHaveBeenCalledTimes(2);
    expect(events.map((event) => event.type)).toContain("ROBOT_PAUSED");
    expect(events.map((event) => event.type)).toContain("ROBOT_RESUMED");

    expect(await controller.pauseRobot({ fleetName: "tinyRobot", robotName: "ghost" })).toEqual({
      ok: false,
      error: { kind: "NotFound", message: "no robot ghost in fleet tinyRobot" },
    });
  });

  test("a failed mode request is a DispatchFailure", async () => {
    const { controller, events } = makeController({
      publishMode: async () => {
        throw new Error("ipc timeout (2000ms)");
      },
    });
    controller.applyFleetState({ payload: FLEET_STATE });

    expect(await controller.pauseRobot({ fleetName: "tinyRobot", robotName: "tinyRobot2" })).toEqual({
      ok: false,
      error: { kind: "DispatchFailure", message: "ipc timeout (2000ms)" },
    });
    expect(events.some((event) => event.type === "MODE_REQUEST_FAILED")).toBe(true);
  });

  test("schedule pause holds dispatch until resumed", async () => {
    const publishTask = jest.fn<TaskPublisher["publishTask"]>(async () => undefined);
    const { controller } = makeController({ publishTask });
    await controller.submitDelivery(DELIVERY);
    controller.setSchedulePaused({ paused: true });

    expect((await controller.tick({ now: 100_000 })).skipped).toBe("paused");
    controller.setSchedulePaused({ paused: false });
    const report = await controller.tick({ now: 100_000 });
    expect(report.dispatched.map((entry) => entry.taskId)).toEqual(["delivery-1"]);
    expect(controller.currentView().status.taskSummaries).toEqual([
      { taskId: "delivery-1", state: "queued", fleetName: "tinyRobot", submittedAt: 100_000 },
    ]);
  });

  test("task summaries and workcell states show in the view", () => {
    const { controller } = makeController();
    controller.applyTaskSummary({
      payload: { task_id: "loop-9", state: "active", fleet_name: "tinyRobot", submission_time: 10 },
    });
    controller.applyDoorState({ payload: { door_name: "main_door", current_mode: 0 } });
    controller.applyDispenserState({ payload: { guid: "coke_dispenser", mode: 1 } });

    const { status } = controller.currentView();
    expect(status.taskSummaries.map((summary) => summary.state)).toEqual(["active"]);
    expect(status.doors).toEqual([{ name: "main_door", mode: "closed", updatedAt: 50_000 }]);
    expect(status.dispensers).toEqual([{ name: "coke_dispenser", mode: "busy", updatedAt: 50_000 }]);
  });
});
