import { getRuntimeOverrides, setRuntimeOverrides } from "../runtime/overrides.js";

describe("runtime overrides", () => {
  afterEach(() => {
    setRuntimeOverrides({ overrides: {} });
  });

  test("sets and reads overrides", () => {
    setRuntimeOverrides({
      overrides: {
        graphDir: "maps/site-b",
        inboundSocket: "/tmp/in.sock",
        outboundSocket: "/tmp/out.sock",
      },
    });
    const overrides = getRuntimeOverrides();
    expect(overrides.graphDir).toBe("maps/site-b");
    expect(overrides.inboundSocket).toBe("/tmp/in.sock");
    expect(overrides.outboundSocket).toBe("/tmp/out.sock");
  });
});
