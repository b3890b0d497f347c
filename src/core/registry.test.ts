import { describe, expect, it } from "vitest";
import { FakeBridge, groupRecord, lightRecord } from "../testing/fakes.js";
import { BackendError, NotFoundError } from "../util/errors.js";
import { silentLogger } from "../util/log.js";
import { DeviceRegistry } from "./registry.js";

function bridgeWithHome() {
  return new FakeBridge(
    {
      "1": lightRecord("Lamp1"),
      "2": lightRecord("Lamp2"),
      "3": lightRecord("Porch", { reachable: false }),
      "10": lightRecord("Desk"),
    },
    {
      "1": groupRecord("Living Room", ["1", "2"]),
      "2": groupRecord("Upstairs", ["2", "10"], "Zone"),
      "3": groupRecord("Office", ["10", "2"]),
      "4": groupRecord("Outside", ["3"]),
    },
  );
}

describe("DeviceRegistry", () => {
  it("maps names to lights and skips unreachable ones by default", async () => {
    const registry = new DeviceRegistry(bridgeWithHome(), { logger: silentLogger });
    await registry.refresh();

    expect(registry.names()).toEqual(["Lamp1", "Lamp2", "Desk"]);
    expect(registry.get("Desk").index).toBe("10");
    expect(registry.has("Porch")).toBe(false);
  });

  it("keeps unreachable lights when asked to", async () => {
    const registry = new DeviceRegistry(bridgeWithHome(), { permitUnreachable: true, logger: silentLogger });
    await registry.refresh();
    expect(registry.get("Porch").room).toBe("Outside");
  });

  it("assigns each light to the first room that claims it and ignores zones", async () => {
    const registry = new DeviceRegistry(bridgeWithHome(), { logger: silentLogger });
    await registry.refresh();

    expect(registry.get("Lamp1").room).toBe("Living Room");
    expect(registry.get("Lamp2").room).toBe("Living Room");
    expect(registry.get("Desk").room).toBe("Office");
    expect(registry.room("Office").map((l) => l.name)).toEqual(["Desk"]);
  });

  it("groups lights by room with unassigned lights under null", async () => {
    const bridge = new FakeBridge(
      { "1": lightRecord("Lamp1"), "2": lightRecord("Lamp2") },
      { "5": groupRecord("Kitchen", ["2"]) },
    );
    const registry = new DeviceRegistry(bridge, { logger: silentLogger });
    await registry.refresh();

    const rooms = registry.byRoom();
    expect(rooms.get("Kitchen")?.map((l) => l.name)).toEqual(["Lamp2"]);
    expect(rooms.get(null)?.map((l) => l.name)).toEqual(["Lamp1"]);
  });

  it("treats untyped groups as rooms", async () => {
    const bridge = new FakeBridge(
      { "1": lightRecord("Lamp1") },
      { "1": { name: "Den", lights: ["1"] } },
    );
    const registry = new DeviceRegistry(bridge, { logger: silentLogger });
    await registry.refresh();
    expect(registry.get("Lamp1").room).toBe("Den");
  });

  it("exposes only allowlisted lights", async () => {
    const registry = new DeviceRegistry(bridgeWithHome(), { allowlist: new Set(["Desk"]), logger: silentLogger });
    await registry.refresh();
    expect(registry.names()).toEqual(["Desk"]);
  });

  it("raises NotFoundError for unknown lights and rooms", async () => {
    const registry = new DeviceRegistry(bridgeWithHome(), { logger: silentLogger });
    await registry.refresh();
    expect(() => registry.get("Nope")).toThrow(NotFoundError);
    expect(() => registry.room("Garage")).toThrow(NotFoundError);
  });

  it("keeps the handle of an unchanged light across refreshes and updates its cache and room", async () => {
    const bridge = bridgeWithHome();
    const registry = new DeviceRegistry(bridge, { logger: silentLogger });
    await registry.refresh();
    const lamp = registry.get("Lamp1");
    const desk = registry.get("Desk");

    bridge.lights["1"] = lightRecord("Lamp1", { on: true, bri: 40 });
    bridge.lights["10"] = lightRecord("Bench");
    bridge.lights["11"] = lightRecord("Desk");
    bridge.groups["1"] = groupRecord("Living Room", ["2"]);
    bridge.groups["5"] = groupRecord("Den", ["1"]);
    await registry.refresh();

    expect(registry.get("Lamp1")).toBe(lamp);
    expect(lamp.snapshot).toMatchObject({ on: true, brightness: 40, room: "Den" });
    expect(registry.get("Desk")).not.toBe(desk);
    expect(registry.get("Desk").index).toBe("11");
  });

  it("propagates a refused discovery and keeps the previous snapshot", async () => {
    const bridge = bridgeWithHome();
    const registry = new DeviceRegistry(bridge, { logger: silentLogger });
    await registry.refresh();

    bridge.lightsReply = [{ error: { type: 1, address: "/lights", description: "unauthorized user" } }];
    await expect(registry.refresh()).rejects.toBeInstanceOf(BackendError);
    expect(registry.names()).toEqual(["Lamp1", "Lamp2", "Desk"]);
  });
});
