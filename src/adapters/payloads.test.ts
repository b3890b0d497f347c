import { describe, expect, it } from "vitest";
import { BackendError, ProtocolError } from "../util/errors.js";
import { checkStateUpdate, decodeGroups, decodeLights } from "./payloads.js";

describe("decodeLights", () => {
  it("accepts a bridge light list and defaults reachable to true", () => {
    const lights = decodeLights({ "1": { name: "Lamp1", state: { on: true, bri: 120 } } });
    expect(lights["1"].name).toBe("Lamp1");
    expect(lights["1"].state.reachable).toBe(true);
    expect(lights["1"].state.bri).toBe(120);
  });

  it("turns a bridge error list into a BackendError", () => {
    const reply = [{ error: { type: 1, address: "/", description: "unauthorized user" } }];
    expect(() => decodeLights(reply)).toThrow(BackendError);
    expect(() => decodeLights(reply)).toThrow("Bridge refused light list: unauthorized user");
  });

  it("reports the offending path of a malformed light", () => {
    expect(() => decodeLights({ "3": { name: "Lamp3", state: { on: "yes" } } })).toThrow(ProtocolError);
    expect(() => decodeLights({ "3": { name: "Lamp3", state: { on: "yes" } } })).toThrow(/at 3\.state\.on/);
  });
});

describe("decodeGroups", () => {
  it("requires a lights array per group", () => {
    expect(decodeGroups({ "1": { name: "Kitchen", type: "Room", lights: ["1", "2"] } })["1"].lights).toEqual(["1", "2"]);
    expect(() => decodeGroups({ "1": { name: "Kitchen" } })).toThrow(ProtocolError);
  });
});

describe("checkStateUpdate", () => {
  it("passes a list of success items", () => {
    expect(() => checkStateUpdate([{ success: { "/lights/1/state/on": true } }], "Lamp1")).not.toThrow();
  });

  it("fails with the bridge's description when any item is an error", () => {
    const reply = [
      { success: { "/lights/1/state/on": true } },
      { error: { type: 201, address: "/lights/1/state/bri", description: "parameter, bri, is not modifiable" } },
    ];
    expect(() => checkStateUpdate(reply, "Lamp1")).toThrow(
      "Bridge rejected update for Lamp1: parameter, bri, is not modifiable",
    );
  });

  it("fails with ProtocolError when the reply is not a list", () => {
    expect(() => checkStateUpdate({ ok: true }, "Lamp1")).toThrow(ProtocolError);
  });
});
