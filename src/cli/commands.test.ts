import { describe, expect, it } from "vitest";
import { FakeBridge, groupRecord, lightRecord, recordingSleep } from "../testing/fakes.js";
import { DeviceRegistry } from "../core/registry.js";
import { EffectScheduler } from "../core/scheduler.js";
import { SharedConfig } from "../core/sharedConfig.js";
import { InvalidParameterError, NotFoundError } from "../util/errors.js";
import { silentLogger } from "../util/log.js";
import { parseCliArgs } from "./args.js";
import { IDENTIFY_BLINKS, runAction, type CliContext } from "./commands.js";

async function setup() {
  const bridge = new FakeBridge(
    {
      "1": lightRecord("Lamp1", { xy: [0.31, 0.32] }),
      "2": lightRecord("Lamp2"),
    },
    { "1": groupRecord("Kitchen", ["1"]) },
  );
  const { sleep, slept } = recordingSleep();
  const registry = new DeviceRegistry(bridge, { sleep, logger: silentLogger });
  await registry.refresh();
  const shared = new SharedConfig();
  const scheduler = new EffectScheduler(registry, shared, { sleep, logger: silentLogger });
  const lines: string[] = [];
  const ctx: CliContext = {
    registry,
    scheduler,
    shared,
    out: (line) => lines.push(line),
    interrupted: () => new Promise((r) => setImmediate(r)),
  };
  const run = (...argv: string[]) => runAction(parseCliArgs(argv), ctx);
  return { bridge, lines, run, scheduler, shared, slept };
}

describe("runAction", () => {
  it("lists lights, rooms and colours", async () => {
    const { lines, run } = await setup();
    await run("get-lights");
    await run("get-rooms");
    expect(lines).toEqual(["lights:", " - Lamp1", " - Lamp2", "Kitchen:", " - Lamp1", "(no room):", " - Lamp2"]);

    lines.length = 0;
    await run("get-colors");
    expect(lines[0]).toBe("colors:");
    expect(lines).toContain(" - forest_green");
  });

  it("prints the xy coordinates of each light", async () => {
    const { lines, run } = await setup();
    await run("get-xy");
    expect(lines).toEqual(["Lamp1: [0.31, 0.32]", "Lamp2: (no xy)"]);
  });

  it("turns targeted lights on with the given look", async () => {
    const { bridge, lines, run } = await setup();
    await run("on", "-t", "Lamp2", "-b", "80");
    expect(lines).toEqual(["Turning on Lamp2"]);
    expect(bridge.puts()).toStrictEqual([{ sat: 255, bri: 80, on: true }]);
    expect(bridge.calls[bridge.calls.length - 1].path).toBe("lights/2/state");
  });

  it("turns every light off when no targets are given", async () => {
    const { bridge, run } = await setup();
    await run("off");
    expect(bridge.puts("1")).toHaveLength(1);
    expect(bridge.puts("2")).toHaveLength(1);
    expect(bridge.puts().every((b) => b.on === false)).toBe(true);
  });

  it("fails on an unknown target", async () => {
    const { bridge, run } = await setup();
    await expect(run("on", "-t", "Garage")).rejects.toBeInstanceOf(NotFoundError);
    expect(bridge.puts()).toEqual([]);
  });

  it("sets a colour via the color action or its shorthand", async () => {
    const { bridge, run } = await setup();
    await run("color", "orange", "-t", "Lamp1");
    await run("magenta", "-t", "Lamp1");
    expect(bridge.puts("1").map((b) => b.hue)).toEqual([4000, 48000]);
    await expect(run("color")).rejects.toBeInstanceOf(InvalidParameterError);
    await expect(run("color", "mauve")).rejects.toBeInstanceOf(InvalidParameterError);
  });

  it("blinks a counted number of times", async () => {
    const { bridge, run, slept } = await setup();
    await run("blink", "-t", "Lamp1", "-i", "2", "-I", "2");
    expect(bridge.puts("1").map((b) => b.on)).toEqual([false, true, false, true]);
    expect(slept).toEqual([1000, 1000, 1000, 1000]);
  });

  it("runs blink forever until interrupted, then shuts the scheduler down", async () => {
    const { lines, run, scheduler } = await setup();
    await run("blink", "-t", "Lamp1", "-I", "0");
    expect(lines).toEqual(["Running; press Ctrl-C to stop.", "All effects terminated."]);
    expect(scheduler.poisoned).toBe(true);
    expect(scheduler.active()).toEqual([]);
  });

  it("fades the targets until interrupted", async () => {
    const { lines, run, scheduler } = await setup();
    await run("fade", "-t", "Lamp1,Lamp2", "-b", "30");
    expect(lines.slice(0, 3)).toEqual(["fade:", " - Lamp1", " - Lamp2"]);
    expect(scheduler.poisoned).toBe(true);
  });

  it("ramps one light with increment", async () => {
    const { bridge, run } = await setup();
    await run("increment", "Lamp2", "-i", "2");
    expect(bridge.puts("2").map((b) => b.hue)).toEqual([undefined, 0, 32767, 65534, undefined]);
    await expect(run("increment")).rejects.toBeInstanceOf(InvalidParameterError);
  });

  it("treats a zero interval as unset when sizing increment strides", async () => {
    const { bridge, run } = await setup();
    await run("increment", "Lamp2", "-I", "0", "-i", "2");
    expect(bridge.puts("2").map((b) => b.hue)).toEqual([undefined, 0, 32767, 65534, undefined]);
    await run("increment", "Lamp1", "-I", "0");
    const hues = bridge.puts("1").map((b) => b.hue);
    expect(hues).toHaveLength(33);
    expect(hues.slice(1, 3)).toEqual([0, 2184]);
    expect(hues[31]).toBe(65520);
  });

  it("identifies every light by blinking it", async () => {
    const { bridge, lines, run } = await setup();
    await run("identify", "-I", "0");
    expect(lines).toEqual(["---- IDENTIFYING: Lamp1 ----", "---- IDENTIFYING: Lamp2 ----"]);
    expect(bridge.puts("1")).toHaveLength(IDENTIFY_BLINKS * 2);
    expect(bridge.puts("2")).toHaveLength(IDENTIFY_BLINKS * 2);
  });

  it("rejects unknown actions", async () => {
    const { run } = await setup();
    await expect(run("dance")).rejects.toThrow("dance is unknown to this command.");
  });
});
