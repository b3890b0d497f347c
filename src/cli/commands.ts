import { colorNames, hueForColor } from "../core/colors.js";
import { blink, color, fade, increment } from "../core/effects.js";
import type { Light } from "../core/light.js";
import type { DeviceRegistry } from "../core/registry.js";
import type { EffectScheduler } from "../core/scheduler.js";
import type { SharedConfig } from "../core/sharedConfig.js";
import { InvalidParameterError } from "../util/errors.js";
import type { EffectParams } from "../util/types.js";
import type { CliArgs } from "./args.js";

export const IDENTIFY_BLINKS = 10;

export type CliContext = {
  registry: DeviceRegistry;
  scheduler: EffectScheduler;
  shared: SharedConfig;
  out: (line: string) => void;
  /** Resolves when the user asks a forever effect to end (Ctrl-C). */
  interrupted: () => Promise<void>;
};

function targetsOf(args: CliArgs, ctx: CliContext): Light[] {
  if (args.targets.length === 0) return ctx.registry.all();
  return args.targets.map((name) => ctx.registry.get(name));
}

async function runForever(lights: Light[], ctx: CliContext, start: (light: Light) => Promise<void>) {
  await Promise.all(lights.map(start));
  ctx.out("Running; press Ctrl-C to stop.");
  await ctx.interrupted();
  await ctx.scheduler.shutdown();
  ctx.out("All effects terminated.");
}

async function setColor(colorName: string, args: CliArgs, ctx: CliContext) {
  const params: EffectParams = { color: colorName };
  await Promise.all(
    targetsOf(args, ctx).map(async (light) => {
      ctx.out(`${light.name} -> ${colorName}`);
      await ctx.scheduler.start(light.name, color, params, false);
    }),
  );
}

/** Executes one CLI action against a refreshed registry. */
export async function runAction(args: CliArgs, ctx: CliContext): Promise<void> {
  ctx.shared.update({ brightness: args.brightness, saturation: args.saturation, hue: args.hue });
  const { brightness, saturation, hue } = ctx.shared.snapshot();
  const look = { brightness, saturation, hue };

  switch (args.action) {
    case "get-lights":
      ctx.out("lights:");
      for (const name of ctx.registry.names()) ctx.out(` - ${name}`);
      return;

    case "get-rooms":
      for (const [room, lights] of ctx.registry.byRoom()) {
        ctx.out(`${room ?? "(no room)"}:`);
        for (const light of lights) ctx.out(` - ${light.name}`);
      }
      return;

    case "get-colors":
      ctx.out("colors:");
      for (const name of colorNames()) ctx.out(` - ${name}`);
      return;

    case "get-xy":
      for (const light of ctx.registry.all()) {
        const record = await light.refresh();
        const xy = record.state.xy;
        ctx.out(`${light.name}: ${xy ? `[${xy.join(", ")}]` : "(no xy)"}`);
      }
      return;

    case "on":
    case "off":
      for (const light of targetsOf(args, ctx)) {
        ctx.out(`Turning ${args.action} ${light.name}`);
        await (args.action === "on" ? light.turnOn(look) : light.turnOff(look));
      }
      return;

    case "color":
      if (!args.subtarg) {
        throw new InvalidParameterError("You must provide a color to set the light(s) to. Use get-colors to list them.");
      }
      await setColor(args.subtarg, args, ctx);
      return;

    case "blink": {
      const params: EffectParams = { interval: args.interval ?? 1 };
      const lights = targetsOf(args, ctx);
      const iterations = args.iterations;
      if (iterations === undefined) {
        await runForever(lights, ctx, (l) => ctx.scheduler.start(l.name, blink, params, true));
        return;
      }
      await Promise.all(
        lights.map(async (light) => {
          for (let i = 0; i < iterations; i++) await ctx.scheduler.start(light.name, blink, params, false);
        }),
      );
      return;
    }

    case "fade": {
      const lights = targetsOf(args, ctx);
      ctx.out("fade:");
      for (const light of lights) ctx.out(` - ${light.name}`);
      const params: EffectParams = { interval: args.interval };
      await runForever(lights, ctx, (l) => ctx.scheduler.start(l.name, fade, params, true));
      return;
    }

    case "increment": {
      if (!args.subtarg) throw new InvalidParameterError("increment needs a light name.");
      const light = ctx.registry.get(args.subtarg);
      // An interval of 0 counts as unset.
      const strides = Math.round(args.interval ?? 0);
      const steps = strides > 0 ? strides : args.iterations;
      ctx.out(`increment: ${light.name}`);
      await ctx.scheduler.start(light.name, increment, { steps }, false);
      return;
    }

    case "id":
    case "identify":
      for (const light of ctx.registry.all()) {
        ctx.out(`---- IDENTIFYING: ${light.name} ----`);
        for (let i = 0; i < IDENTIFY_BLINKS; i++) {
          await ctx.scheduler.start(light.name, blink, { interval: args.interval ?? 1 }, false);
        }
      }
      return;

    default:
      if (hueForColor(args.action) !== undefined) {
        await setColor(args.action, args, ctx);
        return;
      }
      throw new InvalidParameterError(`${args.action} is unknown to this command.`);
  }
}
