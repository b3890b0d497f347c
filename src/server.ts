import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { colorNames } from "./core/colors.js";
import { EFFECT_IDS, getEffect } from "./core/effects.js";
import type { Light } from "./core/light.js";
import type { DeviceRegistry } from "./core/registry.js";
import type { EffectScheduler } from "./core/scheduler.js";
import type { SharedConfig } from "./core/sharedConfig.js";
import type { EffectParams, LightLook } from "./util/types.js";

export type ServerContext = {
  registry: DeviceRegistry;
  scheduler: EffectScheduler;
  shared: SharedConfig;
};

const Level = z.number().int().min(0).max(255);
const Hue = z.number().int().min(0).max(65535);

const LookShape = {
  brightness: Level.optional().describe("Brightness 0-255"),
  saturation: Level.optional().describe("Saturation 0-255"),
  hue: Hue.optional().describe("Hue 0-65535"),
};

const EffectParamsSchema = z.object({
  ...LookShape,
  interval: z.number().min(0).optional().describe("Seconds: blink period, or pause between fade steps"),
  step: z.number().int().positive().optional().describe("Fade hue step (default 200)"),
  steps: z.number().int().positive().optional().describe("Increment stride count (default 30)"),
  color: z.string().optional().describe("Color name for the color effect"),
});

function text(value: unknown) {
  const body = typeof value === "string" ? value : JSON.stringify(value, null, 2);
  return { content: [{ type: "text" as const, text: body }] };
}

function sharedLook(shared: SharedConfig): LightLook {
  const { brightness, saturation, hue } = shared.snapshot();
  return { brightness, saturation, hue };
}

function targets(ctx: ServerContext, names: string[] | undefined, room: string | undefined): Light[] {
  if (room !== undefined) return ctx.registry.room(room);
  if (!names || names.length === 0) return ctx.registry.all();
  return names.map((n) => ctx.registry.get(n));
}

export function createServer(ctx: ServerContext, version = "0.1.0"): McpServer {
  const server = new McpServer({ name: "hue-conductor", version });

  // ---- DISCOVERY ----
  server.registerTool("hue_list_lights", {
    description: "List lights known from the last bridge snapshot, with room and cached state.",
    inputSchema: {}
  }, async () => {
    return text(ctx.registry.all().map((l) => l.snapshot));
  });

  server.registerTool("hue_list_rooms", {
    description: "List rooms and the lights in each. Lights without a room are listed under \"(none)\".",
    inputSchema: {}
  }, async () => {
    const rooms: Record<string, string[]> = {};
    for (const [room, lights] of ctx.registry.byRoom()) rooms[room ?? "(none)"] = lights.map((l) => l.name);
    return text(rooms);
  });

  server.registerTool("hue_list_colors", {
    description: "List the named colors accepted by hue_set_color and the color effect.",
    inputSchema: {}
  }, async () => text(colorNames()));

  server.registerTool("hue_refresh", {
    description: "Re-read lights and rooms from the bridge.",
    inputSchema: {}
  }, async () => {
    const lights = await ctx.registry.refresh();
    return text(`Discovered ${lights.length} light(s).`);
  });

  server.registerTool("hue_light_info", {
    description: "Fetch one light's current state from the bridge.",
    inputSchema: { name: z.string() }
  }, async ({ name }) => {
    const light = ctx.registry.get(name);
    await light.refresh();
    return text(light.info());
  });

  // ---- STATE ----
  server.registerTool("hue_set_power", {
    description: "Turn lights on or off, using the shared brightness/saturation/hue settings.",
    inputSchema: { names: z.array(z.string()).optional().describe("Light names; all lights when omitted"), on: z.boolean() }
  }, async ({ names, on }) => {
    const lights = targets(ctx, names, undefined);
    const look = sharedLook(ctx.shared);
    await Promise.all(lights.map((l) => (on ? l.turnOn(look) : l.turnOff(look))));
    return text(`Power ${on ? "on" : "off"} sent to ${lights.length} light(s).`);
  });

  server.registerTool("hue_set_room_power", {
    description: "Turn every light in a room on or off.",
    inputSchema: { room: z.string(), on: z.boolean() }
  }, async ({ room, on }) => {
    const lights = targets(ctx, undefined, room);
    const look = sharedLook(ctx.shared);
    await Promise.all(lights.map((l) => (on ? l.turnOn(look) : l.turnOff(look))));
    return text(`${room}: power ${on ? "on" : "off"} sent to ${lights.length} light(s).`);
  });

  server.registerTool("hue_set_state", {
    description: "Send one state change to a light.",
    inputSchema: { name: z.string(), on: z.boolean(), ...LookShape }
  }, async ({ name, on, brightness, saturation, hue }) => {
    const light = ctx.registry.get(name);
    await light.setState(on, saturation, brightness, hue);
    return text(light.snapshot);
  });

  server.registerTool("hue_set_color", {
    description: "Turn a light on at a named color.",
    inputSchema: { name: z.string(), color: z.string(), brightness: LookShape.brightness, saturation: LookShape.saturation }
  }, async ({ name, color, brightness, saturation }) => {
    const light = ctx.registry.get(name);
    await light.setColor(color, { brightness, saturation });
    return text(`${name} set to ${color}.`);
  });

  // --- Batch with coalescing ---
  server.registerTool("hue_batch", {
    description: "Apply several state changes; the last change per light wins.",
    inputSchema: {
      items: z.array(z.object({ name: z.string(), on: z.boolean(), ...LookShape })).min(1)
    }
  }, async ({ items }) => {
    const latest = new Map<string, (typeof items)[number]>();
    for (const it of items) latest.set(it.name, it);
    const resolved = [...latest.values()].map((it) => ({ it, light: ctx.registry.get(it.name) }));

    await Promise.all(
      resolved.map(({ it, light }) => light.setState(it.on, it.saturation, it.brightness, it.hue)),
    );
    return text(`Applied ${resolved.length} change(s) from ${items.length} item(s).`);
  });

  // ---- SHARED SETTINGS ----
  server.registerTool("hue_get_settings", {
    description: "Show the shared brightness/saturation/hue/forever settings running effects read.",
    inputSchema: {}
  }, async () => text(ctx.shared.snapshot()));

  server.registerTool("hue_update_settings", {
    description: "Change the shared settings. Running effects pick them up on their next tick; null clears a value.",
    inputSchema: {
      brightness: Level.nullable().optional(),
      saturation: Level.nullable().optional(),
      hue: Hue.nullable().optional(),
      forever: z.boolean().optional().describe("Default for hue_start_effect's forever flag"),
    }
  }, async (patch) => text(ctx.shared.update(patch)));

  // ---- EFFECTS ----
  server.registerTool("hue_start_effect", {
    description: "Start an effect on lights, replacing any effect already running on them.",
    inputSchema: {
      effect: z.enum(EFFECT_IDS),
      names: z.array(z.string()).optional().describe("Light names; all lights when omitted"),
      room: z.string().optional().describe("Target every light in this room instead"),
      params: EffectParamsSchema.optional(),
      forever: z.boolean().optional().describe("Repeat until stopped; defaults to the shared setting"),
    }
  }, async ({ effect, names, room, params, forever }) => {
    const fx = getEffect(effect);
    const lights = targets(ctx, names, room);
    const p: EffectParams = params ?? {};
    const repeat = forever ?? ctx.shared.snapshot().forever;
    await Promise.all(lights.map((l) => ctx.scheduler.start(l.name, fx, p, repeat)));
    return text(`${effect} ${repeat ? "running" : "done"} on ${lights.map((l) => l.name).join(", ")}.`);
  });

  server.registerTool("hue_stop_effect", {
    description: "Stop effects on lights and wait for them to finish their current tick.",
    inputSchema: { names: z.array(z.string()).optional().describe("Light names; every running effect when omitted") }
  }, async ({ names }) => {
    const which = names && names.length > 0 ? names : ctx.scheduler.active().map((e) => e.name);
    const stopped = await Promise.all(which.map((n) => ctx.scheduler.stop(n)));
    return text(`Stopped ${stopped.filter(Boolean).length} effect(s).`);
  });

  server.registerTool("hue_effects", {
    description: "List available effects and the ones currently running.",
    inputSchema: {}
  }, async () => text({
    available: EFFECT_IDS.map((id) => ({ id, description: getEffect(id).description })),
    running: ctx.scheduler.active(),
  }));

  return server;
}
