import { describeError, isTransient } from "../util/errors.js";
import { createLogger, type Logger } from "../util/log.js";
import { KeyedMutex } from "../util/mutex.js";
import { abortableSleep, sleep as defaultSleep, yieldToLoop, type Sleep } from "../util/time.js";
import type { EffectParams, EffectSummary, SharedSettings, SlotState, TickSettings } from "../util/types.js";
import type { Effect, Tick, TickContext } from "./effects.js";
import type { Light } from "./light.js";
import type { LightLookup } from "./registry.js";
import { checkLook, type SharedConfig } from "./sharedConfig.js";

export const DEFAULT_BRIGHTNESS = 255;
export const DEFAULT_SATURATION = 255;

export type SchedulerOptions = {
  /** Pause after a tick fails with a transient error before trying again. */
  errorBackoffMs?: number;
  sleep?: Sleep;
  logger?: Logger;
};

interface Slot {
  readonly name: string;
  readonly effect: Effect;
  readonly params: EffectParams;
  readonly controller: AbortController;
  state: Exclude<SlotState, "idle">;
  ticks: number;
  unit: Promise<void>;
}

/** Resolves look values for one tick: start parameter, else shared setting, else default. */
export function resolveSettings(params: EffectParams, shared: Readonly<SharedSettings>): TickSettings {
  const pick = (given: number | undefined, live: number | undefined) =>
    given !== undefined ? given : live;
  const brightness = pick(params.brightness, shared.brightness);
  const saturation = pick(params.saturation, shared.saturation);
  const hue = pick(params.hue, shared.hue);
  return {
    brightness: { value: brightness ?? DEFAULT_BRIGHTNESS, provided: brightness !== undefined },
    saturation: { value: saturation ?? DEFAULT_SATURATION, provided: saturation !== undefined },
    hue: { value: hue, provided: hue !== undefined },
  };
}

/**
 * Runs at most one effect per light name. A forever-mode effect is an async
 * loop that checks its cancellation token before every tick; `stop` aborts the
 * token and awaits the loop. All transitions of one light's slot happen under
 * that light's mutex, so replacing an effect always finishes stopping the old
 * loop before the new one starts.
 */
export class EffectScheduler {
  private readonly slots = new Map<string, Slot>();
  private readonly locks = new KeyedMutex();
  private readonly lifetime = new AbortController();
  private readonly errorBackoffMs: number;
  private readonly sleep: Sleep;
  private readonly log: Logger;

  constructor(
    private readonly lights: LightLookup,
    private readonly shared: SharedConfig,
    opts: SchedulerOptions = {},
  ) {
    this.errorBackoffMs = opts.errorBackoffMs ?? 1000;
    this.sleep = opts.sleep ?? defaultSleep;
    this.log = opts.logger ?? createLogger("scheduler");
  }

  get poisoned() {
    return this.lifetime.signal.aborted;
  }

  /**
   * Starts `effect` on the named light, replacing whatever runs there.
   * One-shot mode runs a single tick and settles with its outcome; forever
   * mode resolves once the new loop is running.
   */
  async start(
    name: string,
    effect: Effect,
    params: EffectParams = {},
    repeatForever: boolean = this.shared.snapshot().forever,
  ): Promise<void> {
    const light = this.lights.get(name);
    checkLook(params);
    const tick = effect.prepare(params);

    if (this.poisoned) {
      this.log.warn(`Scheduler is shut down; not starting ${effect.id} on ${name}`);
      return;
    }

    await this.locks.run(name, async () => {
      await this.halt(name);
      if (this.poisoned) return;

      if (!repeatForever) {
        this.log.debug(`One-shot ${effect.id} on ${name}`);
        await tick(this.context(light, params, false));
        return;
      }

      const slot: Slot = {
        name,
        effect,
        params,
        controller: new AbortController(),
        state: "running",
        ticks: 0,
        unit: Promise.resolve(),
      };
      this.slots.set(name, slot);
      slot.unit = this.loop(slot, light, tick);
      this.log.debug(`Started ${effect.id} on ${name}`, params);
    });
  }

  /** Cancels the named light's effect and waits for its loop to exit. */
  stop(name: string): Promise<boolean> {
    return this.locks.run(name, () => this.halt(name));
  }

  status(name: string): SlotState {
    return this.slots.get(name)?.state ?? "idle";
  }

  active(): EffectSummary[] {
    return [...this.slots.values()].map((s) => ({
      name: s.name,
      effect: s.effect.id,
      state: s.state,
      ticks: s.ticks,
      params: s.params,
    }));
  }

  /** Poisons every loop and waits until all of them have exited. */
  async shutdown(): Promise<void> {
    if (!this.poisoned) this.lifetime.abort();
    const pending = [...this.slots.values()];
    if (pending.length > 0) this.log.info(`Waiting for ${pending.length} effect(s) to finish...`);
    for (const slot of pending) {
      slot.state = "stopping";
      slot.controller.abort();
    }
    await Promise.all(pending.map((s) => s.unit));
    for (const slot of pending) {
      if (this.slots.get(slot.name) === slot) this.slots.delete(slot.name);
    }
    this.log.debug("All effects terminated.");
  }

  // Caller holds the light's lock.
  private async halt(name: string): Promise<boolean> {
    const slot = this.slots.get(name);
    if (!slot) return false;
    slot.state = "stopping";
    slot.controller.abort();
    this.log.debug(`Stopping ${slot.effect.id} on ${name}`);
    await slot.unit;
    if (this.slots.get(name) === slot) this.slots.delete(name);
    return true;
  }

  private cancelled(slot: Slot) {
    return slot.controller.signal.aborted || this.poisoned;
  }

  private context(light: Light, params: EffectParams, repeating: boolean): TickContext {
    return {
      light,
      settings: resolveSettings(params, this.shared.snapshot()),
      sleep: this.sleep,
      repeating,
    };
  }

  private async loop(slot: Slot, light: Light, tick: Tick): Promise<void> {
    // `start` returns before the first tick goes out.
    await yieldToLoop();
    try {
      while (!this.cancelled(slot)) {
        try {
          await tick(this.context(light, slot.params, true));
          slot.ticks++;
        } catch (err) {
          if (!isTransient(err)) {
            this.log.error(`${slot.effect.id} on ${slot.name} failed; stopping it: ${describeError(err)}`);
            break;
          }
          this.log.warn(`${slot.effect.id} on ${slot.name}: ${describeError(err)}`);
          await abortableSleep(this.errorBackoffMs, slot.controller.signal);
        }
        await yieldToLoop();
      }
    } finally {
      // A loop that ends on its own (fatal tick error) vacates its slot;
      // cancelled loops are removed by whoever cancelled them.
      if (slot.state === "running" && this.slots.get(slot.name) === slot) {
        this.slots.delete(slot.name);
      }
    }
  }
}
