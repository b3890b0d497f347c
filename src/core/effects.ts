import { InvalidParameterError } from "../util/errors.js";
import type { Sleep } from "../util/time.js";
import type { EffectParams, LightLook, TickSettings } from "../util/types.js";
import { colorNames, hueForColor } from "./colors.js";
import type { Light } from "./light.js";
import { checkLookValue } from "./sharedConfig.js";

export const HUE_SWEEP_RANGE = 64000;
export const DEFAULT_SWEEP_STEP = 200;
export const DEFAULT_BLINK_INTERVAL = 1;
export const DEFAULT_INCREMENT_STEPS = 30;
const INCREMENT_RANGE = 65535;

export type TickContext = {
  light: Light;
  settings: TickSettings;
  sleep: Sleep;
  /** False when the tick is a one-shot run that will not be called again. */
  repeating: boolean;
};

/** One indivisible action; the scheduler decides whether to call it again. */
export type Tick = (ctx: TickContext) => Promise<void>;

export interface Effect {
  readonly id: string;
  readonly description: string;
  /** Validates parameters and returns a tick owning any per-run state. */
  prepare(params: EffectParams): Tick;
}

export function lookOf(settings: TickSettings): LightLook {
  return {
    brightness: settings.brightness.value,
    saturation: settings.saturation.value,
    hue: settings.hue.value,
  };
}

function seconds(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidParameterError(`${name} must be a non-negative number of seconds, got ${value}`);
  }
  return value;
}

function positiveInt(name: string, value: number | undefined, fallback: number, max = Infinity): number {
  if (value === undefined) return fallback;
  if (!Number.isInteger(value) || value <= 0 || value > max) {
    throw new InvalidParameterError(`${name} must be a positive integer${max < Infinity ? ` up to ${max}` : ""}, got ${value}`);
  }
  return value;
}

/**
 * Ping-pong cursor over [0, range): 0, step, 2·step … up to the last multiple
 * below `range`, then back down by `step` to 0, then up again.
 */
export class HueSweep {
  private readonly top: number;
  private position = 0;
  private direction: 1 | -1 = 1;

  constructor(private readonly step: number, range = HUE_SWEEP_RANGE) {
    if (!Number.isInteger(step) || step <= 0) {
      throw new InvalidParameterError(`step must be a positive integer, got ${step}`);
    }
    this.top = Math.floor((range - 1) / step) * step;
  }

  next(): number {
    const hue = this.position;
    if (this.top === 0) return hue;
    if (this.direction === 1 && hue + this.step > this.top) this.direction = -1;
    else if (this.direction === -1 && hue - this.step < 0) this.direction = 1;
    this.position = hue + this.direction * this.step;
    return hue;
  }

  /** One full pass from 0 up to the top and back down to 0, independent of the cursor. */
  *cycle(): Generator<number> {
    for (let hue = 0; hue <= this.top; hue += this.step) yield hue;
    for (let hue = this.top - this.step; hue >= 0; hue -= this.step) yield hue;
  }
}

export const blink: Effect = {
  id: "blink",
  description: "Turn off for half the interval, then on for the other half.",
  prepare(params) {
    const interval = seconds("interval", params.interval, DEFAULT_BLINK_INTERVAL);
    return ({ light, settings }) => light.blinkOnce(interval, lookOf(settings));
  },
};

export const fade: Effect = {
  id: "fade",
  description: "Sweep the hue up through the colour wheel and back down; one step per tick when repeating.",
  prepare(params) {
    const step = positiveInt("step", params.step, DEFAULT_SWEEP_STEP, HUE_SWEEP_RANGE);
    const pause = seconds("interval", params.interval, 0);
    const sweep = new HueSweep(step);
    return async ({ light, settings, sleep, repeating }) => {
      const hues = repeating ? [sweep.next()] : sweep.cycle();
      for (const hue of hues) {
        await light.colorSweepStep(hue, settings.brightness.value, settings.saturation.value);
        if (pause > 0) await sleep(pause * 1000);
      }
    };
  },
};

export const color: Effect = {
  id: "color",
  description: "Turn on at a named colour, or at an explicit hue.",
  prepare(params) {
    let hue: number | undefined;
    if (params.color !== undefined) {
      hue = hueForColor(params.color);
      if (hue === undefined) {
        throw new InvalidParameterError(`Unknown color "${params.color}". Valid colors: ${colorNames().join(", ")}`);
      }
    } else if (params.hue !== undefined) {
      checkLookValue("hue", params.hue);
      hue = params.hue;
    } else {
      throw new InvalidParameterError("color effect needs a color name or a hue");
    }
    const fixedHue = hue;
    return ({ light, settings }) => light.turnOn({ ...lookOf(settings), hue: fixedHue });
  },
};

export const increment: Effect = {
  id: "increment",
  description: "Ramp the hue across the full range in equal strides, then turn off.",
  prepare(params) {
    const steps = positiveInt("steps", params.steps, DEFAULT_INCREMENT_STEPS, INCREMENT_RANGE);
    const stride = Math.floor(INCREMENT_RANGE / steps);
    const pauseMs = INCREMENT_RANGE / steps;
    return async ({ light, settings, sleep }) => {
      const look = lookOf(settings);
      await light.turnOn(look);
      for (let hue = 0; hue < INCREMENT_RANGE; hue += stride) {
        await light.setState(true, look.saturation, look.brightness, hue);
        await sleep(pauseMs);
      }
      await light.turnOff(look);
    };
  },
};

export const EFFECTS: Readonly<Record<string, Effect>> = Object.freeze({
  blink,
  fade,
  color,
  increment,
});

export const EFFECT_IDS = ["blink", "fade", "color", "increment"] as const;
export type EffectId = (typeof EFFECT_IDS)[number];

export function getEffect(id: string): Effect {
  const effect = Object.hasOwn(EFFECTS, id) ? EFFECTS[id] : undefined;
  if (!effect) {
    throw new InvalidParameterError(`Unknown effect "${id}". Known effects: ${EFFECT_IDS.join(", ")}`);
  }
  return effect;
}
