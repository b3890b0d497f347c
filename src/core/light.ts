import { checkStateUpdate, decodeLight, type LightRecord } from "../adapters/payloads.js";
import { InvalidParameterError } from "../util/errors.js";
import { sleep as defaultSleep, type Sleep } from "../util/time.js";
import type { Backend, LightInfo, LightLook, LightSnapshot, StateBody } from "../util/types.js";
import { colorNames, hueForColor, nearestColorName } from "./colors.js";
import { checkLookValue } from "./sharedConfig.js";

export type LightOptions = {
  sleep?: Sleep;
};

/**
 * One controllable light. Every state-changing call maps to exactly one
 * `PUT lights/<index>/state`; the cached fields mirror what was last sent
 * successfully and are never authoritative.
 */
export class Light {
  readonly name: string;
  readonly index: string;
  room: string | null = null;

  private on?: boolean;
  private brightness?: number;
  private saturation?: number;
  private hue?: number;
  private reachable?: boolean;
  private colorCapable: boolean;
  private readonly sleep: Sleep;

  constructor(
    private readonly backend: Backend,
    index: string,
    record: LightRecord,
    opts: LightOptions = {},
  ) {
    this.name = record.name;
    this.index = index;
    this.sleep = opts.sleep ?? defaultSleep;
    this.colorCapable = false;
    this.sync(record);
  }

  get snapshot(): LightSnapshot {
    return {
      name: this.name,
      index: this.index,
      room: this.room,
      on: this.on,
      brightness: this.brightness,
      saturation: this.saturation,
      hue: this.hue,
      reachable: this.reachable,
    };
  }

  get isReachable() {
    return this.reachable !== false;
  }

  async setState(on: boolean, saturation = 255, brightness = 255, hue?: number | null): Promise<void> {
    checkLookValue("saturation", saturation);
    checkLookValue("brightness", brightness);
    const h = hue ?? undefined;
    if (h !== undefined) checkLookValue("hue", h);

    const body: StateBody = { sat: saturation, bri: brightness, ...(h !== undefined ? { hue: h } : {}), on };

    const reply = await this.backend.request(["lights", this.index, "state"], "PUT", body);
    checkStateUpdate(reply, this.name);

    this.on = on;
    this.saturation = saturation;
    this.brightness = brightness;
    if (h !== undefined) this.hue = h;
  }

  turnOn(look: LightLook = {}) {
    return this.setState(true, look.saturation, look.brightness, look.hue);
  }

  turnOff(look: LightLook = {}) {
    return this.setState(false, look.saturation, look.brightness, look.hue);
  }

  /** Off for half the interval, then on for the other half. */
  async blinkOnce(intervalSeconds = 1, look: LightLook = {}): Promise<void> {
    const halfMs = (intervalSeconds * 1000) / 2;
    await this.setState(false, look.saturation, look.brightness);
    await this.sleep(halfMs);
    await this.setState(true, look.saturation, look.brightness, look.hue);
    await this.sleep(halfMs);
  }

  colorSweepStep(hue: number, brightness: number, saturation = 255) {
    return this.setState(true, saturation, brightness, hue);
  }

  async setColor(color: string, look: LightLook = {}): Promise<void> {
    const hue = hueForColor(color);
    if (hue === undefined) {
      throw new InvalidParameterError(`Unknown color "${color}". Valid colors: ${colorNames().join(", ")}`);
    }
    await this.turnOn({ ...look, hue });
  }

  /** Re-reads this light from the bridge and updates the cached fields. */
  async refresh(): Promise<LightRecord> {
    const record = decodeLight(await this.backend.request(["lights", this.index], "GET"));
    this.sync(record);
    return record;
  }

  info(): LightInfo {
    return {
      ...this.snapshot,
      colorName: this.hue === undefined ? null : nearestColorName(this.hue),
      capabilities: this.colorCapable ? "color" : "white",
    };
  }

  /** Overwrites the cached fields with a record read from the bridge. */
  sync(record: LightRecord) {
    const s = record.state;
    this.on = s.on;
    this.reachable = s.reachable;
    if (s.bri !== undefined) this.brightness = s.bri;
    if (s.sat !== undefined) this.saturation = s.sat;
    if (s.hue !== undefined) this.hue = s.hue;
    this.colorCapable = s.hue !== undefined || s.xy !== undefined || s.ct !== undefined;
  }
}
