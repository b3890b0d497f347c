import { InvalidParameterError } from "../util/errors.js";
import type { LightLook, SharedSettings } from "../util/types.js";

export type SettingsPatch = {
  brightness?: number | null;
  saturation?: number | null;
  hue?: number | null;
  forever?: boolean;
};

export const LOOK_RANGES = {
  brightness: { min: 0, max: 255 },
  saturation: { min: 0, max: 255 },
  hue: { min: 0, max: 65535 },
} as const;

export function checkLookValue(field: keyof typeof LOOK_RANGES, value: number) {
  const { min, max } = LOOK_RANGES[field];
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidParameterError(`${field} must be an integer in [${min}, ${max}], got ${value}`);
  }
}

/** Checks every look value that is present. */
export function checkLook(look: LightLook) {
  for (const field of ["brightness", "saturation", "hue"] as const) {
    const value = look[field];
    if (value !== undefined) checkLookValue(field, value);
  }
}

/**
 * Process-wide look settings the command surface writes and running effects
 * read once per tick. Updates are validated whole before any field changes,
 * and readers only ever see frozen snapshots, so a tick never observes half of
 * an update.
 */
export class SharedConfig {
  private current: Readonly<SharedSettings>;

  constructor(initial: Partial<SharedSettings> = {}) {
    this.current = SharedConfig.merge({ forever: false }, initial);
  }

  snapshot(): Readonly<SharedSettings> {
    return this.current;
  }

  update(patch: SettingsPatch): Readonly<SharedSettings> {
    this.current = SharedConfig.merge(this.current, patch);
    return this.current;
  }

  private static merge(base: SharedSettings, patch: SettingsPatch): Readonly<SharedSettings> {
    const next: SharedSettings = { ...base };
    for (const field of ["brightness", "saturation", "hue"] as const) {
      const value = patch[field];
      if (value === null) {
        delete next[field];
      } else if (value !== undefined) {
        checkLookValue(field, value);
        next[field] = value;
      }
    }
    if (patch.forever !== undefined) next.forever = patch.forever;
    return Object.freeze(next);
  }
}
