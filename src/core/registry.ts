import { decodeGroups, decodeLights, type GroupRecord } from "../adapters/payloads.js";
import { NotFoundError } from "../util/errors.js";
import { createLogger, type Logger } from "../util/log.js";
import type { Sleep } from "../util/time.js";
import type { Backend } from "../util/types.js";
import { Light } from "./light.js";

export type RegistryOptions = {
  /** Keep lights the bridge reports as unreachable. */
  permitUnreachable?: boolean;
  /** Only these light names are exposed; empty means all. */
  allowlist?: Set<string>;
  sleep?: Sleep;
  logger?: Logger;
};

/** Anything that can resolve a light by name. */
export interface LightLookup {
  get(name: string): Light;
}

const byNumericId = (a: string, b: string) => Number(a) - Number(b) || a.localeCompare(b);

function roomGroups(groups: Record<string, GroupRecord>): [string, GroupRecord][] {
  const entries = Object.entries(groups).sort(([a], [b]) => byNumericId(a, b));
  const rooms = entries.filter(([, g]) => g.type === "Room");
  return rooms.length > 0 ? rooms : entries.filter(([, g]) => g.type === undefined || g.type === "Room");
}

export class DeviceRegistry implements LightLookup {
  private lights = new Map<string, Light>();
  private readonly log: Logger;

  constructor(
    private readonly backend: Backend,
    private readonly opts: RegistryOptions = {},
  ) {
    this.log = opts.logger ?? createLogger("registry");
  }

  /**
   * Fetches lights and groups and rebuilds the name and room maps. A light
   * whose name and index are unchanged keeps its handle, so running effects
   * and listings share one cache.
   */
  async refresh(): Promise<Light[]> {
    const lights = decodeLights(await this.backend.request(["lights"], "GET"));
    const groups = decodeGroups(await this.backend.request(["groups"], "GET"));
    const allow = this.opts.allowlist ?? new Set<string>();

    const byIndex = new Map<string, Light>();
    const next = new Map<string, Light>();
    for (const [index, record] of Object.entries(lights).sort(([a], [b]) => byNumericId(a, b))) {
      if (allow.size > 0 && !allow.has(record.name)) continue;
      if (!record.state.reachable && !this.opts.permitUnreachable) {
        this.log.debug(`Skipping unreachable light ${record.name}`);
        continue;
      }
      if (next.has(record.name)) {
        this.log.warn(`Duplicate light name "${record.name}" (index ${index}); keeping the first`);
        continue;
      }
      const known = this.lights.get(record.name);
      const light = known && known.index === index ? known : new Light(this.backend, index, record, { sleep: this.opts.sleep });
      if (light === known) {
        light.sync(record);
        light.room = null;
      }
      byIndex.set(index, light);
      next.set(record.name, light);
    }

    for (const [, group] of roomGroups(groups)) {
      for (const index of group.lights) {
        const light = byIndex.get(index);
        if (!light) continue;
        if (light.room !== null) {
          this.log.debug(`${light.name} already in ${light.room}; ignoring ${group.name}`);
          continue;
        }
        light.room = group.name;
      }
    }

    this.lights = next;
    this.log.debug(`Discovered ${next.size} light(s)`);
    return this.all();
  }

  get(name: string): Light {
    const light = this.lights.get(name);
    if (!light) throw new NotFoundError(`No light named "${name}"`);
    return light;
  }

  has(name: string) {
    return this.lights.has(name);
  }

  all(): Light[] {
    return [...this.lights.values()];
  }

  names(): string[] {
    return [...this.lights.keys()];
  }

  /** Lights grouped by room name; lights without a room sit under `null`. */
  byRoom(): Map<string | null, Light[]> {
    const rooms = new Map<string | null, Light[]>();
    for (const light of this.lights.values()) {
      const list = rooms.get(light.room) ?? [];
      list.push(light);
      rooms.set(light.room, list);
    }
    return rooms;
  }

  room(name: string): Light[] {
    const lights = this.all().filter((l) => l.room === name);
    if (lights.length === 0) throw new NotFoundError(`No room named "${name}"`);
    return lights;
  }
}
