export type HttpMethod = "GET" | "POST" | "PUT";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonBody = { [key: string]: JsonValue | undefined };

/** The single capability the core needs from the bridge. */
export interface Backend {
  request(pathSegments: string[], method: HttpMethod, body?: JsonBody): Promise<unknown>;
}

/** Optional visual parameters of an "on" state. */
export type LightLook = {
  brightness?: number; // 0–255
  saturation?: number; // 0–255
  hue?: number; // 0–65535
};

export type StateBody = {
  sat: number;
  bri: number;
  hue?: number;
  on: boolean;
};

export type LightSnapshot = {
  name: string;
  index: string;
  room: string | null;
  on?: boolean;
  brightness?: number;
  saturation?: number;
  hue?: number;
  reachable?: boolean;
};

export type LightInfo = LightSnapshot & {
  colorName: string | null;
  capabilities: "color" | "white";
};

export type SharedSettings = {
  brightness?: number;
  saturation?: number;
  hue?: number;
  forever: boolean;
};

/** Parameters an effect may be started with. Unset look values fall back to the shared settings. */
export type EffectParams = LightLook & {
  interval?: number; // seconds
  step?: number;
  steps?: number;
  color?: string;
};

export type Setting = { value: number; provided: boolean };

/** Look values resolved for one tick, with whether each was given or defaulted. */
export type TickSettings = {
  brightness: Setting;
  saturation: Setting;
  hue: { value: number | undefined; provided: boolean };
};

export type SlotState = "idle" | "running" | "stopping";

export type EffectSummary = {
  name: string;
  effect: string;
  state: Exclude<SlotState, "idle">;
  ticks: number;
  params: EffectParams;
};
