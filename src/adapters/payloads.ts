import { z } from "zod";
import { BackendError, ProtocolError } from "../util/errors.js";

const BridgeErrorItem = z.object({
  error: z.object({
    type: z.number().optional(),
    address: z.string().optional(),
    description: z.string(),
  }),
});

const SuccessItem = z.object({ success: z.record(z.string(), z.unknown()) });

export const StateUpdateReply = z.array(z.union([BridgeErrorItem, SuccessItem]));

export const LightStateSchema = z
  .object({
    on: z.boolean(),
    bri: z.number().optional(),
    sat: z.number().optional(),
    hue: z.number().optional(),
    xy: z.tuple([z.number(), z.number()]).optional(),
    ct: z.number().optional(),
    reachable: z.boolean().default(true),
  })
  .passthrough();

export const LightRecordSchema = z
  .object({
    name: z.string(),
    type: z.string().optional(),
    state: LightStateSchema,
  })
  .passthrough();

export const LightsSchema = z.record(z.string(), LightRecordSchema);

export const GroupRecordSchema = z
  .object({
    name: z.string(),
    type: z.string().optional(),
    lights: z.array(z.string()),
  })
  .passthrough();

export const GroupsSchema = z.record(z.string(), GroupRecordSchema);

export type LightRecord = z.infer<typeof LightRecordSchema>;
export type GroupRecord = z.infer<typeof GroupRecordSchema>;

// The bridge answers a failed GET with a list of error items instead of the object asked for.
function rejectErrorList(json: unknown, what: string) {
  const errors = z.array(BridgeErrorItem).min(1).safeParse(json);
  if (errors.success) {
    const detail = errors.data.map((e) => e.error.description).join("; ");
    throw new BackendError(`Bridge refused ${what}: ${detail}`);
  }
}

function decode<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, json: unknown, what: string): T {
  rejectErrorList(json, what);
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const at = issue && issue.path.length ? ` at ${issue.path.join(".")}` : "";
    throw new ProtocolError(`Unexpected ${what} payload${at}: ${issue?.message ?? "invalid"}`);
  }
  return parsed.data;
}

export const decodeLights = (json: unknown) => decode(LightsSchema, json, "light list");
export const decodeLight = (json: unknown) => decode(LightRecordSchema, json, "light");
export const decodeGroups = (json: unknown) => decode(GroupsSchema, json, "group list");

/** Validates a state-update reply; any error item fails the whole update. */
export function checkStateUpdate(json: unknown, lightName: string) {
  const parsed = StateUpdateReply.safeParse(json);
  if (!parsed.success) {
    throw new ProtocolError(`Unexpected state-update reply for ${lightName}`);
  }
  const failures: string[] = [];
  for (const item of parsed.data) {
    if ("error" in item) failures.push(item.error.description);
  }
  if (failures.length > 0) {
    throw new BackendError(`Bridge rejected update for ${lightName}: ${failures.join("; ")}`);
  }
}
