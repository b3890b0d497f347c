import { z } from "zod";
import { ConfigError } from "./errors.js";

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? fallback : /^(true|1|yes)$/i.test(v.trim())));

const EnvSchema = z.object({
  HUE_BRIDGE_URL: z
    .string({ required_error: "HUE_BRIDGE_URL is required" })
    .trim()
    .min(1, "HUE_BRIDGE_URL is required")
    .transform((v) => (/^https?:\/\//i.test(v) ? v : `https://${v}`))
    .pipe(z.string().url("HUE_BRIDGE_URL must be a URL or host name")),
  HUE_USERNAME: z
    .string({ required_error: "HUE_USERNAME is required" })
    .trim()
    .min(1, "HUE_USERNAME is required"),
  HUE_DRY_RUN: flag(false),
  HUE_INSECURE_TLS: flag(true),
  HUE_VERBOSE: flag(false),
  HUE_RATE_RPS: z.coerce.number().min(0).default(10),
  HUE_ERROR_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
  HUE_ALLOWLIST: z.string().default(""),
});

export type Config = {
  bridgeUrl: string;
  username: string;
  dryRun: boolean;
  insecureTls: boolean;
  verbose: boolean;
  rateRps: number;
  errorBackoffMs: number;
  allowlist: Set<string>;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => i.message).join("; ");
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;
  return {
    bridgeUrl: e.HUE_BRIDGE_URL.replace(/\/+$/, ""),
    username: e.HUE_USERNAME,
    dryRun: e.HUE_DRY_RUN,
    insecureTls: e.HUE_INSECURE_TLS,
    verbose: e.HUE_VERBOSE,
    rateRps: e.HUE_RATE_RPS,
    errorBackoffMs: e.HUE_ERROR_BACKOFF_MS,
    allowlist: new Set(
      e.HUE_ALLOWLIST.split(/[,\n]+/)
        .map((s) => s.trim())
        .filter(Boolean),
    ),
  };
}
