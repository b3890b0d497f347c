import { parseArgs } from "node:util";
import { z } from "zod";
import { InvalidParameterError } from "../util/errors.js";

export const HELP = `hue-conductor <action> [ <subtarg> ] [options]

actions:
  get-lights            List the lights the bridge reports
  get-rooms             List rooms and their lights
  get-colors            List the colors lights can be set to
  get-xy                Show the XY color coordinates of each light

  on / off              Turn lights on or off
  blink                 Blink lights; forever unless --iterations is given
  fade                  Sweep lights through the hue range until interrupted
  color <name>          Set lights to a named color (also: hue-conductor <name>)
  increment <light>     Ramp one light through every hue, then turn it off
  identify              Blink every light ten times, announcing its name

options:
  -t, --targets <names>   Lights to act on, comma separated or repeated (default: all)
  -I, --interval <sec>    Blink period, pause between fade steps, or increment strides
  -i, --iterations <n>    Blink count, or increment strides when --interval is absent
  -b, --brightness <0-255>
  -s, --saturation <0-255>
  -h, --hue <0-65535>
  -v, --verbose
  -H, --help
`;

const Level = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .min(0, `${name} must be at least 0`)
    .max(255, `${name} must be at most 255`)
    .optional();

const FlagsSchema = z.object({
  interval: z.coerce.number().min(0, "interval must be at least 0").optional(),
  iterations: z.coerce.number().int("iterations must be an integer").positive("iterations must be positive").optional(),
  brightness: Level("brightness"),
  saturation: Level("saturation"),
  hue: z.coerce.number().int("hue must be an integer").min(0).max(65535, "hue must be at most 65535").optional(),
});

export type CliArgs = z.infer<typeof FlagsSchema> & {
  action: string;
  subtarg?: string;
  targets: string[];
  verbose: boolean;
  help: boolean;
};

function readArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        targets: { type: "string", short: "t", multiple: true },
        interval: { type: "string", short: "I" },
        iterations: { type: "string", short: "i" },
        brightness: { type: "string", short: "b" },
        saturation: { type: "string", short: "s" },
        hue: { type: "string", short: "h" },
        verbose: { type: "boolean", short: "v", default: false },
        help: { type: "boolean", short: "H", default: false },
      },
    });
  } catch (err) {
    throw new InvalidParameterError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = readArgv(argv);
  const flags = FlagsSchema.safeParse({
    interval: values.interval,
    iterations: values.iterations,
    brightness: values.brightness,
    saturation: values.saturation,
    hue: values.hue,
  });
  if (!flags.success) {
    throw new InvalidParameterError(flags.error.issues.map((i) => i.message).join("; "));
  }

  const help = values.help ?? false;
  const [action, subtarg, ...extra] = positionals;
  if (!action && !help) throw new InvalidParameterError("An action is required");
  if (extra.length > 0) throw new InvalidParameterError(`Unexpected arguments: ${extra.join(" ")}`);

  return {
    ...flags.data,
    action: action ?? "help",
    subtarg,
    targets: (values.targets ?? [])
      .flatMap((t) => t.split(","))
      .map((t) => t.trim())
      .filter(Boolean),
    verbose: values.verbose ?? false,
    help,
  };
}
