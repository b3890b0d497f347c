#!/usr/bin/env node
import { once } from "node:events";
import { HueBridge } from "./adapters/bridge.js";
import { HELP, parseCliArgs } from "./cli/args.js";
import { runAction } from "./cli/commands.js";
import { DeviceRegistry } from "./core/registry.js";
import { EffectScheduler } from "./core/scheduler.js";
import { SharedConfig } from "./core/sharedConfig.js";
import { loadConfig } from "./util/config.js";
import { ConfigError, InvalidParameterError, NotFoundError, describeError } from "./util/errors.js";
import { createLogger, setVerbose } from "./util/log.js";

const log = createLogger("hue-conductor");

function interrupted(): Promise<void> {
  return Promise.race([once(process, "SIGINT"), once(process, "SIGTERM")]).then(() => undefined);
}

async function main(argv: string[]): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.help || args.action === "help") {
    console.log(HELP);
    return 0;
  }

  const config = loadConfig();
  setVerbose(args.verbose || config.verbose);

  const bridge = HueBridge.fromConfig(config);
  const registry = new DeviceRegistry(bridge, { allowlist: config.allowlist });
  const shared = new SharedConfig();
  const scheduler = new EffectScheduler(registry, shared, { errorBackoffMs: config.errorBackoffMs });

  await registry.refresh();
  await runAction(args, {
    registry,
    scheduler,
    shared,
    out: (line) => console.log(line),
    interrupted,
  });
  await scheduler.shutdown();
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (e: unknown) => {
    const usage = e instanceof ConfigError || e instanceof InvalidParameterError || e instanceof NotFoundError;
    log.error(describeError(e));
    if (e instanceof InvalidParameterError) console.error("Run with --help for usage.");
    process.exit(usage ? 2 : 1);
  },
);
