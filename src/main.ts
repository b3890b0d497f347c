#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { HueBridge } from "./adapters/bridge.js";
import { DeviceRegistry } from "./core/registry.js";
import { EffectScheduler } from "./core/scheduler.js";
import { SharedConfig } from "./core/sharedConfig.js";
import { createServer } from "./server.js";
import { loadConfig } from "./util/config.js";
import { ConfigError, describeError } from "./util/errors.js";
import { createLogger, setVerbose } from "./util/log.js";

const log = createLogger("hue-conductor");

async function main() {
  const config = loadConfig();
  setVerbose(config.verbose);

  const bridge = HueBridge.fromConfig(config);
  const registry = new DeviceRegistry(bridge, { allowlist: config.allowlist });
  const shared = new SharedConfig();
  const scheduler = new EffectScheduler(registry, shared, { errorBackoffMs: config.errorBackoffMs });

  const lights = await registry.refresh();
  log.info(`Discovered ${lights.length} light(s)`);

  const server = createServer({ registry, scheduler, shared });
  const transport = new StdioServerTransport();

  let closing = false;
  const close = async () => {
    if (closing) return;
    closing = true;
    await scheduler.shutdown();
    await server.close();
    process.exit(0);
  };
  const onSignal = () => {
    close().catch((e: unknown) => {
      log.error(`Shutdown failed: ${describeError(e)}`);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  transport.onclose = onSignal;

  await server.connect(transport);
  log.info("MCP server running (stdio)");
}

main().catch((e: unknown) => {
  log.error(describeError(e));
  process.exit(e instanceof ConfigError ? 2 : 1);
});
