#!/usr/bin/env node
import { isLoopbackHost, loadConfigFromEnv } from "./config";
import { formatError, log, setLogLevel } from "./logger";
import { startTunnelClient } from "./tunnelClient";

export { startTunnelClient } from "./tunnelClient";
export type { RunningTunnelClient, TunnelClientHooks, TunnelClientOptions, TunnelClientState } from "./tunnelClient";
export { loadConfigFromEnv } from "./config";
export type { TunnelConfig } from "./config";

async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  setLogLevel(config.logLevel);

  if (!isLoopbackHost(config.localHost)) {
    log("warn", "config_warning", {
      why: "local_host_not_loopback",
      localHost: config.localHost
    });
  }

  const client = startTunnelClient(config);

  const shutdown = () => {
    client.stop().catch((err: unknown) => {
      log("error", "tunnel_error", { why: "stop_failed", err: formatError(err) });
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await client.done;
}

if (require.main === module) {
  void main().catch((err) => {
    // eslint-disable-next-line no-console
    console.error(err);
    process.exitCode = 1;
  });
}
