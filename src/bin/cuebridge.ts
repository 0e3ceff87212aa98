#!/usr/bin/env node
import { ConsoleMetricsCollector } from "../adapters/console-metrics-collector.js";
import { InMemoryHost } from "../adapters/in-memory-host.js";
import { LogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { ControlDaemon, type DaemonAddresses } from "../daemon/control-daemon.js";
import { registerSignalHandlers } from "../daemon/signal-handler.js";
import { type CliOptions, CliUsageError, HELP_TEXT, parseCliOptions } from "./cli-options.js";

function isAddressInUse(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EADDRINUSE";
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliOptions(process.argv, process.env);
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}\nRun with --help for usage.`);
      process.exit(1);
    }
    throw err;
  }
  if (options.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  const logger = new StructuredLogger({
    component: "cuebridge",
    level: options.verbose ? LogLevel.DEBUG : LogLevel.INFO,
  });
  const daemon = new ControlDaemon({
    host: new InMemoryHost(),
    config: {
      host: options.host,
      port: options.port,
      udpPort: options.udpPort,
      requestTimeoutMs: options.requestTimeoutMs,
    },
    logger,
    metrics: new ConsoleMetricsCollector(logger),
  });

  let bound: DaemonAddresses;
  try {
    bound = await daemon.start();
  } catch (err) {
    if (isAddressInUse(err)) {
      const { port, udpPort } = daemon.config;
      console.error(`Error: Port ${port} (TCP) or ${udpPort} (UDP) is already in use.`);
      console.error(`Try a different port: cuebridge --port ${port + 2}`);
      process.exit(1);
    }
    throw err;
  }

  console.log(`
  cuebridge v0.1.0

  TCP:  ${bound.tcp.address}:${bound.tcp.port}  (request/response, NDJSON)
  UDP:  ${bound.udp.address}:${bound.udp.port}  (fire-and-forget)

  Press Ctrl+C to stop
`);

  registerSignalHandlers(() => daemon.stop(), { logger });
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
