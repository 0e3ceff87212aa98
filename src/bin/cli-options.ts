import { CueBridgeError } from "../errors.js";
import { DEFAULT_CONFIG } from "../types/config.js";

export interface CliOptions {
  host: string;
  port: number;
  /** Unset means TCP port + 1. */
  udpPort?: number;
  requestTimeoutMs: number;
  verbose: boolean;
  help: boolean;
}

export class CliUsageError extends CueBridgeError {
  override name: "CliUsageError" = "CliUsageError";

  constructor(message: string) {
    super(message, "USAGE");
  }
}

export const HELP_TEXT = `
  cuebridge: command dispatch for a single-threaded host API

  Usage: cuebridge [options]

  Options:
    --host <addr>          Bind address for both listeners (default: 127.0.0.1)
    --port <n>             TCP request/response port (default: 9877)
    --udp-port <n>         UDP fire-and-forget port (default: TCP port + 1)
    --timeout-ms <n>       Per-request timeout on TCP (default: 10000)
    --verbose, -v          Verbose logging
    --help, -h             Show this help

  Environment:
    CUEBRIDGE_HOST, CUEBRIDGE_PORT, CUEBRIDGE_UDP_PORT
`;

function parsePort(value: string | undefined, flag: string): number {
  const port = parseInteger(value, flag);
  if (port > 65535) throw new CliUsageError(`${flag} must be between 0 and 65535`);
  return port;
}

function parseInteger(value: string | undefined, flag: string): number {
  if (value === undefined || !/^\d+$/.test(value.trim())) {
    throw new CliUsageError(`${flag} requires a number`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Flags win over environment variables, which win over defaults.
 * `argv` is process.argv (the first two entries are skipped).
 */
export function parseCliOptions(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = {},
): CliOptions {
  const options: CliOptions = {
    host: env.CUEBRIDGE_HOST || DEFAULT_CONFIG.host,
    port: env.CUEBRIDGE_PORT ? parsePort(env.CUEBRIDGE_PORT, "CUEBRIDGE_PORT") : DEFAULT_CONFIG.port,
    udpPort: env.CUEBRIDGE_UDP_PORT
      ? parsePort(env.CUEBRIDGE_UDP_PORT, "CUEBRIDGE_UDP_PORT")
      : undefined,
    requestTimeoutMs: DEFAULT_CONFIG.requestTimeoutMs,
    verbose: false,
    help: false,
  };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--host": {
        const host = argv[++i];
        if (!host) throw new CliUsageError("--host requires an address");
        options.host = host;
        break;
      }
      case "--port":
        options.port = parsePort(argv[++i], "--port");
        break;
      case "--udp-port":
        options.udpPort = parsePort(argv[++i], "--udp-port");
        break;
      case "--timeout-ms":
        options.requestTimeoutMs = parseInteger(argv[++i], "--timeout-ms");
        if (options.requestTimeoutMs === 0) {
          throw new CliUsageError("--timeout-ms must be positive");
        }
        break;
      case "--verbose":
      case "-v":
        options.verbose = true;
        break;
      case "--help":
      case "-h":
        options.help = true;
        break;
      default:
        throw new CliUsageError(`Unknown option: ${arg}`);
    }
  }

  return options;
}
