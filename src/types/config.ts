import { serverConfigSchema } from "../config/config-schema.js";

/** Where a listener actually bound (resolves port 0). */
export interface BoundAddress {
  address: string;
  port: number;
}

export interface UdpRateLimit {
  datagramsPerSecond: number;
  burstSize: number;
}

/** Server configuration; everything but the TCP port has a default. */
export interface ServerConfig {
  /** Bind address for both listeners */
  host?: string; // default: "127.0.0.1"
  /** TCP control port (0 = ephemeral) */
  port: number;
  /** UDP control port */
  udpPort?: number; // default: port + 1 (0 when port is 0)

  // Timeouts
  requestTimeoutMs?: number; // default: 10000
  shutdownGraceMs?: number; // default: 2000

  // Size limits
  maxMessageBytes?: number; // default: 1 MiB per TCP line
  maxDatagramBytes?: number; // default: 2048

  /** Per-sender UDP budget; null disables rate limiting */
  udpRateLimit?: Partial<UdpRateLimit> | null; // default: 200/s, burst 50
}

export type ResolvedConfig = Required<Omit<ServerConfig, "udpRateLimit">> & {
  udpRateLimit: UdpRateLimit | null;
};

export const DEFAULT_UDP_RATE_LIMIT: UdpRateLimit = {
  datagramsPerSecond: 200,
  burstSize: 50,
};

export const DEFAULT_CONFIG: ResolvedConfig = {
  host: "127.0.0.1",
  port: 9877,
  udpPort: 9878,
  requestTimeoutMs: 10_000,
  shutdownGraceMs: 2_000,
  maxMessageBytes: 1_048_576,
  maxDatagramBytes: 2048,
  udpRateLimit: DEFAULT_UDP_RATE_LIMIT,
};

export function resolveConfig(config: ServerConfig): ResolvedConfig {
  // Validate user-provided config before merging
  const validation = serverConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new Error(`Invalid configuration: ${validation.error.message}`);
  }

  const udpPort = config.udpPort ?? (config.port === 0 ? 0 : config.port + 1);
  if (udpPort > 65535) {
    throw new Error(`Invalid configuration: udpPort ${udpPort} is out of range`);
  }

  return {
    host: config.host ?? DEFAULT_CONFIG.host,
    port: config.port,
    udpPort,
    requestTimeoutMs: config.requestTimeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs,
    shutdownGraceMs: config.shutdownGraceMs ?? DEFAULT_CONFIG.shutdownGraceMs,
    maxMessageBytes: config.maxMessageBytes ?? DEFAULT_CONFIG.maxMessageBytes,
    maxDatagramBytes: config.maxDatagramBytes ?? DEFAULT_CONFIG.maxDatagramBytes,
    udpRateLimit:
      config.udpRateLimit === null ? null : { ...DEFAULT_UDP_RATE_LIMIT, ...config.udpRateLimit },
  };
}
