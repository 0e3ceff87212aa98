import { z } from "zod";

const port = z.number().int().min(0).max(65535);
const positiveMs = z.number().int().positive();

export const serverConfigSchema = z.object({
  host: z.string().min(1).optional(),
  port,
  udpPort: port.optional(),

  // Timeouts
  requestTimeoutMs: positiveMs.optional(),
  shutdownGraceMs: z.number().int().min(0).optional(),

  // Size limits
  maxMessageBytes: z.number().int().min(64).optional(),
  maxDatagramBytes: z.number().int().min(64).max(65507).optional(),

  // UDP rate limiting (null disables)
  udpRateLimit: z
    .object({
      datagramsPerSecond: z.number().positive(),
      burstSize: z.number().int().min(1),
    })
    .partial()
    .nullable()
    .optional(),
});
