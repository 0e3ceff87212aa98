import { z } from "zod";
import { ERROR_KINDS } from "../errors.js";
import type { JsonValue } from "./commands.js";

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

/**
 * Wire request, identical on both transports:
 * `{ "type": "<command-name>", "params": { ... } }`.
 */
export const commandRequestSchema = z.object({
  type: z.string().min(1),
  params: z.record(jsonValueSchema).optional(),
});

export type CommandRequest = z.infer<typeof commandRequestSchema>;

/** TCP response line. */
export const outcomeSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("success"), result: jsonValueSchema }),
  z.object({
    status: z.literal("error"),
    message: z.string(),
    kind: z.enum(ERROR_KINDS).optional(),
  }),
]);
