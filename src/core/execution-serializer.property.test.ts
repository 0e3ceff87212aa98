import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { makeCommand, RecordingHost } from "../testing/recording-host.js";
import { ExecutionSerializer } from "./execution-serializer.js";

const producerPlan = fc.array(
  fc.record({
    transport: fc.constantFrom("tcp" as const, "udp" as const),
    /** Microtask hops before this producer's next submission. */
    hops: fc.array(fc.integer({ min: 0, max: 3 }), { minLength: 1, maxLength: 10 }),
  }),
  { minLength: 1, maxLength: 6 },
);

describe("ExecutionSerializer property tests", () => {
  it("the host observes tasks in exactly the order they were enqueued", async () => {
    await fc.assert(
      fc.asyncProperty(producerPlan, async (producers) => {
        const host = new RecordingHost();
        const serializer = new ExecutionSerializer(host);
        serializer.start();

        let counter = 0;
        const submitted: number[] = [];

        await Promise.all(
          producers.map(async ({ transport, hops }) => {
            for (const hop of hops) {
              for (let i = 0; i < hop; i++) await Promise.resolve();
              const seq = ++counter;
              submitted.push(seq);
              const name = transport === "udp" ? "set_track_volume" : "set_tempo";
              serializer.submit({ command: makeCommand(name, { seq }, transport) });
            }
          }),
        );

        await serializer.drain(5000);
        serializer.stop();

        expect(host.calls.map((c) => c.params.seq)).toEqual(submitted);
        expect(host.maxConcurrent).toBeLessThanOrEqual(1);
      }),
      { numRuns: 50 },
    );
  });
});
