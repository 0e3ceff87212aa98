import type { MetricsCollector } from "../interfaces/metrics.js";

export const noopMetrics: MetricsCollector = {
  recordEvent(): void {},
};
