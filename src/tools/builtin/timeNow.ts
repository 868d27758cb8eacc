import type { ToolSpec } from "../types.js";

export function createTimeNowTool(now: () => number = Date.now): ToolSpec {
  return {
    name: "time.now",
    description: "Return the current time as ISO-8601 and epoch milliseconds.",
    parameters: {},
    handler: () => {
      const epochMs = now();
      return {
        iso: new Date(epochMs).toISOString(),
        epochMs,
      };
    },
  };
}
