import { setTimeout as delay } from "node:timers/promises";
import type { ToolSpec } from "../types.js";

export const MAX_WAIT_MS = 10_000;

export const waitTool: ToolSpec = {
  name: "wait",
  description: `Wait for the given number of milliseconds (at most ${MAX_WAIT_MS}).`,
  parameters: {
    ms: {
      type: "int",
      description: "Milliseconds to wait.",
    },
  },
  handler: async (args) => {
    const requested = args.ms;
    if (typeof requested !== "number" || !Number.isInteger(requested) || requested < 0) {
      throw new Error("ms must be a non-negative integer");
    }
    const waitedMs = Math.min(requested, MAX_WAIT_MS);
    await delay(waitedMs);
    return { waitedMs };
  },
};
