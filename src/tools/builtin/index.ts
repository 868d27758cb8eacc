import { echoTool } from "./echo.js";
import { createTimeNowTool } from "./timeNow.js";
import { waitTool } from "./wait.js";
import type { ToolSpec } from "../types.js";

export { echoTool, createTimeNowTool, waitTool };

export function createBuiltinTools(now: () => number = Date.now): ToolSpec[] {
  return [echoTool, createTimeNowTool(now), waitTool];
}
