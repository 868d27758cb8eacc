import type { ToolSpec } from "../types.js";

export const echoTool: ToolSpec = {
  name: "echo",
  description: "Echo the given message back, optionally repeated.",
  parameters: {
    message: {
      type: "string",
      description: "Message to echo.",
    },
    repeat: {
      type: "int",
      description: "How many times to repeat the message.",
      default: 1,
    },
  },
  handler: (args) => {
    const message = typeof args.message === "string" ? args.message : "";
    const repeat = typeof args.repeat === "number" ? Math.max(1, Math.floor(args.repeat)) : 1;
    return Array.from({ length: repeat }, () => message).join(" ");
  },
};
