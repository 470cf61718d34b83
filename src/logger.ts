import pino from "pino";

// stdout carries the MCP stream, so every log line goes to stderr.
export const logger = pino(
  {
    name: "terminal-mcp",
    level: process.env.LOG_LEVEL ?? "info",
  },
  pino.destination(2),
);
