#!/usr/bin/env node
/**
 * Terminal MCP Server
 *
 * Provides:
 * - run_command: execute a shell command without blocking other requests
 * - fetch_url: fetch a URL and return its body
 * - static file resources, including the active config file
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { logger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { ShellExecutor } from "./execution/executor.js";
import { ToolRegistry } from "./tool-registry.js";
import { Dispatcher } from "./dispatcher.js";
import { FileResourceProvider } from "./resources/file-resources.js";
import { createServer } from "./server.js";
import { SERVER_NAME } from "./version.js";
import { errorMessage } from "./shared/errors.js";

async function main(): Promise<void> {
  logger.info("Starting terminal MCP server");

  // ── Phase 1: Load config ──────────────────────────────────────
  const { config, configPath, firstRun } = loadConfig(process.env.TERMINAL_MCP_CONFIG);
  logger.info({ configPath, firstRun }, "Configuration loaded");

  // ── Phase 2: Executor ─────────────────────────────────────────
  // No policy is passed: every command the client sends is run as-is.
  const executor = new ShellExecutor({
    shell: config.execution.shell,
    cwd: config.execution.cwd,
    defaultTimeoutMs: config.execution.default_timeout_ms,
    maxTimeoutMs: config.execution.max_timeout_ms,
  });

  // ── Phase 3: Tools and resources ──────────────────────────────
  const registry = new ToolRegistry();
  const dispatcher = new Dispatcher({
    executor,
    registry,
    fetch: { timeoutMs: config.fetch.timeout_ms, maxBytes: config.fetch.max_bytes },
  });
  const resources = new FileResourceProvider([
    {
      uri: `config://${SERVER_NAME}`,
      name: "server-config",
      description: "Active configuration of this server",
      path: configPath,
      mimeType: "application/yaml",
    },
    ...config.resources,
  ]);

  // ── Phase 4: Connect transport ────────────────────────────────
  const server = createServer({ registry, dispatcher, resources });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(
    { tools: registry.getAllTools().length, resources: resources.list().length, shell: config.execution.shell },
    "Terminal MCP server running on stdio"
  );
}

main().catch((err) => {
  logger.fatal({ error: errorMessage(err) }, "Fatal startup error");
  process.exit(1);
});
