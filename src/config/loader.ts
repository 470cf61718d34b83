// Config loader: reads ~/.config/terminal-mcp/config.yaml and deep-merges it over the defaults.
// On first run (no config file) it writes DEFAULT_CONFIG_YAML and returns firstRun: true.
// Environment overrides are applied last. The merged result is validated against
// ServerConfigSchema; an invalid file falls back to defaults rather than aborting startup.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { ServerConfigSchema, type ServerConfig } from "../types/config.js";
import { MAX_TIMEOUT_MS } from "../execution/executor.js";
import { logger } from "../logger.js";
import { errorMessage } from "../shared/errors.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "terminal-mcp");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

export const DEFAULT_CONFIG: ServerConfig = {
  execution: { shell: "/bin/sh", cwd: null, default_timeout_ms: 0, max_timeout_ms: 0 },
  fetch: { timeout_ms: 30_000, max_bytes: 1024 * 1024 },
  resources: [],
};

const DEFAULT_CONFIG_YAML = `# Terminal MCP server configuration
# Generated automatically on first run. All values shown are defaults.

execution:
  # Interpreter used as: <shell> -c <command>
  shell: /bin/sh
  # Working directory for commands (null = the server's own cwd)
  cwd: null
  # Deadline applied when the caller passes none. 0 = wait indefinitely.
  default_timeout_ms: 0
  # Upper bound for any deadline, caller-supplied or default. 0 = no ceiling.
  max_timeout_ms: 0

fetch:
  timeout_ms: 30000
  max_bytes: 1048576

# Static files exposed as read-only resources
resources: []
# resources:
#   - uri: file:///etc/hostname
#     name: hostname
#     path: /etc/hostname
#     mimeType: text/plain
`;

export interface ConfigResult {
  config: ServerConfig;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found, generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: errorMessage(err) }, "Could not write default config file");
    }
    return { config: applyEnvOverrides(cloneDefaults(), env), configPath, firstRun: true };
  }

  let config: ServerConfig;
  try {
    const raw = readFileSync(configPath, "utf-8");
    const parsed: unknown = parseYaml(raw);
    const merged = deepMerge(DEFAULT_CONFIG, isRecord(parsed) ? parsed : {});
    const result = ServerConfigSchema.safeParse(merged);
    if (result.success) {
      config = result.data;
    } else {
      logger.error({ configPath, issues: result.error.issues }, "Invalid config, using defaults");
      config = cloneDefaults();
    }
  } catch (err) {
    logger.error({ configPath, error: errorMessage(err) }, "Failed to parse config, using defaults");
    config = cloneDefaults();
  }
  return { config: applyEnvOverrides(config, env), configPath, firstRun: false };
}

function applyEnvOverrides(config: ServerConfig, env: NodeJS.ProcessEnv): ServerConfig {
  const execution = { ...config.execution };
  if (env.TERMINAL_MCP_SHELL) execution.shell = env.TERMINAL_MCP_SHELL;
  if (env.TERMINAL_MCP_CWD) execution.cwd = env.TERMINAL_MCP_CWD;
  if (env.TERMINAL_MCP_TIMEOUT_MS) {
    const timeout = Number(env.TERMINAL_MCP_TIMEOUT_MS);
    if (Number.isInteger(timeout) && timeout >= 0 && timeout <= MAX_TIMEOUT_MS) {
      execution.default_timeout_ms = timeout;
    } else {
      logger.warn({ value: env.TERMINAL_MCP_TIMEOUT_MS }, "Ignoring invalid TERMINAL_MCP_TIMEOUT_MS");
    }
  }
  return { ...config, execution };
}

function cloneDefaults(): ServerConfig {
  return {
    execution: { ...DEFAULT_CONFIG.execution },
    fetch: { ...DEFAULT_CONFIG.fetch },
    resources: [],
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
