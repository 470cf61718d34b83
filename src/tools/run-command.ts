/**
 * run_command tool - execute a shell command and report its output
 */

import type { CommandExecutor } from "../execution/executor.js";
import type { RunCommandInput } from "../tool-registry.js";

export interface RunCommandOutput {
  stdout: string;
  stderr: string;
  return_code: number;
}

export async function handleRunCommand(
  executor: CommandExecutor,
  input: RunCommandInput,
  options: { signal?: AbortSignal } = {}
): Promise<RunCommandOutput> {
  const result = await executor.execute(input.command, {
    timeoutMs: input.timeout_ms,
    signal: options.signal,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    return_code: result.exitCode,
  };
}
