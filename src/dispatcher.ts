// Dispatcher: routes one tool call (method name + raw arguments) to its handler and back.
// Stateless. Every call is independent and may run concurrently with any other; nothing is retried.
import type { CommandExecutor } from "./execution/executor.js";
import { logger } from "./logger.js";
import { TerminalError, errorMessage } from "./shared/errors.js";
import { ToolRegistry, type ToolCall } from "./tool-registry.js";
import { handleRunCommand, type RunCommandOutput } from "./tools/run-command.js";
import { handleFetchUrl, type FetchFn, type FetchUrlOutput } from "./tools/fetch-url.js";

export type ToolOutput = RunCommandOutput | FetchUrlOutput;

export interface DispatcherDeps {
  executor: CommandExecutor;
  fetch: { timeoutMs: number; maxBytes: number; fetchImpl?: FetchFn };
  registry?: ToolRegistry;
}

export interface DispatchOptions {
  signal?: AbortSignal;
}

export class Dispatcher {
  private readonly registry: ToolRegistry;

  constructor(private readonly deps: DispatcherDeps) {
    this.registry = deps.registry ?? new ToolRegistry();
  }

  async dispatch(method: string, args: Record<string, unknown>, options: DispatchOptions = {}): Promise<ToolOutput> {
    const start = performance.now();
    const log = logger.child({ tool: method });

    try {
      const call = this.registry.parse(method, args);
      const output = await this.invoke(call, options);
      log.info({ durationMs: Math.round(performance.now() - start) }, "Tool call completed");
      return output;
    } catch (err) {
      log.warn(
        {
          durationMs: Math.round(performance.now() - start),
          kind: err instanceof TerminalError ? err.kind : undefined,
          error: errorMessage(err),
        },
        "Tool call failed"
      );
      throw err;
    }
  }

  private invoke(call: ToolCall, options: DispatchOptions): Promise<ToolOutput> {
    switch (call.tool) {
      case "run_command":
        return handleRunCommand(this.deps.executor, call.args, { signal: options.signal });
      case "fetch_url":
        return handleFetchUrl(call.args, { ...this.deps.fetch, signal: options.signal });
    }
  }
}
