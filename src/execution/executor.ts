// Command execution layer: the run_command tool passes through this module.
// ShellExecutor.execute() is the boundary between the server and the OS. It spawns one
// shell per call, drains stdout and stderr concurrently, and never blocks the event loop
// while the child runs, so other requests keep being served.
import { spawn, type ChildProcessByStdio } from "node:child_process";
import { once } from "node:events";
import { constants } from "node:os";
import type { Readable } from "node:stream";
import type { Logger } from "pino";
import { logger } from "../logger.js";
import { TerminalError, TerminalErrorKind, errorMessage } from "../shared/errors.js";
import { allowAll, type CommandPolicy } from "./policy.js";

type ShellChild = ChildProcessByStdio<null, Readable, Readable>;

/** Result of a command that was spawned and exited, whatever its exit status. */
export interface CommandResult {
  readonly stdout: string;
  readonly stderr: string;
  /** Exit status; a child killed by a signal reports the negated signal number. */
  readonly exitCode: number;
  readonly durationMs: number;
  readonly pid: number | undefined;
}

export interface ExecuteOptions {
  /** Deadline for this call in ms. Overrides the executor default; 0 disables it. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CommandExecutor {
  execute(command: string, options?: ExecuteOptions): Promise<CommandResult>;
}

export interface ShellExecutorOptions {
  shell?: string;
  cwd?: string | null;
  env?: NodeJS.ProcessEnv;
  /** Applied when the caller passes no timeout. 0 = unbounded. */
  defaultTimeoutMs?: number;
  /** Ceiling for any deadline. 0 = none. */
  maxTimeoutMs?: number;
  policy?: CommandPolicy;
}

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

type Termination = "timeout" | "cancelled";

/** Largest delay setTimeout honours; longer ones fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export class ShellExecutor implements CommandExecutor {
  private readonly shell: string;
  private readonly cwd: string | undefined;
  private readonly env: NodeJS.ProcessEnv;
  private readonly defaultTimeoutMs: number;
  private readonly maxTimeoutMs: number;
  private readonly policy: CommandPolicy;

  constructor(options: ShellExecutorOptions = {}) {
    this.shell = options.shell ?? "/bin/sh";
    this.cwd = options.cwd ?? undefined;
    this.env = options.env ?? process.env;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? 0;
    this.maxTimeoutMs = options.maxTimeoutMs ?? 0;
    this.policy = options.policy ?? allowAll;
  }

  async execute(command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
    const verdict = await this.policy(command);
    if (!verdict.allowed) {
      throw new TerminalError(TerminalErrorKind.COMMAND_REJECTED, `Command rejected by policy: ${verdict.reason}`, {
        reason: verdict.reason,
      });
    }
    if (options.signal?.aborted) {
      throw new TerminalError(TerminalErrorKind.CANCELLED, "Command cancelled before it started");
    }

    const start = performance.now();
    const child = await this.spawnShell(command);
    const log = logger.child({ pid: child.pid });
    log.debug({ shell: this.shell }, "Command spawned");

    const timeoutMs = this.effectiveTimeout(options.timeoutMs);
    // Written from timer and abort callbacks, read after the child is gone.
    const state: { termination?: Termination } = {};
    const terminate = (reason: Termination): void => {
      if (state.termination) return;
      state.termination = reason;
      log.warn({ reason, timeoutMs }, "Terminating command");
      killProcessGroup(child, log);
      // The shell is already gone but a descendant outside its group still holds the pipes.
      if (child.exitCode !== null || child.signalCode !== null) destroyPipes(child);
    };
    const timer = timeoutMs > 0 ? setTimeout(() => terminate("timeout"), timeoutMs) : undefined;
    const onAbort = (): void => terminate("cancelled");
    options.signal?.addEventListener("abort", onAbort, { once: true });
    // The signal may have fired while the spawn was pending.
    if (options.signal?.aborted) terminate("cancelled");

    try {
      // Both pipes are drained at the same time; reading one to EOF before the other
      // deadlocks once the child fills the unread pipe's kernel buffer.
      const [exit, stdout, stderr] = await Promise.all([
        waitForExit(child).then((status) => {
          // A killed shell can leave descendants holding the pipes open.
          if (state.termination) destroyPipes(child);
          return status;
        }),
        drain(child.stdout),
        drain(child.stderr),
      ]).catch((err: unknown) => {
        killProcessGroup(child, log);
        destroyPipes(child);
        throw new TerminalError(TerminalErrorKind.OUTPUT_FAILURE, `Failed to read command output: ${errorMessage(err)}`, {
          pid: child.pid,
        });
      });

      const durationMs = Math.round(performance.now() - start);
      if (state.termination === "timeout") {
        throw new TerminalError(TerminalErrorKind.TIMEOUT, `Command timed out after ${timeoutMs}ms`, {
          timeoutMs,
          durationMs,
        });
      }
      if (state.termination === "cancelled") {
        throw new TerminalError(TerminalErrorKind.CANCELLED, "Command cancelled", { durationMs });
      }

      const exitCode = toExitCode(exit);
      log.debug({ exitCode, signal: exit.signal, durationMs }, "Command exited");
      return {
        stdout: stdout.toString("utf8"),
        stderr: stderr.toString("utf8"),
        exitCode,
        durationMs,
        pid: child.pid,
      };
    } finally {
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }

  private async spawnShell(command: string): Promise<ShellChild> {
    let child: ShellChild;
    try {
      child = spawn(this.shell, ["-c", command], {
        cwd: this.cwd,
        env: this.env,
        // stdin closed; detached gives the child its own process group and no controlling tty.
        stdio: ["ignore", "pipe", "pipe"],
        detached: true,
      });
    } catch (err) {
      throw spawnFailure(this.shell, err);
    }

    try {
      await once(child, "spawn");
    } catch (err) {
      // Pipes are null when the OS ran out of descriptors before they were created.
      child.stdout?.destroy();
      child.stderr?.destroy();
      throw spawnFailure(this.shell, err);
    }
    return child;
  }

  private effectiveTimeout(requested: number | undefined): number {
    const timeout = requested ?? this.defaultTimeoutMs;
    if (this.maxTimeoutMs > 0 && (timeout === 0 || timeout > this.maxTimeoutMs)) {
      return Math.min(this.maxTimeoutMs, MAX_TIMEOUT_MS);
    }
    return Math.min(timeout, MAX_TIMEOUT_MS);
  }
}

function spawnFailure(shell: string, err: unknown): TerminalError {
  const code = err instanceof Error && "code" in err ? String(err.code) : undefined;
  logger.error({ shell, code, error: errorMessage(err) }, "Failed to spawn shell");
  return new TerminalError(TerminalErrorKind.SPAWN_FAILURE, `Failed to spawn ${shell}: ${errorMessage(err)}`, {
    shell,
    code,
  });
}

/** Collect a pipe until it closes. Listening for 'data' switches it to flowing mode. */
function drain(stream: Readable): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    stream.on("data", (chunk: Buffer) => chunks.push(chunk));
    stream.once("error", reject);
    stream.once("close", () => resolve(Buffer.concat(chunks)));
  });
}

function waitForExit(child: ShellChild): Promise<ExitStatus> {
  if (child.exitCode !== null || child.signalCode !== null) {
    return Promise.resolve({ code: child.exitCode, signal: child.signalCode });
  }
  return new Promise<ExitStatus>((resolve) => {
    child.once("exit", (code, signal) => resolve({ code, signal }));
  });
}

const SIGNAL_NUMBERS: Partial<Record<NodeJS.Signals, number>> = constants.signals;

function toExitCode(exit: ExitStatus): number {
  if (exit.code !== null) return exit.code;
  const signo = exit.signal !== null ? SIGNAL_NUMBERS[exit.signal] : undefined;
  return signo !== undefined ? -signo : -1;
}

function destroyPipes(child: ShellChild): void {
  child.stdout.destroy();
  child.stderr.destroy();
}

function killProcessGroup(child: ShellChild, log: Logger): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, "SIGKILL");
  } catch (err) {
    // ESRCH: the group is already gone.
    log.debug({ error: errorMessage(err) }, "Process group kill failed");
  }
}
