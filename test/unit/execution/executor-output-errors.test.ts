import { once } from "events";
import { spawn, type ChildProcess } from "node:child_process";
import { ShellExecutor } from "../../../src/execution/executor.js";
import { TerminalErrorKind } from "../../../src/shared/errors.js";

jest.mock("node:child_process", () => {
  const actual = jest.requireActual<typeof import("node:child_process")>("node:child_process");
  return { ...actual, spawn: jest.fn(actual.spawn) };
});

const { spawn: realSpawn } = jest.requireActual<typeof import("node:child_process")>("node:child_process");

describe("ShellExecutor output errors", () => {
  it("kills the process group and raises OutputFailure when a pipe errors", async () => {
    const spawned: ChildProcess[] = [];
    jest.mocked(spawn).mockImplementationOnce((command, args, options) => {
      const child = realSpawn(command, args, options);
      spawned.push(child);
      setTimeout(() => child.stdout?.emit("error", new Error("EIO: i/o error, read")), 50);
      return child;
    });
    const start = performance.now();

    await expect(new ShellExecutor().execute("sleep 5")).rejects.toMatchObject({
      kind: TerminalErrorKind.OUTPUT_FAILURE,
      message: "Failed to read command output: EIO: i/o error, read",
    });
    expect(performance.now() - start).toBeLessThan(4000);

    const [child] = spawned;
    if (child.exitCode === null && child.signalCode === null) await once(child, "exit");
    expect(child.signalCode).toBe("SIGKILL");
  });
});
