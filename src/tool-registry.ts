import { z } from "zod";
import { MAX_TIMEOUT_MS } from "./execution/executor.js";
import { TerminalError, TerminalErrorKind } from "./shared/errors.js";

export const RunCommandInputSchema = z.object({
  command: z.string().min(1, "command must not be empty").describe("Shell command to execute, passed verbatim to the shell"),
  timeout_ms: z.number().int().positive().max(MAX_TIMEOUT_MS).optional().describe("Optional deadline in milliseconds; the command is killed when it expires"),
});

export const FetchUrlInputSchema = z.object({
  url: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), "url must use http or https")
    .describe("Absolute http(s) URL to fetch"),
  max_bytes: z.number().int().positive().optional().describe("Truncate the body after this many bytes"),
});

export type RunCommandInput = z.infer<typeof RunCommandInputSchema>;
export type FetchUrlInput = z.infer<typeof FetchUrlInputSchema>;

/** A validated tool invocation. The tool set is closed; every variant is matched explicitly. */
export type ToolCall =
  | { tool: "run_command"; args: RunCommandInput }
  | { tool: "fetch_url"; args: FetchUrlInput };

export type ToolName = ToolCall["tool"];

export interface ToolDef {
  name: ToolName;
  description: string;
  inputSchema: z.ZodTypeAny;
  annotations: {
    readOnlyHint: boolean;
    destructiveHint: boolean;
    idempotentHint: boolean;
    openWorldHint: boolean;
  };
}

const tools: ToolDef[] = [
  {
    name: "run_command",
    description:
      "Run a terminal command through the server shell and return its stdout, stderr and return code. " +
      "The command is executed as given, without sandboxing. A non-zero return code is reported as data, not as an error.",
    inputSchema: RunCommandInputSchema,
    annotations: { readOnlyHint: false, destructiveHint: true, idempotentHint: false, openWorldHint: true },
  },
  {
    name: "fetch_url",
    description: "Fetch a URL over HTTP(S) and return the status, content type and body as text.",
    inputSchema: FetchUrlInputSchema,
    annotations: { readOnlyHint: true, destructiveHint: false, idempotentHint: true, openWorldHint: true },
  },
];

export class ToolRegistry {
  getAllTools(): ToolDef[] {
    return [...tools];
  }

  /** Resolve a method name and raw arguments into a validated ToolCall. */
  parse(method: string, args: Record<string, unknown>): ToolCall {
    switch (method) {
      case "run_command":
        return { tool: "run_command", args: validate(method, RunCommandInputSchema, args) };
      case "fetch_url":
        return { tool: "fetch_url", args: validate(method, FetchUrlInputSchema, args) };
      default:
        throw new TerminalError(TerminalErrorKind.METHOD_NOT_FOUND, `Unknown tool: ${method}`, { method });
    }
  }
}

function validate<S extends z.ZodTypeAny>(tool: string, schema: S, args: unknown): z.output<S> {
  const result = schema.safeParse(args);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new TerminalError(TerminalErrorKind.INVALID_ARGUMENT, `Invalid arguments for ${tool}: ${issues.join("; ")}`, {
      tool,
      issues,
    });
  }
  return result.data;
}
