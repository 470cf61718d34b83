import { z } from "zod";
import { MAX_TIMEOUT_MS } from "../execution/executor.js";

export const FileResourceSchema = z.object({
  uri: z.string().min(1),
  name: z.string().min(1),
  path: z.string().min(1),
  description: z.string().optional(),
  mimeType: z.string().optional(),
});

export type FileResource = z.infer<typeof FileResourceSchema>;

/** Full server configuration, as stored in config.yaml. */
export const ServerConfigSchema = z.object({
  execution: z.object({
    shell: z.string().min(1),
    cwd: z.string().nullable(),
    // 0 = unbounded
    default_timeout_ms: z.number().int().nonnegative().max(MAX_TIMEOUT_MS),
    // 0 = no ceiling on caller-supplied deadlines
    max_timeout_ms: z.number().int().nonnegative().max(MAX_TIMEOUT_MS),
  }),
  fetch: z.object({
    timeout_ms: z.number().int().positive().max(MAX_TIMEOUT_MS),
    max_bytes: z.number().int().positive(),
  }),
  resources: z.array(FileResourceSchema),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
