import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { Dispatcher } from "./dispatcher.js";
import type { FileResourceProvider } from "./resources/file-resources.js";
import { toMcpError } from "./shared/errors.js";
import type { ToolRegistry } from "./tool-registry.js";
import { SERVER_NAME, SERVER_VERSION } from "./version.js";

export interface ServerDeps {
  registry: ToolRegistry;
  dispatcher: Dispatcher;
  resources: FileResourceProvider;
}

export function createServer({ registry, dispatcher, resources }: ServerDeps): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {}, resources: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.getAllTools().map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: zodToJsonSchema(t.inputSchema),
      annotations: t.annotations,
    })),
  }));

  // Handlers are async and never block: the SDK keeps reading requests while a
  // command runs, so calls complete in whatever order their work finishes.
  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    try {
      const output = await dispatcher.dispatch(name, args ?? {}, { signal: extra.signal });
      return {
        content: [{ type: "text" as const, text: JSON.stringify(output, null, 2) }],
        structuredContent: { ...output },
      };
    } catch (err) {
      // Failures are protocol errors, never tool results.
      throw toMcpError(err);
    }
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: resources.list().map((r) => ({
      uri: r.uri,
      name: r.name,
      description: r.description,
      mimeType: r.mimeType ?? "text/plain",
    })),
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    try {
      return { contents: [await resources.read(request.params.uri)] };
    } catch (err) {
      throw toMcpError(err);
    }
  });

  return server;
}
