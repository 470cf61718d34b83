import { readFile } from "node:fs/promises";
import type { FileResource } from "../types/config.js";
import { TerminalError, TerminalErrorKind, errorMessage } from "../shared/errors.js";

export interface ResourceContents {
  uri: string;
  mimeType: string;
  text: string;
}

/** Read-only files exposed to the client under fixed URIs. */
export class FileResourceProvider {
  private readonly byUri = new Map<string, FileResource>();

  constructor(resources: FileResource[]) {
    for (const resource of resources) {
      this.byUri.set(resource.uri, resource);
    }
  }

  list(): FileResource[] {
    return [...this.byUri.values()];
  }

  async read(uri: string): Promise<ResourceContents> {
    const resource = this.byUri.get(uri);
    if (!resource) {
      throw new TerminalError(TerminalErrorKind.RESOURCE_NOT_FOUND, `Unknown resource: ${uri}`, { uri });
    }

    let text: string;
    try {
      text = await readFile(resource.path, "utf-8");
    } catch (err) {
      throw new TerminalError(TerminalErrorKind.RESOURCE_NOT_FOUND, `Cannot read resource ${uri}: ${errorMessage(err)}`, {
        uri,
        path: resource.path,
      });
    }
    return { uri, mimeType: resource.mimeType ?? "text/plain", text };
  }
}
