/**
 * fetch_url tool - GET a URL and return its body as text
 *
 * HTTP error statuses are returned as data; only transport failures,
 * timeouts and cancellation raise.
 */

import { TerminalError, TerminalErrorKind, errorMessage } from "../shared/errors.js";
import type { FetchUrlInput } from "../tool-registry.js";
import { SERVER_VERSION } from "../version.js";

export type FetchFn = typeof fetch;

export const USER_AGENT = `terminal-mcp-server/${SERVER_VERSION}`;

export interface FetchUrlOptions {
  timeoutMs: number;
  maxBytes: number;
  fetchImpl?: FetchFn;
  signal?: AbortSignal;
}

export interface FetchUrlOutput {
  url: string;
  status: number;
  status_text: string;
  content_type: string | null;
  body: string;
  truncated: boolean;
}

export async function handleFetchUrl(input: FetchUrlInput, options: FetchUrlOptions): Promise<FetchUrlOutput> {
  if (options.signal?.aborted) {
    throw new TerminalError(TerminalErrorKind.CANCELLED, "Fetch cancelled before it started", { url: input.url });
  }

  const fetchImpl = options.fetchImpl ?? fetch;
  const maxBytes = input.max_bytes ?? options.maxBytes;
  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const onAbort = (): void => controller.abort();
  options.signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const response = await fetchImpl(input.url, {
      method: "GET",
      redirect: "follow",
      headers: { "user-agent": USER_AGENT },
      signal: controller.signal,
    });
    const { bytes, truncated } = await readBody(response, maxBytes);

    return {
      url: response.url || input.url,
      status: response.status,
      status_text: response.statusText,
      content_type: response.headers.get("content-type"),
      body: bytes.toString("utf8"),
      truncated,
    };
  } catch (err) {
    if (timedOut) {
      throw new TerminalError(TerminalErrorKind.TIMEOUT, `Fetch timed out after ${options.timeoutMs}ms`, {
        url: input.url,
        timeoutMs: options.timeoutMs,
      });
    }
    if (options.signal?.aborted) {
      throw new TerminalError(TerminalErrorKind.CANCELLED, "Fetch cancelled", { url: input.url });
    }
    throw new TerminalError(TerminalErrorKind.FETCH_FAILURE, `Failed to fetch ${input.url}: ${errorMessage(err)}`, {
      url: input.url,
    });
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", onAbort);
  }
}

/** Read at most maxBytes of the body; the rest of the stream is cancelled unread. */
async function readBody(response: Response, maxBytes: number): Promise<{ bytes: Buffer; truncated: boolean }> {
  if (!response.body) return { bytes: Buffer.alloc(0), truncated: false };

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    chunks.push(value);
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      return { bytes: Buffer.concat(chunks).subarray(0, maxBytes), truncated: true };
    }
  }
  return { bytes: Buffer.concat(chunks), truncated: false };
}
