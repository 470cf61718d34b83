import { handleFetchUrl, USER_AGENT, type FetchFn } from "../../../src/tools/fetch-url.js";
import { TerminalErrorKind } from "../../../src/shared/errors.js";

// Never settles on its own; rejects once the request signal aborts, like a stalled connection.
const stalledFetch: FetchFn = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener("abort", () => reject(new Error("The operation was aborted")));
  });

describe("handleFetchUrl", () => {
  it("returns status, content type and body", async () => {
    const fetchImpl: FetchFn = async () =>
      new Response("hello world", { status: 200, headers: { "content-type": "text/plain" } });

    const output = await handleFetchUrl({ url: "https://example.test/" }, { timeoutMs: 1000, maxBytes: 1024, fetchImpl });

    expect(output).toEqual({
      url: "https://example.test/",
      status: 200,
      status_text: "",
      content_type: "text/plain",
      body: "hello world",
      truncated: false,
    });
  });

  it("sends a GET with the server user agent", async () => {
    const seen: Array<RequestInit | undefined> = [];
    const fetchImpl: FetchFn = async (_input, init) => {
      seen.push(init);
      return new Response("ok");
    };

    await handleFetchUrl({ url: "https://example.test/" }, { timeoutMs: 1000, maxBytes: 1024, fetchImpl });

    expect(seen[0]).toMatchObject({ method: "GET", redirect: "follow", headers: { "user-agent": USER_AGENT } });
  });

  it("returns HTTP error statuses as data", async () => {
    const fetchImpl: FetchFn = async () => new Response("missing", { status: 404, statusText: "Not Found" });

    const output = await handleFetchUrl({ url: "https://example.test/nope" }, { timeoutMs: 1000, maxBytes: 1024, fetchImpl });

    expect(output).toMatchObject({ status: 404, status_text: "Not Found", body: "missing", truncated: false });
  });

  it("truncates the body at max_bytes from the input over the configured limit", async () => {
    const fetchImpl: FetchFn = async () => new Response("abcdefghij");

    const output = await handleFetchUrl(
      { url: "https://example.test/", max_bytes: 3 },
      { timeoutMs: 1000, maxBytes: 1024, fetchImpl }
    );

    expect(output.body).toBe("abc");
    expect(output.truncated).toBe(true);
  });

  it("stops reading the body once it passes max_bytes", async () => {
    let pulls = 0;
    let cancelled = false;
    // Endless body: only an early stop lets this call return.
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        pulls += 1;
        controller.enqueue(new Uint8Array(1024).fill(0x61));
      },
      cancel() {
        cancelled = true;
      },
    });
    const fetchImpl: FetchFn = async () => new Response(body);

    const output = await handleFetchUrl({ url: "https://example.test/big" }, { timeoutMs: 1000, maxBytes: 10, fetchImpl });

    expect(output.body).toBe("a".repeat(10));
    expect(output.truncated).toBe(true);
    expect(cancelled).toBe(true);
    expect(pulls).toBeLessThan(5);
  });

  it("raises FetchFailure on transport errors", async () => {
    const fetchImpl: FetchFn = async () => {
      throw new TypeError("fetch failed");
    };

    await expect(
      handleFetchUrl({ url: "https://example.test/" }, { timeoutMs: 1000, maxBytes: 1024, fetchImpl })
    ).rejects.toMatchObject({
      kind: TerminalErrorKind.FETCH_FAILURE,
      message: "Failed to fetch https://example.test/: fetch failed",
    });
  });

  it("raises Timeout when the server does not answer in time", async () => {
    await expect(
      handleFetchUrl({ url: "https://example.test/" }, { timeoutMs: 50, maxBytes: 1024, fetchImpl: stalledFetch })
    ).rejects.toMatchObject({ kind: TerminalErrorKind.TIMEOUT, context: { timeoutMs: 50 } });
  });

  it("raises Cancelled when the caller aborts", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    await expect(
      handleFetchUrl(
        { url: "https://example.test/" },
        { timeoutMs: 5000, maxBytes: 1024, fetchImpl: stalledFetch, signal: controller.signal }
      )
    ).rejects.toMatchObject({ kind: TerminalErrorKind.CANCELLED });
  });
});
