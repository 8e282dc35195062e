import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CredentialPool } from "../credentials.js";
import { createLogger } from "../logger.js";
import { mapIds, type IdMapOptions } from "./id-converter.js";

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? "OK" : "Service Unavailable",
    text: () => Promise.resolve(typeof body === "string" ? body : JSON.stringify(body)),
    headers: { get: () => "application/json" },
  };
}

function requestedIds(call: unknown[]): string {
  return new URL(String(call[0])).searchParams.get("ids") ?? "";
}

describe("mapIds", () => {
  const mockFetch = vi.fn();

  beforeEach(() => {
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    mockFetch.mockReset();
  });

  function options(overrides: Partial<IdMapOptions> = {}): IdMapOptions {
    return {
      baseUrl: "https://idconv.test/v1.0/",
      chunkSize: 2,
      onMalformed: "retry",
      tool: "test-tool",
      credentials: new CredentialPool([{ email: "dev@example.org", apiKey: "test-secret" }]),
      retryDelayMs: 0,
      retryJitterMs: 0,
      requestDelayMs: 0,
      requestTimeoutMs: 5_000,
      logger: createLogger({ level: "silent" }),
      ...overrides,
    };
  }

  it("returns one entry per input id in input order", async () => {
    mockFetch
      .mockResolvedValueOnce(
        jsonResponse({
          status: "ok",
          records: [
            { pmid: "11", pmcid: "PMC110" },
            { pmid: "12", errmsg: "invalid article id" },
          ],
        })
      )
      .mockResolvedValueOnce(jsonResponse({ status: "ok", records: [{ pmid: 13, pmcid: "PMC130" }] }));

    const result = await mapIds(["11", "12", "13"], options());

    expect(result).toEqual([
      { primaryId: "11", secondaryId: "PMC110" },
      { primaryId: "12" },
      { primaryId: "13", secondaryId: "PMC130" },
    ]);
    expect(mockFetch.mock.calls.map(requestedIds)).toEqual(["11,12", "13"]);
  });

  it("identifies the requester in the query and the User-Agent header", async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ records: [] }));

    await mapIds(["11"], options());

    const [url, init] = mockFetch.mock.calls[0] ?? [];
    const params = new URL(String(url)).searchParams;
    expect(params.get("tool")).toBe("test-tool");
    expect(params.get("email")).toBe("dev@example.org");
    expect(params.get("api_key")).toBe("test-secret");
    expect(params.get("format")).toBe("json");
    expect(init).toMatchObject({ headers: { "User-Agent": "test-tool/1.0 (mailto:dev@example.org)" } });
  });

  it("retries a chunk until it succeeds", async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse("down", 503))
      .mockResolvedValueOnce(jsonResponse("not json"))
      .mockResolvedValueOnce(jsonResponse({ records: [{ pmid: "11", pmcid: "PMC110" }] }));

    const result = await mapIds(["11"], options());

    expect(result).toEqual([{ primaryId: "11", secondaryId: "PMC110" }]);
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });

  it("fails only the malformed chunk under the fail-chunk policy", async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse({ status: "error", message: "bad ids" }))
      .mockResolvedValueOnce(jsonResponse({ records: [{ pmid: "13", pmcid: "PMC130" }] }));

    const result = await mapIds(["11", "12", "13"], options({ onMalformed: "fail-chunk" }));

    expect(result).toEqual([
      { primaryId: "11", error: "malformed mapping response: ID converter error: bad ids" },
      { primaryId: "12", error: "malformed mapping response: ID converter error: bad ids" },
      { primaryId: "13", secondaryId: "PMC130" },
    ]);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("still retries status failures under the fail-chunk policy", async () => {
    mockFetch
      .mockResolvedValueOnce(jsonResponse("down", 503))
      .mockResolvedValueOnce(jsonResponse({ records: [{ pmid: "11", pmcid: "PMC110" }] }));

    const result = await mapIds(["11"], options({ onMalformed: "fail-chunk" }));

    expect(result).toEqual([{ primaryId: "11", secondaryId: "PMC110" }]);
  });

  it("waits requestDelayMs between chunk requests", async () => {
    vi.useFakeTimers();
    try {
      mockFetch.mockImplementation((url: string) => {
        const id = new URL(url).searchParams.get("ids") ?? "";
        return Promise.resolve(jsonResponse({ records: [{ pmid: id, pmcid: `PMC${id}` }] }));
      });

      const pending = mapIds(["11", "12"], options({ chunkSize: 1, requestDelayMs: 500 }));

      await vi.advanceTimersByTimeAsync(0);
      expect(mockFetch).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(499);
      expect(mockFetch).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(mockFetch).toHaveBeenCalledTimes(2);

      await expect(pending).resolves.toEqual([
        { primaryId: "11", secondaryId: "PMC11" },
        { primaryId: "12", secondaryId: "PMC12" },
      ]);
    } finally {
      vi.useRealTimers();
    }
  });

  it("makes no request for an empty list", async () => {
    await expect(mapIds([], options())).resolves.toEqual([]);
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
