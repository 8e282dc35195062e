import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TransientUpstreamError } from "../errors.js";
import { fetchDocumentBatch, normalizePmcid } from "./efetch.js";

const CREDENTIAL = { email: "dev@example.org", apiKey: "test-secret" };
const OPTIONS = { baseUrl: "https://eutils.test/efetch.fcgi", db: "pmc", tool: "test-tool", timeoutMs: 5_000 };

function xmlResponse(body: string, contentType: string | null = "text/xml; charset=UTF-8", status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? "OK" : "Too Many Requests",
    text: () => Promise.resolve(body),
    headers: { get: (name: string) => (name === "content-type" ? contentType : null) },
  };
}

describe("normalizePmcid", () => {
  it("strips the PMC prefix", () => {
    expect(normalizePmcid("PMC123")).toBe("123");
    expect(normalizePmcid("pmc456")).toBe("456");
    expect(normalizePmcid(" 789 ")).toBe("789");
  });
});

describe("fetchDocumentBatch", () => {
  const mockFetch = vi.fn();

  beforeEach(() => {
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    mockFetch.mockReset();
  });

  it("requests every id in one call and returns the body", async () => {
    mockFetch.mockResolvedValueOnce(xmlResponse("<set></set>"));

    const body = await fetchDocumentBatch(["PMC1", "PMC2"], CREDENTIAL, OPTIONS);

    expect(body).toBe("<set></set>");
    expect(mockFetch).toHaveBeenCalledTimes(1);
    const params = new URL(String(mockFetch.mock.calls[0]?.[0])).searchParams;
    expect(params.get("id")).toBe("1,2");
    expect(params.get("db")).toBe("pmc");
    expect(params.get("retmode")).toBe("xml");
    expect(params.get("api_key")).toBe("test-secret");
  });

  it("accepts application/xml", async () => {
    mockFetch.mockResolvedValueOnce(xmlResponse("<set></set>", "application/xml"));

    await expect(fetchDocumentBatch(["1"], CREDENTIAL, OPTIONS)).resolves.toBe("<set></set>");
  });

  it("rejects a non-XML content type as malformed", async () => {
    mockFetch.mockResolvedValueOnce(xmlResponse("<html></html>", "text/html"));

    await expect(fetchDocumentBatch(["1"], CREDENTIAL, OPTIONS)).rejects.toMatchObject({
      kind: "malformed",
      message: "Unexpected Content-Type: text/html (expected XML)",
    });
  });

  it("reports a non-success status", async () => {
    mockFetch.mockResolvedValueOnce(xmlResponse("slow down", "text/plain", 429));

    const failure = fetchDocumentBatch(["1"], CREDENTIAL, OPTIONS);

    await expect(failure).rejects.toBeInstanceOf(TransientUpstreamError);
    await expect(failure).rejects.toMatchObject({ kind: "status", status: 429 });
  });

  it("reports a network failure as transport", async () => {
    mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(fetchDocumentBatch(["1"], CREDENTIAL, OPTIONS)).rejects.toMatchObject({
      kind: "transport",
      message: "fetch failed",
    });
  });
});
