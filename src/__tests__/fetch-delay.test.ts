import { describe, it, expect, vi, beforeEach } from "vitest";

// Mock undici fetch
vi.mock("undici", () => ({
  fetch: vi.fn(),
  ProxyAgent: vi.fn(),
}));

import { fetchPage, fetchDocument } from "../lib/scraping/utils";
import { fetch as undiciFetch } from "undici";

function mockResponse(status: number, body: string) {
  (undiciFetch as ReturnType<typeof vi.fn>).mockResolvedValue({
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(body),
  });
}

describe("fetchPage politeness delay", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("delays before the network fetch", async () => {
    mockResponse(200, "<html>fresh</html>");

    const start = Date.now();
    const result = await fetchPage("https://dealer.example/page", {
      politeDelayMs: 50, // use short delay for test speed
    });
    const elapsed = Date.now() - start;

    expect(result).toBe("<html>fresh</html>");
    // Should have waited at least the polite delay
    expect(elapsed).toBeGreaterThanOrEqual(45);
  });

  it("skips delay when politeDelayMs is 0", async () => {
    mockResponse(200, "<html>fast</html>");

    const start = Date.now();
    const result = await fetchPage("https://dealer.example/page", { politeDelayMs: 0 });
    const elapsed = Date.now() - start;

    expect(result).toBe("<html>fast</html>");
    expect(elapsed).toBeLessThan(100);
  });

  it("sends a French Accept-Language header", async () => {
    mockResponse(200, "<html></html>");

    await fetchPage("https://dealer.example/page", { politeDelayMs: 0 });

    const [url, init] = (undiciFetch as ReturnType<typeof vi.fn>).mock.calls[0];
    expect(url).toBe("https://dealer.example/page");
    expect(init.headers["Accept-Language"]).toBe("fr-FR,fr;q=0.9,en;q=0.8");
  });
});

describe("fetchPage error statuses", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("throws on 403", async () => {
    mockResponse(403, "blocked");
    await expect(fetchPage("https://dealer.example/p", { politeDelayMs: 0 })).rejects.toThrow(
      "Access denied (403) for https://dealer.example/p"
    );
  });

  it("throws on other non-2xx statuses", async () => {
    mockResponse(500, "oops");
    await expect(fetchPage("https://dealer.example/p", { politeDelayMs: 0 })).rejects.toThrow(
      "HTTP 500 for https://dealer.example/p"
    );
  });

  it("does not retry", async () => {
    mockResponse(503, "busy");
    await expect(fetchPage("https://dealer.example/p", { politeDelayMs: 0 })).rejects.toThrow();
    expect(undiciFetch).toHaveBeenCalledTimes(1);
  });
});

describe("fetchDocument", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("parses the body into a document", async () => {
    mockResponse(200, "<html><body><h1>Megane</h1></body></html>");
    const $ = await fetchDocument("https://dealer.example/p", { politeDelayMs: 0 });
    expect($?.("h1").text()).toBe("Megane");
  });

  it("returns null when the fetch fails", async () => {
    mockResponse(404, "missing");
    const $ = await fetchDocument("https://dealer.example/p", { politeDelayMs: 0 });
    expect($).toBeNull();
  });

  it("returns null on network errors", async () => {
    (undiciFetch as ReturnType<typeof vi.fn>).mockRejectedValue(new Error("ECONNRESET"));
    const $ = await fetchDocument("https://dealer.example/p", { politeDelayMs: 0 });
    expect($).toBeNull();
  });
});
