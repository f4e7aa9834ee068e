/**
 * Token Metadata Tests
 * Link normalization and the all-NA fallback
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import {
  digestMetadata,
  fetchTokenMetadata,
  extractMetadata,
  normalizeLink,
  convertToFetchUrl,
} from "../../../src/indexer/metadata.js";

const ALL_NA = { image: "NA", twitter: "NA", telegram: "NA", website: "NA" };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function stubFetch(response: Response | Error) {
  const fetchMock = vi.fn(async () => {
    if (response instanceof Error) throw response;
    return response;
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("Token Metadata", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("fetchTokenMetadata", () => {
    it("should rewrite a twitter handle to a profile URL", async () => {
      stubFetch(jsonResponse({ twitter: "abc" }));

      const metadata = await fetchTokenMetadata("https://metadata.test.invalid/a.json");

      expect(metadata).toEqual({ ...ALL_NA, twitter: "https://twitter.com/abc" });
    });

    it("should rewrite a telegram handle and drop the leading @", async () => {
      stubFetch(jsonResponse({ telegram: "@xyz" }));

      const metadata = await fetchTokenMetadata("https://metadata.test.invalid/a.json");

      expect(metadata.telegram).toBe("https://t.me/xyz");
    });

    it("should use NA for an absent image key", async () => {
      stubFetch(jsonResponse({ website: "https://token.test.invalid" }));

      const metadata = await fetchTokenMetadata("https://metadata.test.invalid/a.json");

      expect(metadata.image).toBe("NA");
      expect(metadata.website).toBe("https://token.test.invalid");
    });

    it("should return all NA for a non-200 response", async () => {
      stubFetch(jsonResponse({ twitter: "abc", image: "https://img.test.invalid/a.png" }, 404));

      const metadata = await fetchTokenMetadata("https://metadata.test.invalid/a.json");

      expect(metadata).toEqual(ALL_NA);
    });

    it("should return all NA when the body is not JSON", async () => {
      stubFetch(new Response("<html>not json</html>", { status: 200 }));

      const metadata = await fetchTokenMetadata("https://metadata.test.invalid/a.json");

      expect(metadata).toEqual(ALL_NA);
    });

    it("should return all NA when the request fails", async () => {
      stubFetch(new Error("getaddrinfo ENOTFOUND metadata.test.invalid"));

      const metadata = await fetchTokenMetadata("https://metadata.test.invalid/a.json");

      expect(metadata).toEqual(ALL_NA);
    });

    it("should return all NA when the URI redirects to an internal host", async () => {
      stubFetch(new Response(null, { status: 302, headers: { location: "http://127.0.0.1/internal" } }));

      const metadata = await fetchTokenMetadata("https://metadata.test.invalid/a.json");

      expect(metadata).toEqual(ALL_NA);
    });

    it("should return all NA for an unsupported scheme without fetching", async () => {
      const fetchMock = stubFetch(jsonResponse({ twitter: "abc" }));

      const metadata = await fetchTokenMetadata("ftp://metadata.test.invalid/a.json");

      expect(metadata).toEqual(ALL_NA);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("should normalize every field of a full document", async () => {
      stubFetch(
        jsonResponse({
          name: "Test Token",
          image: "https://img.test.invalid/a.png",
          twitter: "https://x.com/testtoken",
          telegram: "testchat",
          website: "token.test.invalid",
        })
      );

      const metadata = await fetchTokenMetadata("https://metadata.test.invalid/a.json");

      expect(metadata).toEqual({
        image: "https://img.test.invalid/a.png",
        twitter: "https://x.com/testtoken",
        telegram: "https://t.me/testchat",
        website: "https://token.test.invalid",
      });
    });
  });

  describe("digestMetadata", () => {
    it("should return error for empty URI", async () => {
      const result = await digestMetadata("");
      expect(result).toEqual({ status: "error", error: "Empty URI" });
    });

    it("should report the HTTP status", async () => {
      stubFetch(jsonResponse({}, 503));

      const result = await digestMetadata("https://metadata.test.invalid/a.json");

      expect(result).toEqual({ status: "error", error: "HTTP 503" });
    });

    it("should report invalid_json for a JSON array body", async () => {
      stubFetch(jsonResponse(["twitter", "abc"]));

      const result = await digestMetadata("https://metadata.test.invalid/a.json");

      expect(result.status).toBe("invalid_json");
    });

    it("should report oversize bodies", async () => {
      stubFetch(jsonResponse({ description: "x".repeat(100) }));

      const result = await digestMetadata("https://metadata.test.invalid/a.json", { maxBytes: 32 });

      expect(result.status).toBe("oversize");
    });

    it("should time out a request that never answers", async () => {
      const fetchMock = vi.fn(
        (_url: string, init?: { signal?: AbortSignal | null }) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => {
              reject(Object.assign(new Error("This operation was aborted"), { name: "AbortError" }));
            });
          })
      );
      vi.stubGlobal("fetch", fetchMock);

      const result = await digestMetadata("https://metadata.test.invalid/slow.json", { timeoutMs: 20 });

      expect(result).toEqual({ status: "timeout" });
    });

    it("should block loopback and private hosts without fetching", async () => {
      const fetchMock = stubFetch(jsonResponse({}));

      expect((await digestMetadata("http://127.0.0.1:8080/a.json")).status).toBe("blocked");
      expect((await digestMetadata("http://localhost/a.json")).status).toBe("blocked");
      expect((await digestMetadata("http://169.254.169.254/latest")).status).toBe("blocked");
      expect((await digestMetadata("http://192.168.1.10/a.json")).status).toBe("blocked");
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("should refuse a redirect to a loopback host", async () => {
      const fetchMock = stubFetch(
        new Response(null, { status: 302, headers: { location: "http://127.0.0.1:8080/internal" } })
      );

      const result = await digestMetadata("https://metadata.test.invalid/token.json");

      expect(result).toEqual({ status: "blocked", error: "Redirect to internal host blocked" });
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock).toHaveBeenCalledWith(
        "https://metadata.test.invalid/token.json",
        expect.objectContaining({ redirect: "manual" })
      );
    });

    it("should refuse a redirect to the cloud metadata address", async () => {
      stubFetch(new Response(null, { status: 301, headers: { location: "http://169.254.169.254/latest/meta-data" } }));

      const result = await digestMetadata("https://metadata.test.invalid/token.json");

      expect(result.status).toBe("blocked");
    });

    it("should follow a relative redirect to an allowed host", async () => {
      const fetchMock = vi.fn(async (_url: string, _init?: { redirect?: string }) => jsonResponse({ twitter: "abc" }));
      fetchMock.mockResolvedValueOnce(new Response(null, { status: 302, headers: { location: "/v2/token.json" } }));
      vi.stubGlobal("fetch", fetchMock);

      const result = await digestMetadata("https://metadata.test.invalid/token.json");

      expect(result.status).toBe("ok");
      expect(result.document).toEqual({ twitter: "abc" });
      expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
        "https://metadata.test.invalid/token.json",
        "https://metadata.test.invalid/v2/token.json",
      ]);
    });

    it("should stop following a redirect loop", async () => {
      const fetchMock = vi.fn(
        async (_url: string) => new Response(null, { status: 302, headers: { location: "/loop" } })
      );
      vi.stubGlobal("fetch", fetchMock);

      const result = await digestMetadata("https://metadata.test.invalid/loop");

      expect(result).toEqual({ status: "error", error: "Too many redirects" });
      expect(fetchMock).toHaveBeenCalledTimes(5);
    });

    it("should report a redirect without a location", async () => {
      stubFetch(new Response(null, { status: 302 }));

      const result = await digestMetadata("https://metadata.test.invalid/token.json");

      expect(result).toEqual({ status: "error", error: "Redirect 302 without location" });
    });

    it("should fetch IPFS URIs through the gateway", async () => {
      const fetchMock = stubFetch(jsonResponse({ name: "IPFS Token" }));

      const result = await digestMetadata("ipfs://QmTest123abc");

      expect(result.status).toBe("ok");
      expect(result.document).toEqual({ name: "IPFS Token" });
      expect(fetchMock).toHaveBeenCalledWith("https://ipfs.io/ipfs/QmTest123abc", expect.any(Object));
    });
  });

  describe("convertToFetchUrl", () => {
    it("should map token URI schemes to fetchable URLs", () => {
      expect(convertToFetchUrl("ipfs://QmA")).toBe("https://ipfs.io/ipfs/QmA");
      expect(convertToFetchUrl("/ipfs/QmA")).toBe("https://ipfs.io/ipfs/QmA");
      expect(convertToFetchUrl("ar://tx-1")).toBe("https://arweave.net/tx-1");
      expect(convertToFetchUrl("https://a.test.invalid/x")).toBe("https://a.test.invalid/x");
      expect(convertToFetchUrl("data:application/json,{}")).toBeNull();
    });
  });

  describe("normalizeLink", () => {
    it("should keep values that already have an http scheme", () => {
      expect(normalizeLink("twitter", "http://twitter.com/abc")).toBe("http://twitter.com/abc");
      expect(normalizeLink("website", "https://token.test.invalid")).toBe("https://token.test.invalid");
    });

    it("should strip every leading @ from handles", () => {
      expect(normalizeLink("twitter", "@@abc")).toBe("https://twitter.com/abc");
    });

    it("should never rewrite the image", () => {
      expect(normalizeLink("image", "ipfs://QmImage")).toBe("ipfs://QmImage");
    });
  });

  describe("extractMetadata", () => {
    it("should treat non-string and blank values as absent", () => {
      const metadata = extractMetadata({ image: null, twitter: 42, telegram: "   ", website: { url: "x" } });

      expect(metadata).toEqual(ALL_NA);
    });

    it("should trim values before normalizing", () => {
      expect(extractMetadata({ website: "  token.test.invalid " }).website).toBe("https://token.test.invalid");
    });
  });
});
