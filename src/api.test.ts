import { describe, expect, it, vi } from "vitest";
import { episodeCountUrl, fetchEpisodeCount, parseEpisodeCount } from "./api.js";
import { type FetchFn, HttpClient } from "./http.js";

function clientReturning(fetch: FetchFn): HttpClient {
  return new HttpClient({ delay: 0, timeout: 1000, retries: 1, fetch });
}

describe("episodeCountUrl", () => {
  it("queries the novel API for the general episode count", () => {
    expect(episodeCountUrl("n1234ab")).toBe("https://api.syosetu.com/novelapi/api/?out=json&ncode=n1234ab&of=ga");
  });
});

describe("parseEpisodeCount", () => {
  it("reads general_all_no from the second element", () => {
    expect(parseEpisodeCount([{ allcount: 1 }, { general_all_no: 42 }])).toBe(42);
  });

  it("returns null for unexpected shapes", () => {
    expect(parseEpisodeCount([{ allcount: 0 }])).toBeNull();
    expect(parseEpisodeCount({ general_all_no: 42 })).toBeNull();
    expect(parseEpisodeCount([{ allcount: 1 }, null])).toBeNull();
    expect(parseEpisodeCount([{ allcount: 1 }, { general_all_no: "42" }])).toBeNull();
    expect(parseEpisodeCount([{ allcount: 1 }, { general_all_no: 1.5 }])).toBeNull();
    expect(parseEpisodeCount([{ allcount: 1 }, {}])).toBeNull();
  });
});

describe("fetchEpisodeCount", () => {
  it("reports the count", async () => {
    const fetch = vi.fn<FetchFn>(async () => new Response('[{"allcount":1},{"general_all_no":120}]'));

    await expect(fetchEpisodeCount(clientReturning(fetch), "n1234ab")).resolves.toEqual({ status: "ok", count: 120 });
    expect(fetch).toHaveBeenCalledWith(episodeCountUrl("n1234ab"), expect.any(Object));
  });

  it("reports a malformed payload", async () => {
    const invalidJson = vi.fn<FetchFn>(async () => new Response("<html>maintenance</html>"));
    const wrongShape = vi.fn<FetchFn>(async () => new Response('[{"allcount":0}]'));

    await expect(fetchEpisodeCount(clientReturning(invalidJson), "n1234ab")).resolves.toEqual({
      status: "unknown",
      reason: "malformed",
    });
    await expect(fetchEpisodeCount(clientReturning(wrongShape), "n1234ab")).resolves.toEqual({
      status: "unknown",
      reason: "malformed",
    });
  });

  it("reports a network failure instead of throwing", async () => {
    const fetch = vi.fn<FetchFn>(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(fetchEpisodeCount(clientReturning(fetch), "n1234ab")).resolves.toEqual({
      status: "unknown",
      reason: "network",
    });
  });
});
