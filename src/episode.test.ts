import { describe, expect, it, vi } from "vitest";
import { loadHtml } from "./discover.js";
import { EMPTY_BODY, type ExtractOptions, extractEpisode, parseEpisodePage } from "./episode.js";
import { type FetchFn, HttpClient } from "./http.js";

const URL_12 = "https://ncode.syosetu.com/n1234ab/12/";

const ALL_ZONES: ExtractOptions = { includePreface: true, includeAfterword: true, defaultTitle: "Book Title" };

const FULL_PAGE = `<!DOCTYPE html><html><body>
  <p class="novel_subtitle"> 第一話 </p>
  <div id="novel_p"><p>前書き</p></div>
  <div id="novel_honbun"><p>本文</p></div>
  <div id="novel_a"><p>後書き</p></div>
</body></html>`;

describe("parseEpisodePage", () => {
  it("joins preface, body and afterword with a rule", () => {
    const episode = parseEpisodePage(loadHtml(FULL_PAGE), URL_12, ALL_ZONES);

    expect(episode).toEqual({
      index: 12,
      title: "第一話",
      url: URL_12,
      htmlBody: "<p>前書き</p>\n<hr/>\n<p>本文</p>\n<hr/>\n<p>後書き</p>",
    });
  });

  it("leaves out disabled zones", () => {
    const episode = parseEpisodePage(loadHtml(FULL_PAGE), URL_12, {
      ...ALL_ZONES,
      includePreface: false,
      includeAfterword: false,
    });
    expect(episode.htmlBody).toBe("<p>本文</p>");
  });

  it("keeps the zones that are present", () => {
    const page = `<div id="novel_honbun"><p id="L1">一行目</p></div><div id="novel_a"><p>後書き</p></div>`;
    const episode = parseEpisodePage(loadHtml(page), URL_12, ALL_ZONES);
    expect(episode.htmlBody).toBe('<p id="L1">一行目</p>\n<hr/>\n<p>後書き</p>');
  });

  it("substitutes a placeholder when no zone is present", () => {
    const episode = parseEpisodePage(loadHtml("<p>unrelated</p>"), URL_12, ALL_ZONES);
    expect(episode.htmlBody).toBe(EMPTY_BODY);
    expect(episode.htmlBody).toBe("<p>(no body found)</p>");
  });

  it("substitutes a placeholder when the only zone is empty", () => {
    const episode = parseEpisodePage(loadHtml('<div id="novel_honbun">  </div>'), URL_12, ALL_ZONES);
    expect(episode.htmlBody).toBe(EMPTY_BODY);
  });

  it("collapses layout whitespace inside the subtitle", () => {
    const page = `<p class="novel_subtitle">
      第二話
      <span>出会い</span>
    </p><div id="novel_honbun"><p>x</p></div>`;
    const episode = parseEpisodePage(loadHtml(page), URL_12, ALL_ZONES);
    expect(episode.title).toBe("第二話 出会い");
  });

  it("falls back to the default title", () => {
    const episode = parseEpisodePage(loadHtml('<div id="novel_honbun"><p>x</p></div>'), URL_12, ALL_ZONES);
    expect(episode.title).toBe("Book Title");
  });

  it("defaults the index to 1 when the URL has no episode number", () => {
    const episode = parseEpisodePage(loadHtml(FULL_PAGE), "https://ncode.syosetu.com/n1234ab/", ALL_ZONES);
    expect(episode.index).toBe(1);
  });

  it("returns a frozen value", () => {
    const episode = parseEpisodePage(loadHtml(FULL_PAGE), URL_12, ALL_ZONES);
    expect(Object.isFrozen(episode)).toBe(true);
  });
});

describe("extractEpisode", () => {
  it("fetches the page through the client", async () => {
    const fetch = vi.fn<FetchFn>(async () => new Response(FULL_PAGE));
    const client = new HttpClient({ delay: 0, timeout: 1000, retries: 1, fetch });

    const episode = await extractEpisode(client, URL_12, ALL_ZONES);

    expect(fetch).toHaveBeenCalledWith(URL_12, expect.any(Object));
    expect(episode.index).toBe(12);
    expect(episode.title).toBe("第一話");
  });

  it("propagates fetch failures", async () => {
    const fetch = vi.fn<FetchFn>(async () => new Response("error", { status: 500 }));
    const client = new HttpClient({ delay: 0, timeout: 1000, retries: 1, fetch });

    await expect(extractEpisode(client, URL_12, ALL_ZONES)).rejects.toMatchObject({ name: "FetchError", status: 500 });
  });
});
