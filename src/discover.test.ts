import { describe, expect, it } from "vitest";
import { filterByRange, loadHtml, parseEpisodeUrls, parseIndexMetadata } from "./discover.js";
import { indexUrlFor, SITE_BASE_URL } from "./ncode.js";

const CODE = "n1234ab";

function episodeUrl(n: number): string {
  return `https://ncode.syosetu.com/${CODE}/${n}/`;
}

function indexPage(body: string): string {
  return `<!DOCTYPE html><html><head><title>index</title></head><body>${body}</body></html>`;
}

describe("parseEpisodeUrls", () => {
  it("deduplicates and sorts episodes by number", () => {
    const $ = loadHtml(
      indexPage(`
        <a href="/n1234ab/1/">1</a>
        <a href="/n1234ab/3/">3</a>
        <a href="/n1234ab/3/">3 again</a>
        <a href="/n1234ab/2/">2</a>
      `),
    );

    expect(parseEpisodeUrls($, CODE, SITE_BASE_URL)).toEqual([
      "https://ncode.syosetu.com/n1234ab/1/",
      "https://ncode.syosetu.com/n1234ab/2/",
      "https://ncode.syosetu.com/n1234ab/3/",
    ]);
  });

  it("sorts numerically, not lexically", () => {
    const $ = loadHtml(indexPage(`<a href="/n1234ab/10/">10</a><a href="/n1234ab/9/">9</a>`));
    expect(parseEpisodeUrls($, CODE, SITE_BASE_URL)).toEqual([
      "https://ncode.syosetu.com/n1234ab/9/",
      "https://ncode.syosetu.com/n1234ab/10/",
    ]);
  });

  it("treats absolute and relative links to the same episode as one", () => {
    const $ = loadHtml(
      indexPage(`
        <a href="https://ncode.syosetu.com/n1234ab/2/">abs</a>
        <a href=" /n1234ab/2/ ">rel</a>
      `),
    );
    expect(parseEpisodeUrls($, CODE, SITE_BASE_URL)).toEqual(["https://ncode.syosetu.com/n1234ab/2/"]);
  });

  it("resolves episode paths against the base URL", () => {
    const $ = loadHtml(indexPage(`<a href="https://mirror.example.com/n1234ab/4/?from=top">4</a>`));
    expect(parseEpisodeUrls($, CODE, SITE_BASE_URL)).toEqual(["https://ncode.syosetu.com/n1234ab/4/"]);
  });

  it("matches the work code case-insensitively", () => {
    const $ = loadHtml(indexPage(`<a href="/N1234AB/5/">5</a>`));
    expect(parseEpisodeUrls($, CODE, SITE_BASE_URL)).toEqual(["https://ncode.syosetu.com/N1234AB/5/"]);
  });

  it("ignores links of other works and non-episode links", () => {
    const $ = loadHtml(
      indexPage(`
        <a href="/n9999zz/1/">other work</a>
        <a href="/n1234ab/">index</a>
        <a href="https://mypage.syosetu.com/12345/">author</a>
        <a href="/n1234ab/1/comments/">comments</a>
        <a>no href</a>
      `),
    );
    expect(parseEpisodeUrls($, CODE, SITE_BASE_URL)).toEqual([]);
  });
});

describe("parseIndexMetadata", () => {
  it("reads title and author", () => {
    const $ = loadHtml(
      indexPage(`
        <p class="novel_title"> テスト小説 </p>
        <div class="novel_writername">作者：<a href="https://mypage.syosetu.com/1/">作者名</a></div>
      `),
    );
    expect(parseIndexMetadata($, CODE)).toEqual({ title: "テスト小説", author: "作者名" });
  });

  it("falls back to the work code and an empty author", () => {
    const $ = loadHtml(indexPage("<p>nothing here</p>"));
    expect(parseIndexMetadata($, CODE)).toEqual({ title: CODE, author: "" });
  });
});

describe("filterByRange", () => {
  const urls = Array.from({ length: 10 }, (_, i) => episodeUrl(i + 1));

  it("keeps episodes within inclusive bounds", () => {
    expect(filterByRange(urls, CODE, { from: 5, to: 7 })).toEqual([
      episodeUrl(5),
      episodeUrl(6),
      episodeUrl(7),
    ]);
  });

  it("treats missing bounds as open", () => {
    expect(filterByRange(urls, CODE, { from: null, to: null })).toEqual(urls);
    expect(filterByRange(urls, CODE, { from: 9, to: null })).toEqual([episodeUrl(9), episodeUrl(10)]);
    expect(filterByRange(urls, CODE, { from: null, to: 1 })).toEqual([episodeUrl(1)]);
  });

  it("returns an empty list when nothing matches", () => {
    expect(filterByRange(urls, CODE, { from: 11, to: null })).toEqual([]);
  });

  it("counts a URL without episode number as episode 1", () => {
    const index = [indexUrlFor(CODE)];
    expect(filterByRange(index, CODE, { from: 1, to: 1 })).toEqual(index);
    expect(filterByRange(index, CODE, { from: 2, to: null })).toEqual([]);
  });
});
