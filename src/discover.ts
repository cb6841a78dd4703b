/**
 * Episode discovery on a work's index page
 */

import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { episodeNumberFromUrl, parseEpisodePath } from "./ncode.js";
import type { EpisodeRange, WorkMeta } from "./types.js";
import { resolveUrl } from "./utils.js";

/** Sort key for URLs that carry no episode number */
const UNNUMBERED = Number.MAX_SAFE_INTEGER;

/** Parse an HTML page into a queryable tree */
export function loadHtml(html: string): CheerioAPI {
  return cheerio.load(html);
}

/** Path of an anchor target, without query or fragment */
function hrefPath(href: string, baseUrl: string): string | null {
  const resolved = resolveUrl(href, baseUrl);
  return resolved ? new URL(resolved).pathname : null;
}

/**
 * Collect the episode URLs of a work from its index page.
 * Only anchors of the form `/{code}/{n}/` for the given code count.
 * The result is deduplicated and sorted by episode number.
 *
 * @param $ - Parsed index page
 * @param code - Resolved work code
 * @param baseUrl - Base for resolving episode paths
 * @returns Absolute episode URLs, empty when the page lists no episodes
 */
export function parseEpisodeUrls($: CheerioAPI, code: string, baseUrl: string): string[] {
  const urls: string[] = [];
  const seen = new Set<string>();

  $("a[href]").each((_, el) => {
    const href = ($(el).attr("href") ?? "").trim();
    const path = hrefPath(href, baseUrl);
    if (!path) return;

    const parsed = parseEpisodePath(path);
    if (!parsed || parsed.code.toLowerCase() !== code.toLowerCase()) return;

    const url = resolveUrl(path, baseUrl);
    if (!url || seen.has(url)) return;
    seen.add(url);
    urls.push(url);
  });

  const key = (url: string) => episodeNumberFromUrl(url, code) ?? UNNUMBERED;
  return urls.sort((a, b) => key(a) - key(b));
}

/**
 * Read book title and author from the index page.
 * Falls back to the work code as title and an empty author.
 */
export function parseIndexMetadata($: CheerioAPI, code: string): WorkMeta {
  const title = $(".novel_title").first().text().trim();
  const author = $(".novel_writername a").first().text().trim();
  return { title: title || code, author };
}

/**
 * Keep URLs whose episode number lies within the inclusive range.
 * A URL without an episode number counts as episode 1.
 */
export function filterByRange(urls: string[], code: string, range: EpisodeRange): string[] {
  return urls.filter((url) => {
    const episode = episodeNumberFromUrl(url, code) ?? 1;
    if (range.from !== null && episode < range.from) return false;
    if (range.to !== null && episode > range.to) return false;
    return true;
  });
}
