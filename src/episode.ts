/**
 * Episode page extraction
 */

import type { CheerioAPI } from "cheerio";
import { loadHtml } from "./discover.js";
import type { HttpClient } from "./http.js";
import { trailingEpisodeNumber } from "./ncode.js";
import type { Episode } from "./types.js";

export const SUBTITLE_SELECTOR = ".novel_subtitle";

/** Content zones of an episode page, in reading order */
export const ZONE_SELECTORS = {
  preface: "#novel_p",
  body: "#novel_honbun",
  afterword: "#novel_a",
} as const;

export const ZONE_SEPARATOR = "\n<hr/>\n";

/** Substituted when a page has none of the enabled zones */
export const EMPTY_BODY = "<p>(no body found)</p>";

export interface ExtractOptions {
  includePreface: boolean;
  includeAfterword: boolean;
  /** Used when the page has no subtitle (normally the book title) */
  defaultTitle: string;
}

/**
 * Build an Episode from an already parsed episode page.
 *
 * @param $ - Parsed episode page
 * @param url - URL the page was fetched from
 */
export function parseEpisodePage($: CheerioAPI, url: string, options: ExtractOptions): Episode {
  const subtitle = $(SUBTITLE_SELECTOR).first();
  // Subtitles may span several lines of markup
  const title = subtitle.length > 0 ? subtitle.text().replace(/\s+/g, " ").trim() : options.defaultTitle;

  const zones: string[] = [];
  if (options.includePreface) zones.push(ZONE_SELECTORS.preface);
  zones.push(ZONE_SELECTORS.body);
  if (options.includeAfterword) zones.push(ZONE_SELECTORS.afterword);

  const parts: string[] = [];
  for (const selector of zones) {
    const markup = $(selector).first().html();
    if (markup && markup.trim()) parts.push(markup);
  }

  return Object.freeze({
    index: trailingEpisodeNumber(url) ?? 1,
    title,
    url,
    htmlBody: parts.length > 0 ? parts.join(ZONE_SEPARATOR) : EMPTY_BODY,
  });
}

/**
 * Fetch one episode page and extract its title and content zones.
 * Retries are left to the client.
 */
export async function extractEpisode(client: HttpClient, url: string, options: ExtractOptions): Promise<Episode> {
  const html = await client.get(url);
  return parseEpisodePage(loadHtml(html), url, options);
}
