/**
 * Work codes (ncodes) and the URL paths built around them.
 *
 * Grammar:
 *   code         = "n" digit{4,} letter{1,2}
 *   episode-path = "/" code "/" digit+ ["/"]
 *
 * Matching is case-insensitive; resolved codes are always lowercase.
 */

import { ResolutionError } from "./errors.js";

export const SITE_BASE_URL = "https://ncode.syosetu.com/";

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isAsciiLetter(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return ch.length === 1 && ((code >= 65 && code <= 90) || (code >= 97 && code <= 122));
}

function isDigits(value: string): boolean {
  if (value.length === 0) return false;
  for (const ch of value) {
    if (!isDigit(ch)) return false;
  }
  return true;
}

/**
 * Check whether a string is a bare work code.
 *
 * @example
 * isWorkCode('n1234ab') // true
 * isWorkCode('N9669BK') // true
 * isWorkCode('n123ab')  // false (fewer than four digits)
 */
export function isWorkCode(value: string): boolean {
  if (value.length < 6 || value[0].toLowerCase() !== "n") return false;

  let pos = 1;
  while (pos < value.length && isDigit(value[pos])) pos++;
  const digitCount = pos - 1;
  if (digitCount < 4) return false;

  const suffix = value.slice(pos);
  if (suffix.length < 1 || suffix.length > 2) return false;
  for (const ch of suffix) {
    if (!isAsciiLetter(ch)) return false;
  }
  return true;
}

/** Path part of a URL, or of a raw string that is not a URL */
function pathOf(input: string): string {
  try {
    return new URL(input).pathname;
  } catch {
    return input.split(/[?#]/, 1)[0];
  }
}

/**
 * Resolve a work URL or bare code to the canonical lowercase code.
 *
 * @throws {ResolutionError} If no path segment is a work code
 *
 * @example
 * resolveWorkCode('https://ncode.syosetu.com/N1234AB/5/') // 'n1234ab'
 * resolveWorkCode('n1234ab') // 'n1234ab'
 */
export function resolveWorkCode(input: string): string {
  const raw = input.trim();
  if (isWorkCode(raw)) {
    return raw.toLowerCase();
  }

  const segment = pathOf(raw)
    .split("/")
    .find((part) => isWorkCode(part));
  if (!segment) {
    throw new ResolutionError(input);
  }
  return segment.toLowerCase();
}

/** Canonical index (table of contents) URL of a work */
export function indexUrlFor(code: string): string {
  return `${SITE_BASE_URL}${code}/`;
}

export interface EpisodePath {
  code: string;
  episode: number;
}

/**
 * Parse an episode path such as `/n1234ab/12/`.
 * The returned code keeps the case it had in the path.
 */
export function parseEpisodePath(path: string): EpisodePath | null {
  if (!path.startsWith("/")) return null;

  const parts = path.slice(1).split("/");
  if (parts.length === 3 && parts[2] === "") {
    parts.pop();
  }
  if (parts.length !== 2) return null;

  const [code, number] = parts;
  if (!isWorkCode(code) || !isDigits(number)) return null;
  return { code, episode: parseInt(number, 10) };
}

/**
 * Episode number of a URL belonging to the given work, or null when the URL
 * is not an episode URL of that work.
 */
export function episodeNumberFromUrl(url: string, code: string): number | null {
  let path: string;
  try {
    path = new URL(url).pathname;
  } catch {
    return null;
  }
  const parsed = parseEpisodePath(path);
  if (!parsed || parsed.code.toLowerCase() !== code.toLowerCase()) return null;
  return parsed.episode;
}

/** Trailing all-digit path segment of a URL (trailing slash optional) */
export function trailingEpisodeNumber(url: string): number | null {
  const segments = pathOf(url).split("/");
  if (segments[segments.length - 1] === "") {
    segments.pop();
  }
  // The first segment precedes the leading slash and never counts.
  if (segments.length < 2) return null;
  const last = segments[segments.length - 1];
  return isDigits(last) ? parseInt(last, 10) : null;
}
