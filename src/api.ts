/**
 * Narou novel API: official episode count of a work
 */

import type { HttpClient } from "./http.js";

export const API_ENDPOINT = "https://api.syosetu.com/novelapi/api/";

/**
 * Outcome of an episode count lookup. A lookup never fails the run;
 * `reason` tells a transport failure apart from an unexpected payload.
 */
export type EpisodeCountResult =
  | { status: "ok"; count: number }
  | { status: "unknown"; reason: "network" | "malformed" };

export function episodeCountUrl(code: string): string {
  const params = new URLSearchParams({ out: "json", ncode: code, of: "ga" });
  return `${API_ENDPOINT}?${params.toString()}`;
}

/**
 * Extract `general_all_no` from the API payload.
 * The payload is an array whose first element is a result summary and
 * whose second element is the work record.
 */
export function parseEpisodeCount(data: unknown): number | null {
  if (!Array.isArray(data) || data.length < 2) return null;
  const record: unknown = data[1];
  if (!record || typeof record !== "object" || !("general_all_no" in record)) return null;
  const value = record.general_all_no;
  return typeof value === "number" && Number.isInteger(value) ? value : null;
}

/** Look up the official number of episodes of a work */
export async function fetchEpisodeCount(client: HttpClient, code: string): Promise<EpisodeCountResult> {
  let body: string;
  try {
    body = await client.get(episodeCountUrl(code));
  } catch {
    return { status: "unknown", reason: "network" };
  }

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return { status: "unknown", reason: "malformed" };
  }

  const count = parseEpisodeCount(data);
  return count === null ? { status: "unknown", reason: "malformed" } : { status: "ok", count };
}
