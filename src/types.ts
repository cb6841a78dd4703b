/**
 * Shared type definitions for the downloader
 */

/** One fetched episode of a work */
export interface Episode {
  /** Episode number embedded in the URL path (1 when the URL carries none) */
  readonly index: number;
  /** Episode subtitle, or the book title when the page has none */
  readonly title: string;
  /** Absolute URL the episode was fetched from */
  readonly url: string;
  /** Joined zone markup, never empty */
  readonly htmlBody: string;
}

/** Book-level metadata read from the index page */
export interface WorkMeta {
  title: string;
  /** Empty when the index page names no author */
  author: string;
}

/** Inclusive episode-number bounds; a missing bound is open */
export interface EpisodeRange {
  from: number | null;
  to: number | null;
}
