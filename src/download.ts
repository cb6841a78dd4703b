/**
 * Download a Narou work and build an EPUB (personal use only)
 *
 * Usage: npm run download -- <url-or-ncode> [options]
 * Example: npm run download -- https://ncode.syosetu.com/n1234ab/ --from 1 --to 10
 *
 * Options:
 *   --out <dir>          Output directory (default: output)
 *   --delay <ms>         Minimum delay between requests (default: 1000)
 *   --timeout <ms>       Per-request timeout (default: 20000)
 *   --from <n>           First episode number to include
 *   --to <n>             Last episode number to include
 *   --retry <n>          Attempts per request (default: 3)
 *   --user-agent <ua>    User-Agent header
 *   --vertical           Vertical writing stylesheet
 *   --no-preface         Exclude prefaces
 *   --no-afterword       Exclude afterwords
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { type EpisodeCountResult, fetchEpisodeCount } from "./api.js";
import { filterByRange, loadHtml, parseEpisodeUrls, parseIndexMetadata } from "./discover.js";
import { extractEpisode } from "./episode.js";
import { buildBook, partialPath, writeEpub } from "./epub.js";
import { EmptyResultError } from "./errors.js";
import { DEFAULT_USER_AGENT, HttpClient } from "./http.js";
import { indexUrlFor, resolveWorkCode, SITE_BASE_URL } from "./ncode.js";
import type { Episode } from "./types.js";
import {
  formatDuration,
  getNumberArg,
  getOptionalNumberArg,
  getPositionalArg,
  getStringArg,
  hasFlag,
  hasHelpFlag,
  onInterrupt,
  setupSignalHandlers,
} from "./utils.js";

const DEFAULT_OUTPUT_DIR = "output";

// Default timing values (in ms)
const DEFAULT_REQUEST_DELAY = 1000;
const DEFAULT_TIMEOUT = 20000;

const DEFAULT_RETRIES = 3;

/** Prefix of the EPUB identifier, followed by the work code */
const IDENTIFIER_SOURCE = "narou";

/** Configuration options for the downloader */
export interface DownloadOptions {
  /** Work URL or bare ncode */
  input: string;
  /** Directory the EPUB is written to */
  outDir: string;
  /** Minimum delay between requests (ms) */
  delay: number;
  /** Per-request timeout (ms) */
  timeout: number;
  /** Inclusive episode bounds */
  from: number | null;
  to: number | null;
  /** Attempts per request */
  retries: number;
  userAgent: string;
  vertical: boolean;
  includePreface: boolean;
  includeAfterword: boolean;
  /** Whether to show help and exit */
  showHelp: boolean;
}

export interface DownloadResult {
  code: string;
  outFile: string;
  episodes: Episode[];
  /** Official episode count reported by the API */
  episodeCount: EpisodeCountResult;
}

/**
 * Print usage information for the download command.
 */
function showUsage(): void {
  console.log("Usage: npm run download -- <url-or-ncode> [options]");
  console.log("");
  console.log("Download a Narou work and build an EPUB (personal use only).");
  console.log("");
  console.log("Options:");
  console.log(`  --out <dir>          Output directory (default: ${DEFAULT_OUTPUT_DIR})`);
  console.log(`  --delay <ms>         Minimum delay between requests (default: ${DEFAULT_REQUEST_DELAY})`);
  console.log(`  --timeout <ms>       Per-request timeout (default: ${DEFAULT_TIMEOUT})`);
  console.log("  --from <n>           First episode number to include");
  console.log("  --to <n>             Last episode number to include");
  console.log(`  --retry <n>          Attempts per request (default: ${DEFAULT_RETRIES})`);
  console.log(`  --user-agent <ua>    User-Agent header (default: "${DEFAULT_USER_AGENT}")`);
  console.log("  --vertical           Use vertical writing");
  console.log("  --no-preface         Exclude prefaces");
  console.log("  --no-afterword       Exclude afterwords");
  console.log("  --help, -h           Show this help message");
  console.log("");
  console.log("Example:");
  console.log("  npm run download -- https://ncode.syosetu.com/n1234ab/ --from 1 --to 10 --vertical");
}

/** Flags that take values, used for positional argument detection */
const DOWNLOAD_VALUE_FLAGS = ["--out", "--delay", "--timeout", "--from", "--to", "--retry", "--user-agent"];

/**
 * Parse command line arguments for the download command.
 *
 * @param args - Command line arguments (defaults to process.argv)
 * @returns Parsed download options
 */
export function parseArgs(args: string[] = process.argv.slice(2)): DownloadOptions {
  return {
    input: getPositionalArg(args, DOWNLOAD_VALUE_FLAGS),
    outDir: getStringArg(args, "--out", DEFAULT_OUTPUT_DIR),
    delay: getNumberArg(args, "--delay", DEFAULT_REQUEST_DELAY),
    timeout: getNumberArg(args, "--timeout", DEFAULT_TIMEOUT),
    from: getOptionalNumberArg(args, "--from"),
    to: getOptionalNumberArg(args, "--to"),
    retries: getNumberArg(args, "--retry", DEFAULT_RETRIES),
    userAgent: getStringArg(args, "--user-agent", DEFAULT_USER_AGENT),
    vertical: hasFlag(args, "--vertical"),
    includePreface: !hasFlag(args, "--no-preface"),
    includeAfterword: !hasFlag(args, "--no-afterword"),
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Display a progress bar in the terminal.
 * Shows percentage, counts, and current item title.
 *
 * @param current - Current item number (1-based)
 * @param total - Total number of items
 * @param title - Title of the current item being processed
 */
export function progressBar(current: number, total: number, title: string): void {
  const barWidth = 30;
  const percent = Math.round((current / total) * 100);
  const filled = Math.round((current / total) * barWidth);
  const empty = barWidth - filled;
  const bar = "=".repeat(filled) + " ".repeat(empty);

  // Truncate title to fit in terminal
  const maxTitleLen = 40;
  const shortTitle = title.length > maxTitleLen ? `${title.slice(0, maxTitleLen - 3)}...` : title.padEnd(maxTitleLen);

  process.stdout.write(`\r[${bar}] ${percent.toString().padStart(3)}% (${current}/${total}) ${shortTitle}`);

  if (current === total) {
    process.stdout.write("\n");
  }
}

/** Path of the EPUB for a work code */
export function outputFileFor(outDir: string, code: string): string {
  return path.join(outDir, `${code}.epub`);
}

/**
 * Run the whole pipeline: resolve the work, discover and fetch its episodes
 * one at a time, then write the EPUB. Any fatal error aborts before the
 * output file is written.
 *
 * @throws {ResolutionError} If the input names no work
 * @throws {FetchError} If a request exhausts its retries
 * @throws {EmptyResultError} If the episode range selects nothing
 */
export async function downloadBook(options: DownloadOptions, client: HttpClient): Promise<DownloadResult> {
  const code = resolveWorkCode(options.input);
  const indexUrl = indexUrlFor(code);

  const episodeCount = await fetchEpisodeCount(client, code);

  console.log(`Fetching index: ${indexUrl}`);
  const $index = loadHtml(await client.get(indexUrl));
  const { title, author } = parseIndexMetadata($index, code);

  let urls = parseEpisodeUrls($index, code, SITE_BASE_URL);
  if (urls.length === 0) {
    console.log("No episode links found; treating the index page as a single episode.");
    urls = [indexUrl];
  }

  const selected = filterByRange(urls, code, { from: options.from, to: options.to });
  if (selected.length !== urls.length) {
    console.log(`Filtered ${urls.length - selected.length} episodes (${urls.length} → ${selected.length})`);
  }
  if (selected.length === 0) {
    throw new EmptyResultError();
  }

  console.log(`Found ${selected.length} episodes of "${title}". Downloading...\n`);

  const episodes: Episode[] = [];
  for (let i = 0; i < selected.length; i++) {
    const episode = await extractEpisode(client, selected[i], {
      includePreface: options.includePreface,
      includeAfterword: options.includeAfterword,
      defaultTitle: title,
    });
    episodes.push(episode);
    progressBar(i + 1, selected.length, `${episode.index}. ${episode.title}`);
  }

  const outFile = outputFileFor(options.outDir, code);
  const book = buildBook({
    identifier: `${IDENTIFIER_SOURCE}:${code}`,
    title,
    author,
    episodes,
    vertical: options.vertical,
  });
  await writeEpub(book, outFile);

  return { code, outFile, episodes, episodeCount };
}

/**
 * Main entry point for the downloader.
 *
 * @throws Exits with code 1 if no input is given or the download fails
 */
export async function main(): Promise<void> {
  const options = parseArgs();

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  if (!options.input) {
    showUsage();
    process.exit(1);
  }

  const client = new HttpClient({
    delay: options.delay,
    timeout: options.timeout,
    retries: options.retries,
    userAgent: options.userAgent,
  });

  const started = Date.now();

  try {
    const code = resolveWorkCode(options.input);
    const partial = partialPath(outputFileFor(options.outDir, code));
    onInterrupt(() => fs.rm(partial, { force: true }));

    const result = await downloadBook(options, client);

    console.log(`\nDone! Downloaded ${result.episodes.length} episodes in ${formatDuration(Date.now() - started)}.`);
    if (result.episodeCount.status === "ok") {
      console.log(`Episode count (API): ${result.episodeCount.count}`);
    } else {
      console.log(`Episode count (API): unknown (${result.episodeCount.reason})`);
    }
    console.log(`Written: ${result.outFile}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

// Only run main when executed directly (not when imported for testing)
if (import.meta.url === `file://${process.argv[1]}`) {
  setupSignalHandlers("Download");
  void main();
}
