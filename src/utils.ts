/**
 * Utility functions for the downloader
 * Extracted for testability
 */

/** Callback for cleanup actions when process is interrupted */
type CleanupCallback = () => void | Promise<void>;

/** Registered cleanup callbacks for SIGINT handling */
const cleanupCallbacks: CleanupCallback[] = [];

/** Flag to prevent multiple SIGINT handlers from running */
let isExiting = false;

/**
 * Register a cleanup callback to be called when the process receives SIGINT.
 * Multiple callbacks can be registered and will be called in order.
 *
 * @param callback - Async or sync function to call during cleanup
 */
export function onInterrupt(callback: CleanupCallback): void {
  cleanupCallbacks.push(callback);
}

/**
 * Run registered cleanup callbacks in order.
 * A failing callback is reported and does not stop the others.
 */
export async function runCleanup(): Promise<void> {
  for (const callback of cleanupCallbacks) {
    try {
      await callback();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Cleanup failed: ${message}`);
    }
  }
}

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Displays a clean message instead of a stack trace when interrupted.
 * Should be called once at the start of the main entry point.
 *
 * @param commandName - Name of the command for the exit message (e.g., "Download")
 */
export function setupSignalHandlers(commandName: string): void {
  const handler = async (signal: NodeJS.Signals) => {
    if (isExiting) return;
    isExiting = true;

    console.log(`\n${commandName} interrupted.`);
    await runCleanup();

    // 128 + signal number: SIGINT = 2, SIGTERM = 15
    process.exit(signal === "SIGINT" ? 130 : 143);
  };

  process.on("SIGINT", (signal) => void handler(signal));
  process.on("SIGTERM", (signal) => void handler(signal));
}

/**
 * Format duration in milliseconds to human-readable string
 *
 * @example
 * formatDuration(4500)  // '4s'
 * formatDuration(95000) // '1m 35s'
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

/**
 * Resolve a possibly relative href against a base URL.
 *
 * @returns Absolute URL, or null if either part is not a valid URL
 *
 * @example
 * resolveUrl('/n1234ab/1/', 'https://ncode.syosetu.com/') // 'https://ncode.syosetu.com/n1234ab/1/'
 */
export function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).href;
  } catch {
    return null;
  }
}

/** Escape text for use in XML content and attribute values */
export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** ISO timestamp without milliseconds, as EPUB `dcterms:modified` expects */
export function isoDateTime(date: Date = new Date()): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/**
 * Check if help flag is present in arguments.
 *
 * @param args - Command line arguments array
 * @returns True if --help or -h is present
 */
export function hasHelpFlag(args: string[]): boolean {
  return args.includes("--help") || args.includes("-h");
}

/**
 * Check if a boolean flag is present in arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--vertical')
 */
export function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

/**
 * Get a string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--out')
 * @param defaultValue - Default value if flag not found
 * @returns The argument value or default
 */
export function getStringArg(args: string[], flag: string, defaultValue: string): string {
  let result = defaultValue;
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1] && !args[i + 1].startsWith("--")) {
      result = args[i + 1];
    }
  }
  return result;
}

/**
 * Get a number argument value from command line arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--delay')
 * @param defaultValue - Default value if flag not found
 * @returns The parsed number or default
 */
export function getNumberArg(args: string[], flag: string, defaultValue: number): number {
  return getOptionalNumberArg(args, flag) ?? defaultValue;
}

/**
 * Get a number argument value that has no default.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--from')
 * @returns The parsed number, or null if the flag is missing or not numeric
 */
export function getOptionalNumberArg(args: string[], flag: string): number | null {
  for (let i = 0; i < args.length; i++) {
    if (args[i] === flag && args[i + 1]) {
      const parsed = parseInt(args[i + 1], 10);
      if (!isNaN(parsed)) {
        return parsed;
      }
    }
  }
  return null;
}

/**
 * Get the first positional (non-flag) argument.
 * Skips values that follow flags (e.g., in '--delay 1000', skips '1000').
 *
 * @param args - Command line arguments array
 * @param knownFlags - Flags that take values (to skip their values)
 * @returns The first non-flag argument or empty string
 */
export function getPositionalArg(args: string[], knownFlags: string[] = []): string {
  let skipNext = false;
  for (const arg of args) {
    if (skipNext) {
      skipNext = false;
      continue;
    }
    if (knownFlags.includes(arg)) {
      skipNext = true;
      continue;
    }
    if (!arg.startsWith("--") && !arg.startsWith("-")) {
      return arg;
    }
  }
  return "";
}
