export type Logger = {
  log?: (message: string) => void;
  warn?: (message: string) => void;
  error?: (message: string) => void;
};

/**
 * `verbose` also reports config loading and ignored intents.
 */
export type LoggerMode = "verbose" | "quiet";

export type ConsoleLoggerOptions = {
  mode?: LoggerMode;
  /**
   * Prefixed to every message as `[scope]`.
   */
  scope?: string;
};

/**
 * Logger for terminal front ends. Every level writes to stderr so rendered
 * pages on stdout can be piped untouched.
 */
export function createConsoleLogger({
  mode = "quiet",
  scope,
}: ConsoleLoggerOptions = {}): Logger {
  const format = (msg: string) => (scope ? `[${scope}] ${msg}` : msg);
  return {
    log: mode === "verbose" ? (msg) => console.error(format(msg)) : undefined,
    warn: (msg) => console.warn(format(msg)),
    error: (msg) => console.error(format(msg)),
  };
}
