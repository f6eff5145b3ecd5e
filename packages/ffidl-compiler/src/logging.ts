// Debug logging for the compiler.
//
// Namespaces are enabled by the DEBUG environment variable with the same
// pattern syntax as npm's debug package: `ffidl:*`, `ffidl:driver`,
// `*,-ffidl:writer`.

export interface LoggingOptions {
  /**
   * Pattern list to match namespaces against. Defaults to `process.env.DEBUG`
   * read at each call, so tests and callers can toggle logging at runtime.
   */
  debug?: string;

  /** Sink for enabled log lines. Defaults to `console.error`. */
  sink?: (message: string, data: Record<string, unknown>) => void;
}

/** Logs `message` with structured `data` when the logger's namespace is enabled. */
export type Logger = (message: string, data?: Record<string, unknown>) => void;

/**
 * Match a namespace against a pattern with wildcard support.
 */
export function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Check if a namespace is enabled by a debug pattern list.
 * Later patterns win, so `-` exclusions apply to the inclusions before them.
 */
export function isEnabled(namespace: string, debug: string | undefined): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Create a logger for `namespace`.
 *
 * Diagnostics go to stderr so that they never mix with generated output.
 *
 * @example
 * ```typescript
 * const log = createLogger("ffidl:driver");
 * log("generated", { target: "rust", files: 2 });
 * // DEBUG=ffidl:* prints: ffidl:driver generated { target: 'rust', files: 2 }
 * ```
 */
export function createLogger(namespace: string, options: LoggingOptions = {}): Logger {
  const sink = options.sink ?? ((message, data) => console.error(message, data));

  return (message, data = {}) => {
    if (!isEnabled(namespace, options.debug ?? process.env.DEBUG)) return;
    sink(`${namespace} ${message}`, data);
  };
}
