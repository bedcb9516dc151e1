/**
 * Download of a feed failed: network error, timeout or non-2xx status.
 */
export class FeedFetchError extends Error {
  constructor(
    readonly url: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "FeedFetchError";
  }
}

/**
 * The document was not well-formed XML, or not a feed format we know.
 */
export class FeedParseError extends Error {
  readonly url: string | undefined;

  constructor(
    message = "Unsupported feed format (expected RSS or Atom).",
    options?: { cause?: unknown; url?: string }
  ) {
    super(message, options);
    this.name = "FeedParseError";
    this.url = options?.url;
  }
}

/** Bad flag or environment value. Fatal at startup. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
