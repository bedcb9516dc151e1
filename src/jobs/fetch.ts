import https from "https";
import axios, { type AxiosInstance } from "axios";
import { FeedFetchError } from "../lib/errors";
import { NEWS } from "./config";

export type FetchOptions = {
  timeoutMs: number;
  verifySsl: boolean;
};

const insecureAgent = new https.Agent({ rejectUnauthorized: false });

export const http: AxiosInstance = axios.create({
  headers: {
    "User-Agent": NEWS.userAgent,
    Accept:
      "application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.9, */*;q=0.8",
  },
  responseType: "arraybuffer",
});

/** charset=… from a Content-Type header, if any. */
export function charsetOf(contentType: string): string | undefined {
  const m = contentType.match(/charset\s*=\s*"?([^";\s]+)"?/i);
  return m?.[1];
}

/** Decode a body with the declared charset; unknown labels fall back to UTF-8. */
export function decodeBody(body: ArrayBuffer | Uint8Array, charset?: string): string {
  if (charset) {
    try {
      return new TextDecoder(charset).decode(body);
    } catch (e) {
      if (!(e instanceof RangeError)) throw e;
    }
  }
  return new TextDecoder("utf-8").decode(body);
}

function reasonOf(e: unknown, timeoutMs: number): string {
  if (axios.isAxiosError(e)) {
    if (e.code === "ECONNABORTED" || e.code === "ETIMEDOUT") {
      return `timed out after ${timeoutMs / 1000}s`;
    }
    if (e.response) {
      const status = e.response.status;
      return `HTTP ${status}${e.response.statusText ? ` ${e.response.statusText}` : ""}`;
    }
    return e.message;
  }
  return e instanceof Error ? e.message : String(e);
}

/**
 * Download one feed and return its text.
 * Network errors, timeouts and non-2xx statuses become FeedFetchError.
 */
export async function fetchFeed(
  url: string,
  opts: FetchOptions,
  client: AxiosInstance = http
): Promise<string> {
  try {
    const res = await client.get<ArrayBuffer>(url, {
      timeout: opts.timeoutMs,
      httpsAgent: opts.verifySsl ? undefined : insecureAgent,
    });
    const contentType = String(res.headers["content-type"] ?? "");
    return decodeBody(res.data, charsetOf(contentType));
  } catch (e) {
    throw new FeedFetchError(url, reasonOf(e, opts.timeoutMs), { cause: e });
  }
}
