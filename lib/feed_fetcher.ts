import type { Duration } from "@js-joda/core";
import type { FetchFn } from "./config/proxy-fetch.js";
import type { FetchError, SourceConfig, SourceResult } from "./config/schema.js";

export interface FetchOptions {
  timeout: Duration;
  // Extra attempts after the first one fails
  retries: number;
  userAgent: string;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });
const latin1 = new TextDecoder("latin1");

// windows-1252 characters for bytes 0x80-0x9F. The five bytes windows-1252
// leaves undefined keep their Latin-1 code point.
const WINDOWS_1252_C1 = [
  "\u20ac", "\u0081", "\u201a", "\u0192", "\u201e", "\u2026", "\u2020", "\u2021",
  "\u02c6", "\u2030", "\u0160", "\u2039", "\u0152", "\u008d", "\u017d", "\u008f",
  "\u0090", "\u2018", "\u2019", "\u201c", "\u201d", "\u2022", "\u2013", "\u2014",
  "\u02dc", "\u2122", "\u0161", "\u203a", "\u0153", "\u009d", "\u017e", "\u0178",
];

/**
 * Decodes a feed body ourselves instead of trusting the response charset:
 * strict UTF-8 first (a leading BOM is dropped), then windows-1252, which
 * accepts any byte sequence.
 *
 * Node's "windows-1252" decoder hands back 0x80-0x9F as C1 controls, so the
 * fallback decodes Latin-1 and maps that range itself.
 */
export function decodeFeed(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch {
    return latin1
      .decode(bytes)
      .replace(/[\u0080-\u009f]/g, (c) => WINDOWS_1252_C1[c.charCodeAt(0) - 0x80]);
  }
}

function invalidUrl(url: string): FetchError | undefined {
  try {
    new URL(url);
    return undefined;
  } catch {
    return { type: "FetchError", reason: `Invalid URL: ${url}`, url };
  }
}

function isRetryable(error: FetchError): boolean {
  if (error.status === undefined) return true;
  return error.status >= 500 || error.status === 408 || error.status === 429;
}

async function attemptFetch(source: SourceConfig, options: FetchOptions, fetchFn: FetchFn): Promise<SourceResult> {
  try {
    const response = await fetchFn(source.url, {
      headers: {
        "User-Agent": options.userAgent,
        Accept: "text/calendar",
      },
      signal: AbortSignal.timeout(options.timeout.toMillis()),
    });

    if (!response.ok) {
      return {
        type: "FetchError",
        reason: `HTTP ${response.status} ${response.statusText}`.trim(),
        url: source.url,
        status: response.status,
      };
    }

    const bytes = new Uint8Array(await response.arrayBuffer());
    return {
      type: "FetchedSource",
      url: source.url,
      label: source.label,
      document: decodeFeed(bytes),
    };
  } catch (error) {
    return {
      type: "FetchError",
      reason: error instanceof Error ? error.message : String(error),
      url: source.url,
    };
  }
}

/**
 * Fetches one source. Never rejects: unparseable URLs, transport errors,
 * timeouts and non-2xx responses come back as a FetchError.
 */
export async function fetchFeed(
  source: SourceConfig,
  options: FetchOptions,
  fetchFn: FetchFn = fetch
): Promise<SourceResult> {
  const badUrl = invalidUrl(source.url);
  if (badUrl) return badUrl;

  const attempts = options.retries + 1;
  let result = await attemptFetch(source, options, fetchFn);

  for (let attempt = 2; attempt <= attempts; attempt++) {
    if (result.type !== "FetchError" || !isRetryable(result)) break;
    console.log(`Retrying ${source.url} (attempt ${attempt}/${attempts}): ${result.reason}`);
    result = await attemptFetch(source, options, fetchFn);
  }

  return result;
}

/**
 * Fetches every source concurrently. Results keep the order of `sources`,
 * which the merge relies on for label and dedup precedence.
 */
export async function fetchAll(
  sources: readonly SourceConfig[],
  options: FetchOptions,
  fetchFn: FetchFn = fetch
): Promise<SourceResult[]> {
  return Promise.all(sources.map((source) => fetchFeed(source, options, fetchFn)));
}
