import { createHash } from "crypto";
import { findContentLine } from "./content_line.js";
import { unfoldLines } from "./unfold.js";

/** Sort key for events without DTSTART, so they land after everything else. */
export const UNDATED_SORT_KEY = "99999999T000000Z";

const TIMESTAMP_PREFIX = /^[0-9TZW+-]+/;

function blockLines(block: string): string[] {
  return block.split("\n");
}

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function extractUid(block: string): string | undefined {
  return nonBlank(findContentLine(blockLines(block), "UID")?.value);
}

export function extractSortKey(block: string): string {
  const line = findContentLine(blockLines(block), "DTSTART", (l) => TIMESTAMP_PREFIX.test(l.value));
  const match = line?.value.match(TIMESTAMP_PREFIX);
  return match ? match[0] : UNDATED_SORT_KEY;
}

/**
 * The feed's own name: X-WR-CALNAME, or PRODID when the feed has no
 * X-WR-CALNAME line. A blank X-WR-CALNAME means the feed has no name.
 */
export function extractCalendarName(document: string): string | undefined {
  const lines = unfoldLines(document);
  const displayName = findContentLine(lines, "X-WR-CALNAME");
  if (displayName) return nonBlank(displayName.value);
  return nonBlank(findContentLine(lines, "PRODID")?.value);
}

/**
 * The dedup key of a block. Blocks without a UID are keyed by a hash of
 * their text, so identical UID-less copies still collapse into one.
 */
export function eventIdentity(block: string): string {
  const uid = extractUid(block);
  if (uid !== undefined) return uid;
  const digest = createHash("sha256").update(block, "utf8").digest("hex");
  return `NOUID-${digest.slice(0, 16)}`;
}
