import type { FetchError, FetchedSource, MergeResult, SourceResult } from "./config/schema.js";
import { extractEventBlocks } from "./ics/events.js";
import { eventIdentity, extractCalendarName, extractSortKey } from "./ics/fields.js";
import { labelSummary } from "./ics/summary.js";
import { unfoldLines } from "./ics/unfold.js";

/**
 * State for a single merge run. Identities seen in an earlier source win
 * over later copies, so sources must be added in their configured order.
 */
export class MergeContext {
  private readonly seen = new Set<string>();
  private readonly events: string[] = [];
  private readonly failures: FetchError[] = [];
  private merged = 0;
  private duplicates = 0;

  public addSource(source: FetchedSource): void {
    const label = source.label ?? extractCalendarName(source.document);

    for (const block of extractEventBlocks(unfoldLines(source.document))) {
      const identity = eventIdentity(block);
      if (this.seen.has(identity)) {
        this.duplicates++;
        continue;
      }
      this.seen.add(identity);
      this.events.push(labelSummary(block, label));
    }
    this.merged++;
  }

  public skipSource(failure: FetchError): void {
    this.failures.push(failure);
  }

  public finish(): MergeResult {
    const keyed = this.events.map((block) => ({ block, key: extractSortKey(block) }));
    // Array.prototype.sort is stable; equal keys keep merge order
    keyed.sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
    const events = keyed.map((k) => k.block);

    return {
      events,
      report: {
        eventsEmitted: events.length,
        sourcesAttempted: this.merged + this.failures.length,
        sourcesMerged: this.merged,
        sourcesSkipped: this.failures.length,
        duplicatesDropped: this.duplicates,
        failures: [...this.failures],
      },
    };
  }
}

/**
 * Merges fetched feeds into one deduplicated, labeled list of VEVENT blocks
 * sorted by DTSTART. Failed sources are skipped and listed in the report.
 */
export function mergeSources(results: readonly SourceResult[]): MergeResult {
  const context = new MergeContext();
  for (const result of results) {
    if (result.type === "FetchError") {
      context.skipSource(result);
    } else {
      context.addSource(result);
    }
  }
  return context.finish();
}
