import { writeFile } from "fs/promises";
import { loadConfig } from "./config/loader.js";
import { type FetchFn, getFetchForConfig } from "./config/proxy-fetch.js";
import type { MergeConfig, MergeReport } from "./config/schema.js";
import { fetchAll } from "./feed_fetcher.js";
import { buildCalendar } from "./ics/calendar.js";
import { mergeSources } from "./merge_engine.js";

export interface MergeRun {
  output: string;
  calendar: string;
  report: MergeReport;
}

export const runMerge = async (config: MergeConfig, fetchFn: FetchFn = getFetchForConfig(config)): Promise<MergeRun> => {
  console.log(`Fetching ${config.sources.length} calendars`);
  const results = await fetchAll(config.sources, config, fetchFn);

  for (const result of results) {
    if (result.type === "FetchError") {
      console.error(`Warning: could not fetch ${result.url}: ${result.reason}`);
    }
  }

  const { events, report } = mergeSources(results);
  const calendar = buildCalendar(config.name, events);

  await writeFile(config.output, calendar, "utf8");

  const labels = config.sources.flatMap((s) => (s.label ? [s.label] : []));
  console.log(
    `Wrote ${config.output} with ${report.eventsEmitted} events from ${report.sourcesAttempted} calendars. ` +
      `Labels: ${labels.join(", ") || "(none)"}`
  );
  if (report.duplicatesDropped > 0) {
    console.log(`Dropped ${report.duplicatesDropped} duplicate events`);
  }

  return { output: config.output, calendar, report };
};

export const main = async (argv: string[] = process.argv.slice(2)): Promise<MergeRun> => {
  const config = await loadConfig(argv);
  return runMerge(config);
};
