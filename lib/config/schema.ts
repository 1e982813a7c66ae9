import { Duration } from "@js-joda/core";
import { z } from "zod";

export const DEFAULT_CALENDAR_NAME = "Merged Calendar";
export const DEFAULT_OUTPUT = "combined.ics";

// URLs are only checked for presence here. One unparseable entry must not
// take the other sources down, so the fetcher reports it as a skipped source.
export const sourceConfigSchema = z.object({
    url: z.string().trim().min(1),
    label: z.string().trim().min(1).optional(),
});

export const mergeConfigSchema = z.object({
    name: z.string().default(DEFAULT_CALENDAR_NAME),
    output: z.string().min(1).default(DEFAULT_OUTPUT),
    sources: z.array(sourceConfigSchema).min(1, { message: "At least one source URL is required" }),
    // We use refine to provide our own error message
    // and Transform to parse it into a Duration
    timeout: z.string().refine(d => {
        try {
            Duration.parse(d);
            return true;
        }
        catch (e) { return false; }
    }, { message: "Must parse as valid ISO-8601 duration. e.g. PT45S" }).default("PT45S").transform(d => Duration.parse(d)),
    retries: z.number().int().min(0).default(0),
    userAgent: z.string().default("calendar-merge/1.0"),
    proxy: z.boolean().default(false),
}).strict();

export type SourceConfig = z.infer<typeof sourceConfigSchema>;
export type MergeConfig = z.infer<typeof mergeConfigSchema>;
export type MergeConfigInput = z.input<typeof mergeConfigSchema>;

export type MergeError = FetchError | ConfigError;
type ErrorBase = { type: string, reason: string; };

export type FetchError = ErrorBase & {
    type: "FetchError",
    url: string,
    status?: number
};

export type ConfigError = ErrorBase & {
    type: "ConfigError",
    path?: string
};

export interface FetchedSource {
    type: "FetchedSource";
    url: string;
    label?: string;
    document: string;
}

// What the fetcher hands to the merge engine, one entry per configured source
export type SourceResult = FetchedSource | FetchError;

export interface MergeReport {
    eventsEmitted: number;
    sourcesAttempted: number;
    sourcesMerged: number;
    sourcesSkipped: number;
    duplicatesDropped: number;
    failures: FetchError[];
}

export interface MergeResult {
    events: string[];
    report: MergeReport;
}

export function isMergeError(item: unknown): item is MergeError {
    if (typeof item !== "object" || item === null) {
        return false;
    }

    const maybeError = item as Partial<ErrorBase>;
    return (maybeError.type === "FetchError" || maybeError.type === "ConfigError") &&
        typeof maybeError.reason === "string";
}

export class ConfigLoadError extends Error {
    constructor(readonly error: ConfigError) {
        super(error.path ? `${error.reason} (${error.path})` : error.reason);
        this.name = "ConfigLoadError";
    }
}
