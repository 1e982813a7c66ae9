import { readFile } from 'fs/promises';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigLoadError, type MergeConfig, type MergeConfigInput, type SourceConfig, mergeConfigSchema } from './schema.js';

type Env = Record<string, string | undefined>;

// One entry per non-blank line, the way ICS_URLS and CAL_LABELS are written
export function splitLines(blob: string | undefined): string[] {
    if (!blob) return [];
    return blob.split(/\r?\n/).map(l => l.trim()).filter(l => l.length > 0);
}

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)
        .join("; ");
}

export function parseMergeConfig(input: unknown, path?: string): MergeConfig {
    const result = mergeConfigSchema.safeParse(input);
    if (!result.success) {
        throw new ConfigLoadError({
            type: "ConfigError",
            reason: `Invalid configuration: ${describeIssues(result.error)}`,
            path
        });
    }
    return result.data;
}

/**
 * Reads the configuration from ICS_URLS, CAL_LABELS, MERGE_NAME, OUT_ICS,
 * FETCH_TIMEOUT, FETCH_RETRIES and FETCH_PROXY.
 *
 * Labels pair with URLs by position; URLs past the last label get none.
 */
export function loadConfigFromEnv(env: Env = process.env): MergeConfig {
    const urls = splitLines(env.ICS_URLS);
    if (urls.length === 0) {
        throw new ConfigLoadError({
            type: "ConfigError",
            reason: "ICS_URLS is not set (one iCal URL per line)"
        });
    }
    const labels = splitLines(env.CAL_LABELS);

    const sources: SourceConfig[] = urls.map((url, idx) => (
        idx < labels.length ? { url, label: labels[idx] } : { url }
    ));

    const input: MergeConfigInput = {
        sources,
        name: env.MERGE_NAME || undefined,
        output: env.OUT_ICS || undefined,
        timeout: env.FETCH_TIMEOUT || undefined,
        retries: env.FETCH_RETRIES ? Number(env.FETCH_RETRIES) : undefined,
        proxy: env.FETCH_PROXY ? ["true", "1"].includes(env.FETCH_PROXY.toLowerCase()) : undefined,
    };
    return parseMergeConfig(input);
}

export async function loadConfigFromFile(path: string): Promise<MergeConfig> {
    let contents: string;
    try {
        contents = await readFile(path, "utf8");
    } catch (e) {
        throw new ConfigLoadError({
            type: "ConfigError",
            reason: `Could not read config file: ${e instanceof Error ? e.message : String(e)}`,
            path
        });
    }

    let parsed: unknown;
    try {
        parsed = YAML.parse(contents);
    } catch (e) {
        throw new ConfigLoadError({
            type: "ConfigError",
            reason: `Config file is not valid YAML: ${e instanceof Error ? e.message : String(e)}`,
            path
        });
    }
    return parseMergeConfig(parsed, path);
}

// A config file path on the command line wins over the environment
export async function loadConfig(argv: string[], env: Env = process.env): Promise<MergeConfig> {
    const configPath = argv[0];
    return configPath ? loadConfigFromFile(configPath) : loadConfigFromEnv(env);
}
