import { parseContentLine } from "./content_line.js";
import { repairMojibake } from "./encoding.js";

const BRACKET_PREFIX = /^\[[^\]]+\]\s/;

export function applyLabel(summary: string, label?: string): string {
  if (!label) return summary;
  if (summary.startsWith(`[${label}] `) || BRACKET_PREFIX.test(summary)) {
    return summary;
  }
  return `[${label}] ${summary}`;
}

/**
 * Returns `block` with its first SUMMARY value repaired and prefixed with
 * `[label] `. A summary that already starts with any bracketed prefix keeps
 * it, so merging a merged feed does not stack labels.
 */
export function labelSummary(block: string, label?: string): string {
  const lines = block.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const line = parseContentLine(lines[i]);
    if (line?.name !== "SUMMARY") continue;

    lines[i] = line.head + applyLabel(repairMojibake(line.value), label);
    return lines.join("\n");
  }
  return block;
}
