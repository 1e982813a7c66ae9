const BEGIN_EVENT = "BEGIN:VEVENT";
const END_EVENT = "END:VEVENT";

/**
 * Yields each `BEGIN:VEVENT` … `END:VEVENT` block, markers included, as one
 * `\n`-joined string. Lines outside a block are skipped and a block that is
 * still open when the input ends is dropped.
 */
export function* extractEventBlocks(lines: Iterable<string>): Generator<string, void, undefined> {
  let current: string[] | null = null;

  for (const line of lines) {
    if (line.startsWith(BEGIN_EVENT)) {
      current = [line];
    } else if (line.startsWith(END_EVENT)) {
      if (current) {
        current.push(line);
        yield current.join("\n");
      }
      current = null;
    } else if (current) {
      current.push(line);
    }
  }
}
