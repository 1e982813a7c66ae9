const MAX_LINE_LENGTH = 75;

/**
 * Reverses RFC 5545 line folding. A physical line that starts with a space
 * continues the previous logical line; the space itself is dropped.
 */
export function unfoldLines(text: string): string[] {
  const physical = text.split(/\r\n|\r|\n/);
  // A final line terminator leaves an empty tail that is not a line
  if (physical.length > 0 && physical[physical.length - 1] === "") {
    physical.pop();
  }

  const logical: string[] = [];
  for (const line of physical) {
    if (line.startsWith(" ") && logical.length > 0) {
      logical[logical.length - 1] += line.substring(1);
    } else {
      logical.push(line);
    }
  }
  return logical;
}

/**
 * Folds one logical line into physical lines of at most `width` characters,
 * continuation lines prefixed with a space.
 *
 * Width counts code points, not the octets RFC 5545 limits, so a line with
 * non-ASCII text can exceed 75 octets. Surrogate pairs are never split.
 */
export function foldLine(line: string, width = MAX_LINE_LENGTH): string {
  if (width < 2) {
    throw new Error(`Fold width must be at least 2, got ${width}`);
  }
  const chars = Array.from(line);
  if (chars.length <= width) return line;

  const result: string[] = [chars.slice(0, width).join("")];
  for (let i = width; i < chars.length; i += width - 1) {
    result.push(" " + chars.slice(i, i + width - 1).join(""));
  }

  return result.join("\r\n");
}
