/**
 * One logical line split into its parts: `NAME;PARAM=x;OTHER="a:b":value`.
 *
 * `head` is the raw text up to and including the separating colon, kept so a
 * line can be rewritten without disturbing its name or parameters.
 */
export interface ContentLine {
  name: string;
  params: Map<string, string>;
  value: string;
  head: string;
}

// Colons inside a quoted parameter value do not end the head
function findValueSeparator(line: string): number {
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') {
      quoted = !quoted;
    } else if (ch === ":" && !quoted) {
      return i;
    }
  }
  return -1;
}

function parseParams(paramStr: string): Map<string, string> {
  const params = new Map<string, string>();
  for (const part of paramStr.split(";")) {
    const eqIdx = part.indexOf("=");
    if (eqIdx !== -1) {
      params.set(part.substring(0, eqIdx), part.substring(eqIdx + 1));
    }
  }
  return params;
}

export function parseContentLine(line: string): ContentLine | null {
  const colonIdx = findValueSeparator(line);
  if (colonIdx === -1) return null;

  const head = line.substring(0, colonIdx + 1);
  const beforeColon = line.substring(0, colonIdx);
  const semiIdx = beforeColon.indexOf(";");
  const name = semiIdx === -1 ? beforeColon : beforeColon.substring(0, semiIdx);
  const params = semiIdx === -1 ? new Map<string, string>() : parseParams(beforeColon.substring(semiIdx + 1));

  return { name, params, value: line.substring(colonIdx + 1), head };
}

/** Finds the first content line named `name`, optionally matching `accept`. */
export function findContentLine(
  lines: Iterable<string>,
  name: string,
  accept: (line: ContentLine) => boolean = () => true
): ContentLine | undefined {
  for (const raw of lines) {
    const line = parseContentLine(raw);
    if (line && line.name === name && accept(line)) {
      return line;
    }
  }
  return undefined;
}
