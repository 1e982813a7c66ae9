export const PRODUCT_ID = "-//calendar-merge//merged//EN";

/** Wraps already-serialized VEVENT blocks in a VCALENDAR, in the given order. */
export function buildCalendar(name: string, events: readonly string[]): string {
  const lines = [
    "BEGIN:VCALENDAR",
    `PRODID:${PRODUCT_ID}`,
    "VERSION:2.0",
    "CALSCALE:GREGORIAN",
    `X-WR-CALNAME:${name}`,
    "METHOD:PUBLISH",
    ...events,
    "END:VCALENDAR",
  ];
  return lines.join("\n") + "\n";
}
