import { DateTime } from "luxon";
import { CalendarEventDescriptor, RawServiceRecord } from "./types";

export const DEFAULT_UPCOMING_LIMIT = 10;

export function sortByDate(
  events: CalendarEventDescriptor[]
): CalendarEventDescriptor[] {
  return [...events].sort((a, b) =>
    a.occurrenceDate.localeCompare(b.occurrenceDate)
  );
}

export function formatServiceList(records: RawServiceRecord[]): string {
  const names = records.map((record) => record.serviceName);
  return `Got ${records.length} service(s): ${names.join(", ") || "none"}`;
}

/**
 * One line per upcoming collection, e.g. "  Mon 23 Feb 2026  ♻️ Recycling collection".
 */
export function formatUpcoming(
  events: CalendarEventDescriptor[],
  limit: number = DEFAULT_UPCOMING_LIMIT
): string[] {
  return sortByDate(events)
    .slice(0, limit)
    .map((event) => {
      const day = DateTime.fromISO(event.occurrenceDate, {
        zone: "utc",
      }).toFormat("EEE dd MMM yyyy", { locale: "en-GB" });
      return `  ${day}  ${event.label}`;
    });
}

export function printSummary(
  records: RawServiceRecord[],
  events: CalendarEventDescriptor[],
  limit: number = DEFAULT_UPCOMING_LIMIT
): void {
  console.log(formatServiceList(records));
  console.log("\n── Upcoming collections ──────────────────────────");
  const lines = formatUpcoming(events, limit);
  if (lines.length === 0) {
    console.log("  (none)");
  }
  lines.forEach((line) => console.log(line));
  console.log();
}
