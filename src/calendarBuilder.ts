import { DateTime, Duration } from "luxon";
import { CalendarEventDescriptor } from "./types";

const PRODUCT_ID = "-//Bin Collection Calendar//EN";
const MAX_LINE_OCTETS = 75;

export interface CalendarOptions {
  calendarName: string;
  timezone: string;
  generatedAt?: Date;
}

/**
 * Escape text for iCalendar format
 */
export function escapeICalText(text: string): string {
  return text
    .replace(/\\/g, "\\\\")
    .replace(/;/g, "\\;")
    .replace(/,/g, "\\,")
    .replace(/\r?\n/g, "\\n");
}

/**
 * Folds a content line into 75-octet chunks, continuation lines starting
 * with a single space. Multi-byte characters are never split.
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, "utf8") <= MAX_LINE_OCTETS) {
    return line;
  }

  const chunks: string[] = [];
  let current = "";
  let currentOctets = 0;
  // The leading space counts toward the limit on continuation lines
  let limit = MAX_LINE_OCTETS;

  for (const char of line) {
    const octets = Buffer.byteLength(char, "utf8");
    if (currentOctets + octets > limit) {
      chunks.push(current);
      current = "";
      currentOctets = 0;
      limit = MAX_LINE_OCTETS - 1;
    }
    current += char;
    currentOctets += octets;
  }
  chunks.push(current);

  return chunks.join("\r\n ");
}

function formatTrigger(minutesBefore: number): string {
  const duration = Duration.fromObject({ minutes: minutesBefore }).shiftTo(
    "hours",
    "minutes"
  );
  return `-${duration.toISO() ?? "PT0S"}`;
}

function renderEvent(event: CalendarEventDescriptor, stamp: string): string[] {
  const start = DateTime.fromISO(event.occurrenceDate, { zone: "utc" });
  const lines = [
    "BEGIN:VEVENT",
    `UID:${event.uid}`,
    `DTSTAMP:${stamp}`,
    `DTSTART;VALUE=DATE:${start.toFormat("yyyyMMdd")}`,
    `DTEND;VALUE=DATE:${start.plus({ days: 1 }).toFormat("yyyyMMdd")}`,
    `SUMMARY:${escapeICalText(event.label)}`,
  ];

  if (event.descriptionText) {
    lines.push(`DESCRIPTION:${escapeICalText(event.descriptionText)}`);
  }

  lines.push(
    "TRANSP:TRANSPARENT",
    "BEGIN:VALARM",
    "ACTION:DISPLAY",
    `DESCRIPTION:${escapeICalText(event.reminder.description)}`,
    `TRIGGER:${formatTrigger(event.reminder.minutesBefore)}`,
    "END:VALARM",
    "END:VEVENT"
  );

  return lines;
}

/**
 * Renders the projected collections as an all-day iCalendar feed, one
 * VEVENT per collection ordered by date.
 */
export function buildCalendar(
  events: CalendarEventDescriptor[],
  options: CalendarOptions
): string {
  const stamp = DateTime.fromJSDate(options.generatedAt ?? new Date())
    .toUTC()
    .toFormat("yyyyMMdd'T'HHmmss'Z'");

  const lines: string[] = [
    "BEGIN:VCALENDAR",
    "VERSION:2.0",
    `PRODID:${PRODUCT_ID}`,
    "CALSCALE:GREGORIAN",
    "METHOD:PUBLISH",
    `X-WR-CALNAME:${escapeICalText(options.calendarName)}`,
    `X-WR-TIMEZONE:${options.timezone}`,
    "REFRESH-INTERVAL;VALUE=DURATION:P1D",
    "X-PUBLISHED-TTL:P1D",
  ];

  // Array.prototype.sort is stable, so same-day events keep generation order
  const ordered = [...events].sort((a, b) =>
    a.occurrenceDate.localeCompare(b.occurrenceDate)
  );

  for (const event of ordered) {
    lines.push(...renderEvent(event, stamp));
  }

  lines.push("END:VCALENDAR");

  return lines.map(foldLine).join("\r\n") + "\r\n";
}
