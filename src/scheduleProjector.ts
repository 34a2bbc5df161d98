import { DateTime } from "luxon";
import { resolveServiceLabel } from "./labels";
import { recurrenceIntervalDays } from "./recurrence";
import {
  CalendarEventDescriptor,
  ProjectionResult,
  RawServiceRecord,
  SkippedRecord,
} from "./types";

export const DEFAULT_HORIZON_WEEKS = 26;
export const DEFAULT_REMINDER_HOURS_BEFORE = 12;

const UID_DOMAIN = "bin-collection-calendar";

export interface ProjectionOptions {
  horizonWeeks?: number;
  reminderHoursBefore?: number;
}

/**
 * Reduces an API timestamp to the calendar date it names. The offset in the
 * string is kept so "2026-02-23T00:00:00+01:00" stays on the 23rd.
 */
export function toCalendarDate(raw: string | undefined): DateTime | null {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return null;
  }

  const parsed = DateTime.fromISO(trimmed, { setZone: true });
  const isoDate = parsed.isValid ? parsed.toISODate() : null;
  if (!isoDate) {
    return null;
  }
  return DateTime.fromISO(isoDate, { zone: "utc" });
}

/**
 * Identity of a service for dedup and UIDs: case and surrounding whitespace
 * are ignored, everything else distinguishes two services.
 */
export function serviceKey(serviceName: string): string {
  return serviceName.trim().toLowerCase() || "unknown";
}

export function buildEventUid(serviceName: string, isoDate: string): string {
  return `${encodeURIComponent(serviceKey(serviceName))}-${isoDate}@${UID_DOMAIN}`;
}

function describe(record: RawServiceRecord): string {
  const lines: string[] = [];
  if (record.scheduleDescription) {
    lines.push(`Schedule: ${record.scheduleDescription}`);
  }
  if (record.roundIdentifier) {
    lines.push(`Round: ${record.roundIdentifier}`);
  }
  return lines.join("\n");
}

/**
 * Expands each service's next collection into the dates it recurs on over
 * the horizon. Output follows input order, then date order within a
 * service; a (service, date) pair already emitted is never emitted again.
 */
export function projectSchedule(
  records: RawServiceRecord[],
  options: ProjectionOptions = {}
): ProjectionResult {
  const horizonWeeks = options.horizonWeeks ?? DEFAULT_HORIZON_WEEKS;
  const reminderMinutes = Math.round(
    (options.reminderHoursBefore ?? DEFAULT_REMINDER_HOURS_BEFORE) * 60
  );

  const events: CalendarEventDescriptor[] = [];
  const skipped: SkippedRecord[] = [];
  const seen = new Set<string>();

  for (const record of records) {
    const start = toCalendarDate(record.nextCollectionDate);
    if (!start) {
      skipped.push({
        serviceName: record.serviceName,
        reason: record.nextCollectionDate
          ? `unparseable next collection date "${record.nextCollectionDate}"`
          : "no next collection date",
      });
      continue;
    }

    const label = resolveServiceLabel(record.serviceName);
    const descriptionText = describe(record);
    const interval = recurrenceIntervalDays(record.recurrence);
    const end = start.plus({ weeks: horizonWeeks });

    let current = start;
    while (current.toMillis() <= end.toMillis()) {
      const isoDate = current.toFormat("yyyy-MM-dd");
      const key = `${serviceKey(record.serviceName)}\u0000${isoDate}`;

      if (!seen.has(key)) {
        seen.add(key);
        events.push({
          serviceName: record.serviceName,
          occurrenceDate: isoDate,
          label,
          descriptionText,
          uid: buildEventUid(record.serviceName, isoDate),
          reminder: {
            minutesBefore: reminderMinutes,
            description: `Tomorrow: ${label}`,
          },
        });
      }

      if (interval === null) {
        break;
      }
      current = current.plus({ days: interval });
    }
  }

  return { events, skipped };
}
