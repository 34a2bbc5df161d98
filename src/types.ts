export type Recurrence =
  | { kind: "weekly" }
  | { kind: "fortnightly" }
  | { kind: "once" }
  | { kind: "unknown"; raw: string };

export interface RawServiceRecord {
  serviceName: string;
  nextCollectionDate?: string; // As sent by the API (e.g., "2026-02-23T00:00:00+00:00")
  scheduleDescription?: string;
  roundIdentifier?: string;
  recurrence: Recurrence;
}

export interface EventReminder {
  minutesBefore: number;
  description: string;
}

export interface CalendarEventDescriptor {
  serviceName: string;
  occurrenceDate: string; // Format: "yyyy-MM-dd"
  label: string;
  descriptionText: string;
  uid: string;
  reminder: EventReminder;
}

export interface SkippedRecord {
  serviceName: string;
  reason: string;
}

export interface ProjectionResult {
  events: CalendarEventDescriptor[];
  skipped: SkippedRecord[];
}
