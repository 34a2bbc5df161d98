import { Recurrence } from "./types";

/**
 * Resolves a free-text schedule such as "Monday every other week" into a
 * cadence. Only weekly and fortnightly rounds are recognised; anything else
 * is collected once on the next collection date.
 */
export function resolveRecurrence(description?: string): Recurrence {
  const text = description?.trim() ?? "";
  if (!text) {
    return { kind: "once" };
  }

  const normalized = text.toLowerCase();
  if (normalized.includes("every other week")) {
    return { kind: "fortnightly" };
  }
  if (normalized.includes("every week")) {
    return { kind: "weekly" };
  }

  return { kind: "unknown", raw: text };
}

export function recurrenceIntervalDays(recurrence: Recurrence): number | null {
  switch (recurrence.kind) {
    case "weekly":
      return 7;
    case "fortnightly":
      return 14;
    case "once":
    case "unknown":
      return null;
  }
}
