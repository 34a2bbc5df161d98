import { describe, it, expect } from "vitest";
import {
  buildEventUid,
  projectSchedule,
  toCalendarDate,
} from "./scheduleProjector";
import { resolveRecurrence } from "./recurrence";
import { RawServiceRecord } from "./types";

function record(
  serviceName: string,
  nextCollectionDate: string | undefined,
  scheduleDescription?: string,
  roundIdentifier?: string
): RawServiceRecord {
  const result: RawServiceRecord = {
    serviceName,
    recurrence: resolveRecurrence(scheduleDescription),
  };
  if (nextCollectionDate !== undefined) {
    result.nextCollectionDate = nextCollectionDate;
  }
  if (scheduleDescription !== undefined) {
    result.scheduleDescription = scheduleDescription;
  }
  if (roundIdentifier !== undefined) {
    result.roundIdentifier = roundIdentifier;
  }
  return result;
}

function daysBetween(a: string, b: string): number {
  return (Date.parse(b) - Date.parse(a)) / 86_400_000;
}

describe("projectSchedule", () => {
  it("projects a fortnightly service every 14 days for 26 weeks", () => {
    const { events, skipped } = projectSchedule([
      record("Recycling", "2026-02-23T00:00:00+00:00", "Monday every other week", "R12"),
    ]);

    expect(skipped).toEqual([]);
    expect(events.map((event) => event.occurrenceDate)).toEqual([
      "2026-02-23",
      "2026-03-09",
      "2026-03-23",
      "2026-04-06",
      "2026-04-20",
      "2026-05-04",
      "2026-05-18",
      "2026-06-01",
      "2026-06-15",
      "2026-06-29",
      "2026-07-13",
      "2026-07-27",
      "2026-08-10",
      "2026-08-24",
    ]);
    expect(new Set(events.map((event) => event.label))).toEqual(
      new Set(["♻️ Recycling collection"])
    );
    expect(events[0]).toEqual({
      serviceName: "Recycling",
      occurrenceDate: "2026-02-23",
      label: "♻️ Recycling collection",
      descriptionText: "Schedule: Monday every other week\nRound: R12",
      uid: "recycling-2026-02-23@bin-collection-calendar",
      reminder: {
        minutesBefore: 720,
        description: "Tomorrow: ♻️ Recycling collection",
      },
    });
  });

  it("projects a weekly service every 7 days up to and including the horizon end", () => {
    const { events } = projectSchedule([
      record("Refuse", "2026-02-23", "Monday every week"),
    ]);

    expect(events).toHaveLength(27);
    expect(events[0]?.occurrenceDate).toBe("2026-02-23");
    expect(events[26]?.occurrenceDate).toBe("2026-08-24");
    for (let i = 1; i < events.length; i++) {
      const previous = events[i - 1];
      const current = events[i];
      if (!previous || !current) {
        throw new Error("missing event");
      }
      expect(daysBetween(previous.occurrenceDate, current.occurrenceDate)).toBe(7);
    }
  });

  it("emits a single occurrence when the schedule text matches no cadence", () => {
    const { events } = projectSchedule([
      record("Garden", "2026-03-10", "Tuesday every 2 weeks"),
    ]);

    expect(events.map((event) => event.occurrenceDate)).toEqual(["2026-03-10"]);
    expect(events[0]?.label).toBe("🌿 Garden waste collection");
  });

  it("skips records without a usable date and keeps processing the rest", () => {
    const { events, skipped } = projectSchedule([
      record("Food", undefined, "Monday every week"),
      record("Garden", "next tuesday", "Tuesday every week"),
      record("Refuse", "2026-04-01"),
    ]);

    expect(events.map((event) => event.serviceName)).toEqual(["Refuse"]);
    expect(skipped).toEqual([
      { serviceName: "Food", reason: "no next collection date" },
      {
        serviceName: "Garden",
        reason: 'unparseable next collection date "next tuesday"',
      },
    ]);
  });

  it("emits one event per service and date when the API repeats a record", () => {
    const duplicate = record(
      "Recycling",
      "2026-02-23T00:00:00+00:00",
      "Monday every other week"
    );
    const { events } = projectSchedule([duplicate, { ...duplicate }]);

    expect(events).toHaveLength(14);
    const keys = events.map((event) => `${event.serviceName}|${event.occurrenceDate}`);
    expect(new Set(keys).size).toBe(keys.length);
  });

  it("never emits the same service and date twice across overlapping cadences", () => {
    const { events } = projectSchedule([
      record("Refuse", "2026-02-23", "Monday every week"),
      record("Refuse", "2026-03-09", "Monday every other week"),
      record("Food", "2026-02-23", "Monday every week"),
    ]);

    const keys = events.map((event) => `${event.serviceName}|${event.occurrenceDate}`);
    expect(new Set(keys).size).toBe(keys.length);
    // Only the fortnightly run's final date (7 Sep) falls outside the weekly run
    const refuse = events.filter((event) => event.serviceName === "Refuse");
    expect(refuse).toHaveLength(28);
    expect(refuse[27]?.occurrenceDate).toBe("2026-09-07");
    expect(events.filter((event) => event.serviceName === "Food")).toHaveLength(27);
  });

  it("gives distinct services distinct identifiers on the same date", () => {
    const { events } = projectSchedule([
      record("Скло", "2026-03-02"),
      record("Папір", "2026-03-02"),
      record("Garden Waste", "2026-03-02"),
      record("Garden-Waste", "2026-03-02"),
    ]);

    expect(events).toHaveLength(4);
    expect(new Set(events.map((event) => event.uid)).size).toBe(4);
  });

  it("treats service names differing only in case as the same service", () => {
    const { events } = projectSchedule([
      record("Recycling", "2026-03-02"),
      record("RECYCLING ", "2026-03-02"),
    ]);

    expect(events).toHaveLength(1);
    expect(events[0]?.uid).toBe("recycling-2026-03-02@bin-collection-calendar");
  });

  it("falls back to a title-cased label for unknown services", () => {
    const { events } = projectSchedule([record("TEXTILES", "2026-05-05")]);

    expect(events).toHaveLength(1);
    expect(events[0]?.label).toBe("🗑️ Textiles collection");
    expect(events[0]?.descriptionText).toBe("");
    expect(events[0]?.uid).toBe("textiles-2026-05-05@bin-collection-calendar");
  });

  it("keeps generation order instead of sorting by date", () => {
    const { events } = projectSchedule([
      record("Garden", "2026-03-10"),
      record("Food", "2026-03-01"),
    ]);

    expect(events.map((event) => event.occurrenceDate)).toEqual([
      "2026-03-10",
      "2026-03-01",
    ]);
  });

  it("produces identical identifiers on every run", () => {
    const input = [
      record("Recycling", "2026-02-23", "Monday every other week"),
      record("Food", "2026-02-24", "Tuesday every week"),
    ];

    const first = projectSchedule(input).events.map((event) => event.uid);
    const second = projectSchedule(input).events.map((event) => event.uid);

    expect(second).toEqual(first);
  });

  it("honours the horizon and reminder options", () => {
    const { events } = projectSchedule(
      [record("Food", "2026-02-24", "Tuesday every week")],
      { horizonWeeks: 4, reminderHoursBefore: 8 }
    );

    expect(events.map((event) => event.occurrenceDate)).toEqual([
      "2026-02-24",
      "2026-03-03",
      "2026-03-10",
      "2026-03-17",
      "2026-03-24",
    ]);
    expect(events[0]?.reminder.minutesBefore).toBe(480);
  });
});

describe("toCalendarDate", () => {
  it("keeps the date as written regardless of time and offset", () => {
    expect(toCalendarDate("2026-02-23T23:30:00-05:00")?.toISODate()).toBe("2026-02-23");
    expect(toCalendarDate("2026-02-23T00:00:00+01:00")?.toISODate()).toBe("2026-02-23");
    expect(toCalendarDate("2026-02-23")?.toISODate()).toBe("2026-02-23");
  });

  it("returns null for blank or invalid input", () => {
    expect(toCalendarDate(undefined)).toBeNull();
    expect(toCalendarDate("   ")).toBeNull();
    expect(toCalendarDate("2026-02-30")).toBeNull();
  });
});

describe("buildEventUid", () => {
  it("encodes the lower-cased service name", () => {
    expect(buildEventUid(" Recycling ", "2026-03-10")).toBe(
      "recycling-2026-03-10@bin-collection-calendar"
    );
    expect(buildEventUid("Garden Waste", "2026-03-10")).toBe(
      "garden%20waste-2026-03-10@bin-collection-calendar"
    );
    expect(buildEventUid("♻️", "2026-03-10")).toBe(
      "%E2%99%BB%EF%B8%8F-2026-03-10@bin-collection-calendar"
    );
    expect(buildEventUid("Скло", "2026-03-10")).toBe(
      "%D1%81%D0%BA%D0%BB%D0%BE-2026-03-10@bin-collection-calendar"
    );
  });
});
