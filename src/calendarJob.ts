import { AppConfig } from "./config";
import { buildCalendar } from "./calendarBuilder";
import { logger } from "./logger";
import { printSummary } from "./reporter";
import { ScheduleParser } from "./scheduleParser";
import { projectSchedule } from "./scheduleProjector";
import { CalendarStorage } from "./storageService";
import { WasteApiClient } from "./wasteApiClient";

export interface CalendarJobDeps {
  client: Pick<WasteApiClient, "fetchCollections">;
  parser: ScheduleParser;
  storage: Pick<CalendarStorage, "save">;
  now?: () => Date;
}

export interface CalendarJobResult {
  servicesRetrieved: number;
  eventsWritten: number;
  recordsSkipped: number;
  outputPath: string;
}

export function createCalendarJobDeps(config: AppConfig): CalendarJobDeps {
  return {
    client: new WasteApiClient({
      apiUrl: config.apiUrl,
      requestTimeoutMs: config.requestTimeoutMs,
      userAgent: config.userAgent,
    }),
    parser: new ScheduleParser(),
    storage: new CalendarStorage(config.outputPath),
  };
}

/**
 * Fetch → parse → project → build → save → report. Fetch failures propagate
 * before anything is written.
 */
export async function runCalendarJob(
  config: AppConfig,
  deps: CalendarJobDeps
): Promise<CalendarJobResult> {
  logger.info("Starting fetch → project → write cycle");

  const items = await deps.client.fetchCollections(config.uprn);
  const records = deps.parser.parse(items);

  const { events, skipped } = projectSchedule(records, {
    horizonWeeks: config.horizonWeeks,
    reminderHoursBefore: config.reminderHoursBefore,
  });

  skipped.forEach((record) => {
    logger.warn(`Skipping ${record.serviceName}: ${record.reason}`);
  });

  if (events.length === 0) {
    logger.warn("No collection events could be projected; writing an empty calendar");
  }

  const content = buildCalendar(events, {
    calendarName: config.calendarName,
    timezone: config.timezone,
    generatedAt: (deps.now ?? (() => new Date()))(),
  });
  await deps.storage.save(content);

  printSummary(records, events);

  logger.info(
    `Cycle complete: ${events.length} event(s) from ${records.length} service(s)`
  );

  return {
    servicesRetrieved: records.length,
    eventsWritten: events.length,
    recordsSkipped: skipped.length,
    outputPath: config.outputPath,
  };
}
