import { z } from "zod";
import { logger } from "./logger";
import { resolveRecurrence } from "./recurrence";
import { RawServiceRecord } from "./types";

const collectionItemSchema = z.object({
  hso_servicename: z.string().nullish(),
  hso_nextcollection: z.string().nullish(),
  hso_scheduledescription: z.string().nullish(),
  hso_round: z.string().nullish(),
});

export type CollectionItem = z.infer<typeof collectionItemSchema>;

export class ScheduleParser {
  parse(items: unknown[]): RawServiceRecord[] {
    const records: RawServiceRecord[] = [];

    items.forEach((item, index) => {
      const result = collectionItemSchema.safeParse(item);
      if (!result.success) {
        logger.warn(
          `Skipping collection item #${index}: ${result.error.issues
            .map((issue) => `${issue.path.join(".") || "item"} ${issue.message}`)
            .join("; ")}`
        );
        return;
      }

      records.push(this.toRecord(result.data));
    });

    logger.debug(`Parsed ${records.length} of ${items.length} collection item(s)`);
    return records;
  }

  private toRecord(item: CollectionItem): RawServiceRecord {
    const scheduleDescription = item.hso_scheduledescription?.trim();
    const record: RawServiceRecord = {
      serviceName: item.hso_servicename?.trim() || "Unknown",
      recurrence: resolveRecurrence(scheduleDescription),
    };

    const nextCollectionDate = item.hso_nextcollection?.trim();
    if (nextCollectionDate) {
      record.nextCollectionDate = nextCollectionDate;
    }

    if (scheduleDescription) {
      record.scheduleDescription = scheduleDescription;
    }

    const roundIdentifier = item.hso_round?.trim();
    if (roundIdentifier) {
      record.roundIdentifier = roundIdentifier;
    }

    return record;
  }
}
