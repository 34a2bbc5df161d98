import fs from "fs-extra";
import path from "path";
import { logger } from "./logger";

export class CalendarStorage {
  constructor(private readonly outputPath: string) {}

  async save(content: string): Promise<void> {
    await fs.ensureDir(path.dirname(this.outputPath));
    // Regenerated from scratch on every run, never merged
    await fs.writeFile(this.outputPath, content, "utf8");
    logger.info(
      `Saved calendar (${Buffer.byteLength(content, "utf8")} bytes) to ${this.outputPath}`
    );
  }
}
