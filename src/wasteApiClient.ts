import { z } from "zod";
import { EmptyResultError, FetchError } from "./errors";
import { logger } from "./logger";

const collectionResponseSchema = z
  .object({
    value: z.array(z.unknown()),
  })
  .passthrough();

export interface WasteApiClientOptions {
  apiUrl: string;
  requestTimeoutMs: number;
  userAgent: string;
  fetchImpl?: typeof fetch;
}

export class WasteApiClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: WasteApiClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Fetches the raw collection items for one household. The UPRN goes into
   * the query string only; it is kept out of every log line and error.
   */
  async fetchCollections(uprn: string): Promise<unknown[]> {
    const url = new URL(this.options.apiUrl);
    url.searchParams.set("uprn", uprn);

    logger.info(`Fetching collection dates from ${url.origin}${url.pathname}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: {
          "User-Agent": this.options.userAgent,
          Accept: "application/json",
        },
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && error.name === "TimeoutError") {
        throw new FetchError(
          `Request timed out after ${this.options.requestTimeoutMs}ms`,
          { cause: error }
        );
      }
      throw new FetchError(
        `Request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new FetchError(
        `API responded with ${response.status} ${response.statusText}`.trim(),
        { status: response.status }
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new FetchError("API response was not valid JSON", {
        status: response.status,
        cause: error,
      });
    }

    const parsed = collectionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new FetchError("API response did not contain a \"value\" array", {
        status: response.status,
        cause: parsed.error,
      });
    }

    if (parsed.data.value.length === 0) {
      logger.debug(`Raw response: ${JSON.stringify(body).slice(0, 500)}`);
      throw new EmptyResultError(
        "No collection dates returned. The API may have changed."
      );
    }

    logger.info(`Received ${parsed.data.value.length} collection item(s)`);
    return parsed.data.value;
  }
}
