import type { ResponseEnvelope, TrelloGateway } from "../../infrastructure/trello/TrelloGateway.js";
import { ValidationError } from "../../shared/errors.js";
import type { Logger } from "../../shared/logging.js";

export type BatchEntry = {
  url: string;
  data: ResponseEnvelope | null;
  success: boolean;
  error: string | null;
};

export type BatchResult = {
  /** True only when every URL succeeded. */
  successful: boolean;
  /** Keyed `url_1`, `url_2`, ... in request order. */
  results: Record<string, BatchEntry>;
  total_urls: number;
  successful_requests: number;
  failed_requests: number;
  /** `null` when nothing failed. */
  errors: string[] | null;
};

type BatchGateway = Pick<TrelloGateway, "execute">;

export function parseUrlList(urls: string): string[] {
  return urls
    .split(",")
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

function normaliseUrls(urls: readonly string[]): string[] {
  const trimmed = urls.map(entry => entry.trim()).filter(entry => entry.length > 0);
  if (trimmed.length === 0) {
    throw new ValidationError("No valid URLs provided");
  }
  const invalid = trimmed.filter(entry => !entry.startsWith("/"));
  if (invalid.length > 0) {
    throw new ValidationError(
      `Invalid URLs found: ${invalid.join(", ")}. All URLs must be relative paths starting with '/' (e.g. '/boards/123')`,
      { invalid }
    );
  }
  return trimmed;
}

/**
 * Runs GET requests one after another. A failed URL is recorded and the next
 * one still runs; only an empty or malformed URL list rejects the whole batch.
 */
export class BatchExecutor {
  constructor(
    private readonly gateway: BatchGateway,
    private readonly logger: Logger
  ) {}

  async executeBatch(urls: readonly string[]): Promise<BatchResult> {
    const list = normaliseUrls(urls);
    const startTime = Date.now();
    this.logger.info("batch_event", { event: "started", total: list.length });
    const results: Record<string, BatchEntry> = {};
    const errors: string[] = [];
    let successful = 0;
    for (const [index, url] of list.entries()) {
      const slot = index + 1;
      try {
        const data = await this.gateway.execute("GET", url);
        results[`url_${slot}`] = { url, data, success: true, error: null };
        successful += 1;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        results[`url_${slot}`] = { url, data: null, success: false, error: message };
        errors.push(`URL ${slot} (${url}): ${message}`);
      }
      this.logger.debug("batch_event", { event: "progress", index: slot, succeeded: successful, failed: errors.length });
    }
    this.logger.info("batch_event", {
      event: "finished",
      total: list.length,
      succeeded: successful,
      failed: errors.length,
      durationMs: Date.now() - startTime
    });
    return {
      successful: errors.length === 0,
      results,
      total_urls: list.length,
      successful_requests: successful,
      failed_requests: errors.length,
      errors: errors.length > 0 ? errors : null
    };
  }
}
