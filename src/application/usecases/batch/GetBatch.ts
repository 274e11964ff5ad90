import { z } from "zod";
import { GetBatchInput, MAX_BATCH_URLS } from "../../../mcp/tools/schemas/batch.js";
import { err, ok, type Result } from "../../../shared/Result.js";
import { toToolError, ValidationError } from "../../../shared/errors.js";
import { validateRequired } from "../../validation/required.js";
import { parseUrlList, type BatchExecutor, type BatchResult } from "../../services/BatchExecutor.js";

type InputType = z.infer<typeof GetBatchInput>;

export type GetBatchOutput = BatchResult & { action: "batch_get"; message: string };

export class GetBatch {
  constructor(private readonly batch: Pick<BatchExecutor, "executeBatch">) {}

  async execute(input: InputType): Promise<Result<GetBatchOutput>> {
    try {
      validateRequired(input, ["urls"]);
      // The array form is capped by the schema; the string form only after splitting.
      const urls = typeof input.urls === "string" ? parseUrlList(input.urls) : input.urls;
      if (urls.length > MAX_BATCH_URLS) {
        throw new ValidationError(`At most ${MAX_BATCH_URLS} URLs per batch, got ${urls.length}`, {
          limit: MAX_BATCH_URLS,
          received: urls.length
        });
      }
      const result = await this.batch.executeBatch(urls);
      const message = `Batch operation completed: ${result.successful_requests}/${result.total_urls} requests successful`;
      const output: GetBatchOutput = { action: "batch_get", message, ...result };
      if (!result.successful) {
        return err("PARTIAL_FAILURE", message, output);
      }
      return ok(output);
    } catch (error) {
      return toToolError(error);
    }
  }
}
