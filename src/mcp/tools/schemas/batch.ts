import { z } from "zod";

export const MAX_BATCH_URLS = 100;

export const GetBatchInput = z
  .object({
    urls: z.union([z.string(), z.array(z.string()).max(MAX_BATCH_URLS)])
  })
  .strict();
