import { z } from "zod";

export const GetActionInput = z
  .object({
    idAction: z.string(),
    display: z.boolean().optional(),
    entities: z.boolean().optional(),
    fields: z.string().optional(),
    member: z.boolean().optional(),
    memberFields: z.string().optional(),
    memberCreator: z.boolean().optional(),
    memberCreatorFields: z.string().optional()
  })
  .strict();
