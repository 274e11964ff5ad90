import { z } from "zod";

const Id = z.string();

export const CardFilter = z.enum(["all", "closed", "none", "open", "visible"]);
export const ListFilter = z.enum(["all", "closed", "none", "open"]);

export const GetBoardInput = z
  .object({
    idBoard: Id,
    fields: z.string().optional(),
    actions: z.string().optional(),
    cards: CardFilter.optional(),
    lists: ListFilter.optional(),
    members: z.string().optional(),
    labels: z.string().optional()
  })
  .strict();

export const GetBoardListsInput = z
  .object({
    idBoard: Id,
    cards: CardFilter.optional(),
    cardFields: z.string().optional(),
    filter: ListFilter.optional(),
    fields: z.string().optional()
  })
  .strict();

export const GetBoardCardsByFilterInput = z
  .object({
    idBoard: Id,
    filter: CardFilter
  })
  .strict();

export const AddBoardListInput = z
  .object({
    idBoard: Id,
    name: z.string(),
    pos: z.union([z.enum(["top", "bottom"]), z.number().positive()]).optional()
  })
  .strict();
