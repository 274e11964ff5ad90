import { z } from "zod";

const Id = z.string();

export const Position = z.union([z.enum(["top", "bottom"]), z.number().positive()]);

export const CreateCardInput = z
  .object({
    idList: Id,
    name: z.string().optional(),
    desc: z.string().optional(),
    pos: Position.optional(),
    due: z.string().optional(),
    idMembers: z.array(z.string()).max(50).optional(),
    idLabels: z.array(z.string()).max(50).optional(),
    urlSource: z.string().url().optional()
  })
  .strict();

export const CardField = z.enum([
  "badges",
  "closed",
  "dateLastActivity",
  "desc",
  "due",
  "dueComplete",
  "idBoard",
  "idList",
  "idLabels",
  "idMembers",
  "labels",
  "name",
  "pos",
  "shortUrl",
  "url"
]);

export const GetCardFieldInput = z
  .object({
    idCard: Id,
    field: CardField
  })
  .strict();

export const MoveCardInput = z
  .object({
    idCard: Id,
    idList: Id
  })
  .strict();

export const CommentCardInput = z
  .object({
    idCard: Id,
    text: z.string().max(16384)
  })
  .strict();

export const AttachToCardInput = z
  .object({
    idCard: Id,
    filePath: z.string().optional(),
    url: z.string().url().optional(),
    name: z.string().max(256).optional(),
    mimeType: z.string().max(256).optional(),
    setCover: z.boolean().optional()
  })
  .strict();

export const DeleteCardInput = z
  .object({
    idCard: Id
  })
  .strict();
