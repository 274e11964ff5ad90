import type { ResponseEnvelope, TrelloGateway } from "../../infrastructure/trello/TrelloGateway.js";

export type TrelloExecutor = Pick<TrelloGateway, "execute">;

/** Descriptive envelope every Trello tool returns on success. */
export type ActionOutput<TExtra extends object = object> = {
  action: string;
  message: string;
  data: ResponseEnvelope;
} & TExtra;
