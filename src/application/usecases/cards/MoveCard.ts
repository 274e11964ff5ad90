import { z } from "zod";
import { MoveCardInput } from "../../../mcp/tools/schemas/card.js";
import { ok, type Result } from "../../../shared/Result.js";
import { toToolError } from "../../../shared/errors.js";
import { validateRequired } from "../../validation/required.js";
import { pathSegment } from "../../params.js";
import type { ActionOutput, TrelloExecutor } from "../types.js";

type InputType = z.infer<typeof MoveCardInput>;
type OutputType = ActionOutput<{ idCard: string; idList: string }>;

export class MoveCard {
  constructor(private readonly gateway: TrelloExecutor) {}

  async execute(input: InputType): Promise<Result<OutputType>> {
    try {
      validateRequired(input, ["idCard", "idList"]);
      const data = await this.gateway.execute("PUT", `/cards/${pathSegment(input.idCard)}/idList`, {}, {
        value: input.idList
      });
      return ok({
        action: "move_card",
        idCard: input.idCard,
        idList: input.idList,
        data,
        message: `Moved card ${input.idCard} to list ${input.idList}`
      });
    } catch (error) {
      return toToolError(error);
    }
  }
}
