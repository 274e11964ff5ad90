import { z } from "zod";
import { CommentCardInput } from "../../../mcp/tools/schemas/card.js";
import { ok, type Result } from "../../../shared/Result.js";
import { toToolError } from "../../../shared/errors.js";
import { validateRequired } from "../../validation/required.js";
import { pathSegment } from "../../params.js";
import type { ActionOutput, TrelloExecutor } from "../types.js";

type InputType = z.infer<typeof CommentCardInput>;
type OutputType = ActionOutput<{ idCard: string }>;

export class CommentCard {
  constructor(private readonly gateway: TrelloExecutor) {}

  async execute(input: InputType): Promise<Result<OutputType>> {
    try {
      validateRequired(input, ["idCard", "text"]);
      const path = `/cards/${pathSegment(input.idCard)}/actions/comments`;
      const data = await this.gateway.execute("POST", path, {}, { text: input.text });
      return ok({
        action: "comment_card",
        idCard: input.idCard,
        data,
        message: `Added comment to card ${input.idCard}`
      });
    } catch (error) {
      return toToolError(error);
    }
  }
}
