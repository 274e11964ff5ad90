import { z } from "zod";
import { DeleteCardInput } from "../../../mcp/tools/schemas/card.js";
import { ok, type Result } from "../../../shared/Result.js";
import { toToolError } from "../../../shared/errors.js";
import { validateRequired } from "../../validation/required.js";
import { pathSegment } from "../../params.js";
import type { ActionOutput, TrelloExecutor } from "../types.js";

type InputType = z.infer<typeof DeleteCardInput>;
type OutputType = ActionOutput<{ idCard: string }>;

export class DeleteCard {
  constructor(private readonly gateway: TrelloExecutor) {}

  async execute(input: InputType): Promise<Result<OutputType>> {
    try {
      validateRequired(input, ["idCard"]);
      const data = await this.gateway.execute("DELETE", `/cards/${pathSegment(input.idCard)}`);
      return ok({
        action: "delete_card",
        idCard: input.idCard,
        data,
        message: `Deleted card ${input.idCard}`
      });
    } catch (error) {
      return toToolError(error);
    }
  }
}
