import { z } from "zod";
import { GetCardFieldInput } from "../../../mcp/tools/schemas/card.js";
import { ok, type Result } from "../../../shared/Result.js";
import { toToolError } from "../../../shared/errors.js";
import { validateRequired } from "../../validation/required.js";
import { pathSegment } from "../../params.js";
import type { ActionOutput, TrelloExecutor } from "../types.js";

type InputType = z.infer<typeof GetCardFieldInput>;
type OutputType = ActionOutput<{ idCard: string; field: string }>;

export class GetCardField {
  constructor(private readonly gateway: TrelloExecutor) {}

  async execute(input: InputType): Promise<Result<OutputType>> {
    try {
      validateRequired(input, ["idCard", "field"]);
      const data = await this.gateway.execute("GET", `/cards/${pathSegment(input.idCard)}/${input.field}`);
      return ok({
        action: "get_card_field",
        idCard: input.idCard,
        field: input.field,
        data,
        message: `Retrieved field '${input.field}' of card ${input.idCard}`
      });
    } catch (error) {
      return toToolError(error);
    }
  }
}
