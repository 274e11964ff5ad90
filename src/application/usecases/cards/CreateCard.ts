import { z } from "zod";
import { CreateCardInput } from "../../../mcp/tools/schemas/card.js";
import { ok, type Result } from "../../../shared/Result.js";
import { toToolError } from "../../../shared/errors.js";
import { validateRequired } from "../../validation/required.js";
import { compactBody } from "../../params.js";
import type { ActionOutput, TrelloExecutor } from "../types.js";

type InputType = z.infer<typeof CreateCardInput>;
type OutputType = ActionOutput<{ idList: string; name: string | null }>;

export class CreateCard {
  constructor(private readonly gateway: TrelloExecutor) {}

  async execute(input: InputType): Promise<Result<OutputType>> {
    try {
      validateRequired(input, ["idList"]);
      const body = compactBody({
        idList: input.idList,
        name: input.name,
        desc: input.desc,
        pos: input.pos,
        due: input.due,
        idMembers: input.idMembers,
        idLabels: input.idLabels,
        urlSource: input.urlSource
      });
      const data = await this.gateway.execute("POST", "/cards", {}, body);
      const name = input.name ?? null;
      return ok({
        action: "create_card",
        idList: input.idList,
        name,
        data,
        message: name ? `Created card '${name}' in list ${input.idList}` : `Created card in list ${input.idList}`
      });
    } catch (error) {
      return toToolError(error);
    }
  }
}
