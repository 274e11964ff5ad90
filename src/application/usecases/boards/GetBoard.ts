import { z } from "zod";
import { GetBoardInput } from "../../../mcp/tools/schemas/board.js";
import { ok, type Result } from "../../../shared/Result.js";
import { toToolError } from "../../../shared/errors.js";
import { validateRequired } from "../../validation/required.js";
import { compactParams, pathSegment } from "../../params.js";
import type { ActionOutput, TrelloExecutor } from "../types.js";

type InputType = z.infer<typeof GetBoardInput>;
type OutputType = ActionOutput<{ idBoard: string }>;

export class GetBoard {
  constructor(private readonly gateway: TrelloExecutor) {}

  async execute(input: InputType): Promise<Result<OutputType>> {
    try {
      validateRequired(input, ["idBoard"]);
      const query = compactParams({
        fields: input.fields,
        actions: input.actions,
        cards: input.cards,
        lists: input.lists,
        members: input.members,
        labels: input.labels
      });
      const data = await this.gateway.execute("GET", `/boards/${pathSegment(input.idBoard)}`, query);
      return ok({
        action: "get_board",
        idBoard: input.idBoard,
        data,
        message: `Successfully retrieved board ${input.idBoard}`
      });
    } catch (error) {
      return toToolError(error);
    }
  }
}
