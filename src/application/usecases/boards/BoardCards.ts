import { z } from "zod";
import { GetBoardCardsByFilterInput } from "../../../mcp/tools/schemas/board.js";
import { ok, type Result } from "../../../shared/Result.js";
import { toToolError } from "../../../shared/errors.js";
import { validateRequired } from "../../validation/required.js";
import { pathSegment } from "../../params.js";
import type { ActionOutput, TrelloExecutor } from "../types.js";

type InputType = z.infer<typeof GetBoardCardsByFilterInput>;
type OutputType = ActionOutput<{ idBoard: string; filter: string; count: number | null }>;

export class GetBoardCardsByFilter {
  constructor(private readonly gateway: TrelloExecutor) {}

  async execute(input: InputType): Promise<Result<OutputType>> {
    try {
      validateRequired(input, ["idBoard", "filter"]);
      const path = `/boards/${pathSegment(input.idBoard)}/cards/${pathSegment(input.filter)}`;
      const data = await this.gateway.execute("GET", path);
      const count = Array.isArray(data) ? data.length : null;
      return ok({
        action: "get_board_cards_by_filter",
        idBoard: input.idBoard,
        filter: input.filter,
        count,
        data,
        message: `Retrieved ${input.filter} cards for board ${input.idBoard}`
      });
    } catch (error) {
      return toToolError(error);
    }
  }
}
