import { z } from "zod";
import { AddBoardListInput, GetBoardListsInput } from "../../../mcp/tools/schemas/board.js";
import { ok, type Result } from "../../../shared/Result.js";
import { toToolError } from "../../../shared/errors.js";
import { validateRequired } from "../../validation/required.js";
import { compactBody, compactParams, pathSegment } from "../../params.js";
import type { ActionOutput, TrelloExecutor } from "../types.js";

type ListInputType = z.infer<typeof GetBoardListsInput>;
type AddInputType = z.infer<typeof AddBoardListInput>;

export class GetBoardLists {
  constructor(private readonly gateway: TrelloExecutor) {}

  async execute(input: ListInputType): Promise<Result<ActionOutput<{ idBoard: string; count: number | null }>>> {
    try {
      validateRequired(input, ["idBoard"]);
      const query = compactParams({
        cards: input.cards,
        card_fields: input.cardFields,
        filter: input.filter,
        fields: input.fields
      });
      const data = await this.gateway.execute("GET", `/boards/${pathSegment(input.idBoard)}/lists`, query);
      const count = Array.isArray(data) ? data.length : null;
      return ok({
        action: "get_board_lists",
        idBoard: input.idBoard,
        count,
        data,
        message:
          count === null
            ? `Retrieved lists for board ${input.idBoard}`
            : `Retrieved ${count} list(s) for board ${input.idBoard}`
      });
    } catch (error) {
      return toToolError(error);
    }
  }
}

export class AddBoardList {
  constructor(private readonly gateway: TrelloExecutor) {}

  async execute(input: AddInputType): Promise<Result<ActionOutput<{ idBoard: string; name: string }>>> {
    try {
      validateRequired(input, ["idBoard", "name"]);
      const body = compactBody({ name: input.name, pos: input.pos });
      const data = await this.gateway.execute("POST", `/boards/${pathSegment(input.idBoard)}/lists`, {}, body);
      return ok({
        action: "add_board_list",
        idBoard: input.idBoard,
        name: input.name,
        data,
        message: `Created list '${input.name}' on board ${input.idBoard}`
      });
    } catch (error) {
      return toToolError(error);
    }
  }
}
