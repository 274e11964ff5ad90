import { z } from "zod";
import { GetActionInput } from "../../../mcp/tools/schemas/action.js";
import { ok, type Result } from "../../../shared/Result.js";
import { toToolError } from "../../../shared/errors.js";
import { validateRequired } from "../../validation/required.js";
import { compactParams, pathSegment } from "../../params.js";
import type { ActionOutput, TrelloExecutor } from "../types.js";

type InputType = z.infer<typeof GetActionInput>;
type OutputType = ActionOutput<{ idAction: string }>;

export class GetAction {
  constructor(private readonly gateway: TrelloExecutor) {}

  async execute(input: InputType): Promise<Result<OutputType>> {
    try {
      validateRequired(input, ["idAction"]);
      const query = compactParams({
        display: input.display,
        entities: input.entities,
        fields: input.fields,
        member: input.member,
        member_fields: input.memberFields,
        memberCreator: input.memberCreator,
        memberCreator_fields: input.memberCreatorFields
      });
      const data = await this.gateway.execute("GET", `/actions/${pathSegment(input.idAction)}`, query);
      return ok({
        action: "get_action",
        idAction: input.idAction,
        data,
        message: `Successfully retrieved action ${input.idAction}`
      });
    } catch (error) {
      return toToolError(error);
    }
  }
}
