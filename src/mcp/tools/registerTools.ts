import { z } from "zod";
import { PROJECT_NAME } from "../../config/constants.js";
import type { RuntimeConfig } from "../../config/runtime.js";
import { err, ok, type Result } from "../../shared/Result.js";
import { createLogger } from "../../shared/logging.js";
import { PACKAGE_VERSION } from "../../shared/version.js";
import { fromEnv, type AppConfig } from "../../shared/config/schema.js";
import { HttpClient } from "../../infrastructure/http/HttpClient.js";
import { TrelloGateway } from "../../infrastructure/trello/TrelloGateway.js";
import {
  EnvCredentialProvider,
  resolveBasePath,
  type CredentialProvider
} from "../../infrastructure/credentials/CredentialProvider.js";
import { BatchExecutor } from "../../application/services/BatchExecutor.js";
import type { TrelloExecutor } from "../../application/usecases/types.js";
import { GetBoard } from "../../application/usecases/boards/GetBoard.js";
import { AddBoardList, GetBoardLists } from "../../application/usecases/boards/BoardLists.js";
import { GetBoardCardsByFilter } from "../../application/usecases/boards/BoardCards.js";
import { CreateCard } from "../../application/usecases/cards/CreateCard.js";
import { GetCardField } from "../../application/usecases/cards/GetCardField.js";
import { MoveCard } from "../../application/usecases/cards/MoveCard.js";
import { CommentCard } from "../../application/usecases/cards/CommentCard.js";
import { AttachFileToCard, type FileReader } from "../../application/usecases/cards/AttachFileToCard.js";
import { DeleteCard } from "../../application/usecases/cards/DeleteCard.js";
import { GetAction } from "../../application/usecases/actions/GetAction.js";
import { GetBatch } from "../../application/usecases/batch/GetBatch.js";
import {
  AddBoardListInput,
  CardFilter,
  GetBoardCardsByFilterInput,
  GetBoardInput,
  GetBoardListsInput,
  ListFilter
} from "./schemas/board.js";
import {
  AttachToCardInput,
  CardField,
  CommentCardInput,
  CreateCardInput,
  DeleteCardInput,
  GetCardFieldInput,
  MoveCardInput
} from "./schemas/card.js";
import { GetActionInput } from "./schemas/action.js";
import { GetBatchInput, MAX_BATCH_URLS } from "./schemas/batch.js";

type ToolAnnotations = { readOnlyHint: boolean; idempotentHint: boolean; destructiveHint: boolean };

export type ToolContext = { runtime: RuntimeConfig };

type ToolExecutor<TOutput> = (input: unknown, context: ToolContext) => Promise<Result<TOutput>>;

type JsonSchema = Record<string, unknown>;

export type ToolDependencies = {
  gateway?: TrelloExecutor;
  credentials?: CredentialProvider;
  config?: AppConfig;
  readUpload?: FileReader;
};

export type RegisteredTool<TOutput = unknown> = {
  name: string;
  description: string;
  annotations: ToolAnnotations;
  inputSchema: z.ZodTypeAny;
  inputJsonSchema: JsonSchema;
  execute: ToolExecutor<TOutput>;
};

type ToolSpec<TInput, TOutput> = {
  name: string;
  description: string;
  annotations: ToolAnnotations;
  inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  inputJsonSchema: JsonSchema;
  handler: (input: TInput, context: ToolContext) => Promise<Result<TOutput>>;
};

const READ_ONLY: ToolAnnotations = { readOnlyHint: true, idempotentHint: true, destructiveHint: false };
const WRITE: ToolAnnotations = { readOnlyHint: false, idempotentHint: false, destructiveHint: false };
const IDEMPOTENT_WRITE: ToolAnnotations = { readOnlyHint: false, idempotentHint: true, destructiveHint: false };
const DESTRUCTIVE: ToolAnnotations = { readOnlyHint: false, idempotentHint: true, destructiveHint: true };

const idProperty = { type: "string", minLength: 1 };
const positionProperty = { anyOf: [{ type: "string", enum: ["top", "bottom"] }, { type: "number", exclusiveMinimum: 0 }] };

function defineTool<TInput, TOutput>(definition: ToolSpec<TInput, TOutput>): RegisteredTool<TOutput> {
  return {
    name: definition.name,
    description: definition.description,
    annotations: definition.annotations,
    inputSchema: definition.inputSchema,
    inputJsonSchema: definition.inputJsonSchema,
    execute: async (input, context) => {
      const parsed = definition.inputSchema.safeParse(input ?? {});
      if (!parsed.success) {
        return err("INVALID_PARAMETER", "Invalid parameters", parsed.error.flatten());
      }
      return definition.handler(parsed.data, context);
    }
  };
}

type HealthPayload = {
  service: string;
  version: string;
  pid: number;
  logLevel: RuntimeConfig["logLevel"];
  now: string;
};

export const healthTool = defineTool({
  name: "health",
  description: "Basic server status",
  annotations: READ_ONLY,
  inputSchema: z.object({}).strict(),
  inputJsonSchema: { type: "object", properties: {}, required: [], additionalProperties: false },
  handler: async (_input, context): Promise<Result<HealthPayload>> =>
    ok({
      service: PROJECT_NAME,
      version: PACKAGE_VERSION,
      pid: process.pid,
      logLevel: context.runtime.logLevel,
      now: new Date().toISOString()
    })
});

function resolveDependencies(deps?: ToolDependencies): { gateway: TrelloExecutor; credentials: CredentialProvider } {
  const credentials = deps?.credentials ?? new EnvCredentialProvider();
  if (deps?.gateway) {
    return { gateway: deps.gateway, credentials };
  }
  const config = deps?.config ?? fromEnv();
  const client = new HttpClient({ timeoutMs: config.requestTimeoutMs });
  return { gateway: new TrelloGateway(client, credentials, { baseUrl: config.baseUrl, timeoutMs: config.requestTimeoutMs }), credentials };
}

export function registerTools(deps?: ToolDependencies): RegisteredTool[] {
  const { gateway, credentials } = resolveDependencies(deps);
  const getBoard = new GetBoard(gateway);
  const getBoardLists = new GetBoardLists(gateway);
  const addBoardList = new AddBoardList(gateway);
  const getBoardCards = new GetBoardCardsByFilter(gateway);
  const createCard = new CreateCard(gateway);
  const getCardField = new GetCardField(gateway);
  const moveCard = new MoveCard(gateway);
  const commentCard = new CommentCard(gateway);
  const attachToCard = new AttachFileToCard(gateway, () => resolveBasePath(credentials), deps?.readUpload);
  const deleteCard = new DeleteCard(gateway);
  const getAction = new GetAction(gateway);
  const getBatch = new GetBatch(new BatchExecutor(gateway, createLogger("application.batch")));

  const tools: RegisteredTool[] = [];
  const register = <TOutput>(tool: RegisteredTool<TOutput>): void => {
    tools.push(tool);
  };

  register(healthTool);
  register(
    defineTool({
      name: "TRELLO_GET_BOARDS_BY_ID_BOARD",
      description: "Get a board by id, optionally nesting its actions, cards, lists, members and labels",
      annotations: READ_ONLY,
      inputSchema: GetBoardInput,
      inputJsonSchema: {
        type: "object",
        properties: {
          idBoard: idProperty,
          fields: { type: "string", description: "Comma-separated board fields, or 'all'" },
          actions: { type: "string" },
          cards: { type: "string", enum: CardFilter.options },
          lists: { type: "string", enum: ListFilter.options },
          members: { type: "string" },
          labels: { type: "string" }
        },
        required: ["idBoard"],
        additionalProperties: false
      },
      handler: input => getBoard.execute(input)
    })
  );
  register(
    defineTool({
      name: "TRELLO_GET_BOARDS_LISTS_BY_ID_BOARD",
      description: "Lists on a board, optionally with their cards",
      annotations: READ_ONLY,
      inputSchema: GetBoardListsInput,
      inputJsonSchema: {
        type: "object",
        properties: {
          idBoard: idProperty,
          cards: { type: "string", enum: CardFilter.options },
          cardFields: { type: "string" },
          filter: { type: "string", enum: ListFilter.options },
          fields: { type: "string" }
        },
        required: ["idBoard"],
        additionalProperties: false
      },
      handler: input => getBoardLists.execute(input)
    })
  );
  register(
    defineTool({
      name: "TRELLO_GET_BOARDS_CARDS_BY_ID_BOARD_BY_FILTER",
      description: "Cards on a board matching a filter (all, closed, none, open, visible)",
      annotations: READ_ONLY,
      inputSchema: GetBoardCardsByFilterInput,
      inputJsonSchema: {
        type: "object",
        properties: { idBoard: idProperty, filter: { type: "string", enum: CardFilter.options } },
        required: ["idBoard", "filter"],
        additionalProperties: false
      },
      handler: input => getBoardCards.execute(input)
    })
  );
  register(
    defineTool({
      name: "TRELLO_ADD_BOARDS_LISTS_BY_ID_BOARD",
      description: "Create a list on a board",
      annotations: WRITE,
      inputSchema: AddBoardListInput,
      inputJsonSchema: {
        type: "object",
        properties: { idBoard: idProperty, name: { type: "string", minLength: 1 }, pos: positionProperty },
        required: ["idBoard", "name"],
        additionalProperties: false
      },
      handler: input => addBoardList.execute(input)
    })
  );
  register(
    defineTool({
      name: "TRELLO_ADD_CARDS",
      description: "Create a card in a list",
      annotations: WRITE,
      inputSchema: CreateCardInput,
      inputJsonSchema: {
        type: "object",
        properties: {
          idList: idProperty,
          name: { type: "string" },
          desc: { type: "string" },
          pos: positionProperty,
          due: { type: "string", description: "Due date (ISO 8601)" },
          idMembers: { type: "array", items: { type: "string" }, maxItems: 50 },
          idLabels: { type: "array", items: { type: "string" }, maxItems: 50 },
          urlSource: { type: "string", format: "uri" }
        },
        required: ["idList"],
        additionalProperties: false
      },
      handler: input => createCard.execute(input)
    })
  );
  register(
    defineTool({
      name: "TRELLO_GET_CARDS_BY_ID_CARD_BY_FIELD",
      description: "Read a single field of a card",
      annotations: READ_ONLY,
      inputSchema: GetCardFieldInput,
      inputJsonSchema: {
        type: "object",
        properties: { idCard: idProperty, field: { type: "string", enum: CardField.options } },
        required: ["idCard", "field"],
        additionalProperties: false
      },
      handler: input => getCardField.execute(input)
    })
  );
  register(
    defineTool({
      name: "TRELLO_CARD_UPDATE_ID_LIST_BY_ID_CARD",
      description: "Move a card to another list",
      annotations: IDEMPOTENT_WRITE,
      inputSchema: MoveCardInput,
      inputJsonSchema: {
        type: "object",
        properties: { idCard: idProperty, idList: idProperty },
        required: ["idCard", "idList"],
        additionalProperties: false
      },
      handler: input => moveCard.execute(input)
    })
  );
  register(
    defineTool({
      name: "TRELLO_ADD_CARDS_ACTIONS_COMMENTS_BY_ID_CARD",
      description: "Add a comment to a card",
      annotations: WRITE,
      inputSchema: CommentCardInput,
      inputJsonSchema: {
        type: "object",
        properties: { idCard: idProperty, text: { type: "string", minLength: 1, maxLength: 16384 } },
        required: ["idCard", "text"],
        additionalProperties: false
      },
      handler: input => commentCard.execute(input)
    })
  );
  register(
    defineTool({
      name: "TRELLO_ADD_CARDS_ATTACHMENTS_BY_ID_CARD",
      description: "Attach a file (path relative to BASE_PATH) or a link to a card",
      annotations: WRITE,
      inputSchema: AttachToCardInput,
      inputJsonSchema: {
        type: "object",
        properties: {
          idCard: idProperty,
          filePath: { type: "string", minLength: 1 },
          url: { type: "string", format: "uri" },
          name: { type: "string", maxLength: 256 },
          mimeType: { type: "string", maxLength: 256 },
          setCover: { type: "boolean" }
        },
        required: ["idCard"],
        additionalProperties: false
      },
      handler: input => attachToCard.execute(input)
    })
  );
  register(
    defineTool({
      name: "TRELLO_DELETE_CARDS_BY_ID_CARD",
      description: "Permanently delete a card",
      annotations: DESTRUCTIVE,
      inputSchema: DeleteCardInput,
      inputJsonSchema: {
        type: "object",
        properties: { idCard: idProperty },
        required: ["idCard"],
        additionalProperties: false
      },
      handler: input => deleteCard.execute(input)
    })
  );
  register(
    defineTool({
      name: "TRELLO_GET_ACTIONS_BY_ID_ACTION",
      description: "Get an action (comment, card move, ...) by id",
      annotations: READ_ONLY,
      inputSchema: GetActionInput,
      inputJsonSchema: {
        type: "object",
        properties: {
          idAction: idProperty,
          display: { type: "boolean" },
          entities: { type: "boolean" },
          fields: { type: "string" },
          member: { type: "boolean" },
          memberFields: { type: "string" },
          memberCreator: { type: "boolean" },
          memberCreatorFields: { type: "string" }
        },
        required: ["idAction"],
        additionalProperties: false
      },
      handler: input => getAction.execute(input)
    })
  );
  register(
    defineTool({
      name: "TRELLO_GET_BATCH",
      description:
        "Run several GET requests in one call. URLs are relative paths such as '/boards/123'; one failing URL does not stop the others",
      annotations: READ_ONLY,
      inputSchema: GetBatchInput,
      inputJsonSchema: {
        type: "object",
        properties: {
          urls: {
            anyOf: [
              { type: "string", description: `Comma-separated relative paths, at most ${MAX_BATCH_URLS}` },
              { type: "array", items: { type: "string" }, maxItems: MAX_BATCH_URLS }
            ]
          }
        },
        required: ["urls"],
        additionalProperties: false
      },
      handler: input => getBatch.execute(input)
    })
  );
  return tools;
}
