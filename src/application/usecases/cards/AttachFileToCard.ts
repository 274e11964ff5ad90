import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { AttachToCardInput } from "../../../mcp/tools/schemas/card.js";
import { ok, type Result } from "../../../shared/Result.js";
import { toToolError, ValidationError } from "../../../shared/errors.js";
import type { BodyMap } from "../../../infrastructure/trello/TrelloGateway.js";
import { validateRequired } from "../../validation/required.js";
import { compactBody, pathSegment } from "../../params.js";
import type { ActionOutput, TrelloExecutor } from "../types.js";

type InputType = z.infer<typeof AttachToCardInput>;
type OutputType = ActionOutput<{ idCard: string; source: "file" | "url" }>;

export type FileReader = (absolutePath: string) => Promise<Uint8Array>;

const defaultReader: FileReader = absolutePath => readFile(absolutePath);

/** Resolves `relativePath` under `basePath`, rejecting anything that escapes it. */
export function resolveUploadPath(basePath: string, relativePath: string): string {
  const root = path.resolve(basePath);
  const target = path.resolve(root, relativePath);
  const relative = path.relative(root, target);
  if (relative.length === 0 || relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new ValidationError(`filePath must point to a file inside BASE_PATH: ${relativePath}`);
  }
  return target;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "EISDIR");
}

export class AttachFileToCard {
  constructor(
    private readonly gateway: TrelloExecutor,
    private readonly basePath: () => string,
    private readonly readUpload: FileReader = defaultReader
  ) {}

  private async buildFileBody(input: InputType, filePath: string): Promise<BodyMap> {
    const absolutePath = resolveUploadPath(this.basePath(), filePath);
    let content: Uint8Array;
    try {
      content = await this.readUpload(absolutePath);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new ValidationError(`File not found under BASE_PATH: ${filePath}`);
      }
      throw error;
    }
    const filename = input.name ?? path.basename(absolutePath);
    return {
      ...compactBody({ name: filename, mimeType: input.mimeType, setCover: input.setCover }),
      file: { filename, content, contentType: input.mimeType }
    };
  }

  async execute(input: InputType): Promise<Result<OutputType>> {
    try {
      validateRequired(input, ["idCard"]);
      const hasFile = typeof input.filePath === "string" && input.filePath.trim().length > 0;
      const hasUrl = typeof input.url === "string" && input.url.trim().length > 0;
      if (hasFile === hasUrl) {
        throw new ValidationError("Provide exactly one of filePath or url");
      }
      const body =
        hasFile && input.filePath
          ? await this.buildFileBody(input, input.filePath)
          : compactBody({ url: input.url, name: input.name, mimeType: input.mimeType, setCover: input.setCover });
      const data = await this.gateway.execute("POST", `/cards/${pathSegment(input.idCard)}/attachments`, {}, body);
      const source = hasFile ? "file" : "url";
      return ok({
        action: "attach_to_card",
        idCard: input.idCard,
        source,
        data,
        message: `Attached ${source === "file" ? "file" : "link"} to card ${input.idCard}`
      });
    } catch (error) {
      return toToolError(error);
    }
  }
}
