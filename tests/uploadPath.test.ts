import { describe, expect, it } from "vitest";
import "./setup.js";
import { resolveUploadPath } from "../src/application/usecases/cards/AttachFileToCard.js";
import { ValidationError } from "../src/shared/errors.js";

describe("resolveUploadPath", () => {
  it.each<[string, string]>([
    ["notes.txt", "/srv/uploads/notes.txt"],
    ["..notes.txt", "/srv/uploads/..notes.txt"],
    ["docs/..draft/plan.md", "/srv/uploads/docs/..draft/plan.md"],
    ["docs/../notes.txt", "/srv/uploads/notes.txt"]
  ])("resolves %s inside BASE_PATH", (relativePath, expected) => {
    expect(resolveUploadPath("/srv/uploads", relativePath)).toBe(expected);
  });

  it.each(["..", "../secrets.txt", "docs/../../etc/passwd", "/etc/passwd", ".", ""])(
    "rejects %j",
    relativePath => {
      expect(() => resolveUploadPath("/srv/uploads", relativePath)).toThrow(ValidationError);
    }
  );
});
