import { describe, expect, it } from "vitest";
import { detectFilenameCollisions, filenameRegistry } from "../src/pipeline/collisions.js";

describe("filename collisions", () => {
  it("reports each repeated filename once with its count", () => {
    const { collisions, warnings } = detectFilenameCollisions([{ filename: "a" }, { filename: "a" }, { filename: "b" }], "png");
    expect(collisions).toEqual([{ filename: "a", extension: "png", count: 2 }]);
    expect(warnings).toEqual([
      {
        code: "filename_collision",
        message: "Figure a.png is defined 2 times; only the newest definition is drawn.",
        detail: "a"
      }
    ]);
  });

  it("reports nothing when every filename is unique", () => {
    expect(detectFilenameCollisions([{ filename: "a" }, { filename: "b" }], "png").collisions).toEqual([]);
  });

  it("counts occurrences per filename", () => {
    const registry = filenameRegistry([{ filename: "x" }, { filename: "y" }, { filename: "x" }, { filename: "x" }]);
    expect([...registry.entries()]).toEqual([
      ["x", 3],
      ["y", 1]
    ]);
  });
});
