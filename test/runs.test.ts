import { describe, expect, it } from "vitest";
import path from "node:path";
import { alignRunInputs, buildRuns, defaultRunName, uniqueRunNames } from "../src/pipeline/runs.js";

describe("run descriptors", () => {
  it("keeps every run when the lists have equal length", () => {
    const aligned = alignRunInputs({ snapshots: ["s0", "s1"], catalogues: ["c0", "c1"], inputDirectories: ["a", "b"] });
    expect(aligned.snapshots).toEqual(["s0", "s1"]);
    expect(aligned.warnings).toEqual([]);
  });

  it("truncates to the shortest list and reports it", () => {
    const aligned = alignRunInputs({
      snapshots: ["s0.hdf5", "s1.hdf5"],
      catalogues: ["c0.json", "c1.json", "c2.json"],
      inputDirectories: ["a", "b", "c"]
    });
    expect(aligned.catalogues).toEqual(["c0.json", "c1.json"]);
    expect(aligned.inputDirectories).toEqual(["a", "b"]);
    expect(buildRuns(aligned, ["A", "B"])).toHaveLength(2);
    expect(aligned.warnings).toEqual([
      {
        code: "input_lists_truncated",
        message: "Input lists differ in length (snapshots 2, catalogues 3, input directories 3); using the first 2 run(s)."
      }
    ]);
  });

  it("joins relative files onto the run's input directory and keeps absolute ones", () => {
    const runs = buildRuns(
      { snapshots: ["snap.json"], catalogues: ["/abs/cat.json"], inputDirectories: ["run1"], warnings: [] },
      ["Run 1"]
    );
    expect(runs).toEqual([
      { name: "Run 1", snapshotPath: path.join("run1", "snap.json"), cataloguePath: "/abs/cat.json", inputDirectory: "run1" }
    ]);
  });

  it("prefers explicit names, then the snapshot run name, then the directory name", () => {
    const snapshot = { path: "s", runName: "From header", metadata: {} };
    expect(defaultRunName("/data/run1", "Explicit", snapshot)).toBe("Explicit");
    expect(defaultRunName("/data/run1", undefined, snapshot)).toBe("From header");
    expect(defaultRunName("/data/run1", "  ", null)).toBe("run1");
  });

  it("makes repeated names unique", () => {
    const out = uniqueRunNames(["A", "B", "A", "A"]);
    expect(out.names).toEqual(["A", "B", "A (2)", "A (3)"]);
    expect(out.warnings.map((w) => w.code)).toEqual(["duplicate_run_name", "duplicate_run_name"]);
  });

  it("skips suffixes that are already taken", () => {
    expect(uniqueRunNames(["A (2)", "A", "A"]).names).toEqual(["A (2)", "A", "A (3)"]);
  });
});
