import path from "node:path";
import type { SnapshotHandle } from "../plotting/contracts.js";
import type { PipelineWarning } from "./warnings.js";

export type Run = {
  name: string;
  snapshotPath: string;
  cataloguePath: string;
  inputDirectory: string;
};

export type RunInputs = {
  snapshots: string[];
  catalogues: string[];
  inputDirectories: string[];
};

export type ResolvedRunInputs = {
  snapshots: string[];
  catalogues: string[];
  inputDirectories: string[];
  warnings: PipelineWarning[];
};

/**
 * Consumes the three input lists in lock-step. Entries past the shortest list
 * are dropped and reported as a warning.
 */
export function alignRunInputs(inputs: RunInputs): ResolvedRunInputs {
  const count = Math.min(inputs.snapshots.length, inputs.catalogues.length, inputs.inputDirectories.length);
  const warnings: PipelineWarning[] = [];
  const lengths = [inputs.snapshots.length, inputs.catalogues.length, inputs.inputDirectories.length];
  if (lengths.some((n) => n !== count)) {
    warnings.push({
      code: "input_lists_truncated",
      message: `Input lists differ in length (snapshots ${lengths[0]}, catalogues ${lengths[1]}, input directories ${lengths[2]}); using the first ${count} run(s).`
    });
  }

  return {
    snapshots: inputs.snapshots.slice(0, count),
    catalogues: inputs.catalogues.slice(0, count),
    inputDirectories: inputs.inputDirectories.slice(0, count),
    warnings
  };
}

/** Name for a run: explicit override, then the snapshot's own run name, then its input directory. */
export function defaultRunName(inputDirectory: string, explicit: string | undefined, snapshot: SnapshotHandle | null): string {
  const fromOverride = explicit?.trim();
  if (fromOverride) return fromOverride;
  const fromSnapshot = snapshot?.runName?.trim();
  if (fromSnapshot) return fromSnapshot;
  return path.basename(path.resolve(inputDirectory));
}

/** Appends ` (2)`, ` (3)`... to repeated names so per-run data keyed by name stays distinct. */
export function uniqueRunNames(names: string[]): { names: string[]; warnings: PipelineWarning[] } {
  const seen = new Map<string, number>();
  const used = new Set(names);
  const warnings: PipelineWarning[] = [];
  const out = names.map((name) => {
    const count = (seen.get(name) ?? 0) + 1;
    seen.set(name, count);
    if (count === 1) return name;

    let n = count;
    let candidate = `${name} (${n})`;
    while (used.has(candidate)) candidate = `${name} (${++n})`;
    used.add(candidate);
    warnings.push({ code: "duplicate_run_name", message: `Run name "${name}" is used more than once; renamed to "${candidate}".` });
    return candidate;
  });
  return { names: out, warnings };
}

function inDirectory(inputDirectory: string, file: string): string {
  return path.isAbsolute(file) ? file : path.join(inputDirectory, file);
}

export function buildRuns(aligned: ResolvedRunInputs, names: string[]): Run[] {
  return aligned.snapshots.map((snapshot, i) => {
    const inputDirectory = aligned.inputDirectories[i];
    return {
      name: names[i],
      snapshotPath: inDirectory(inputDirectory, snapshot),
      cataloguePath: inDirectory(inputDirectory, aligned.catalogues[i]),
      inputDirectory
    };
  });
}
