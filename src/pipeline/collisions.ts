import type { PlotSpec } from "../plotting/contracts.js";
import type { PipelineWarning } from "./warnings.js";

export type FilenameCollision = {
  filename: string;
  extension: string;
  count: number;
};

export function filenameRegistry(plots: Pick<PlotSpec, "filename">[]): Map<string, number> {
  const registry = new Map<string, number>();
  for (const plot of plots) registry.set(plot.filename, (registry.get(plot.filename) ?? 0) + 1);
  return registry;
}

/** Reports figure filenames defined more than once. Purely diagnostic. */
export function detectFilenameCollisions(
  plots: Pick<PlotSpec, "filename">[],
  extension: string
): { collisions: FilenameCollision[]; warnings: PipelineWarning[] } {
  const collisions: FilenameCollision[] = [];
  const warnings: PipelineWarning[] = [];
  for (const [filename, count] of filenameRegistry(plots)) {
    if (count <= 1) continue;
    collisions.push({ filename, extension, count });
    warnings.push({
      code: "filename_collision",
      message: `Figure ${filename}.${extension} is defined ${count} times; only the newest definition is drawn.`,
      detail: filename
    });
  }
  return { collisions, warnings };
}
