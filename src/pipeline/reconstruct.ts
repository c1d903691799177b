import type { CompositeLines, PlotDefinition, PlotSpec, PlottingBackend, ProgressObserver } from "../plotting/contracts.js";
import type { RunLog } from "../run_log.js";
import type { LoadedRunMetadata } from "./metadata.js";
import { errorMessage } from "./utils.js";
import type { PipelineWarning } from "./warnings.js";

/** Per-plot composite data: plot filename -> run name -> that run's stored lines. */
export type CompositeLineData = Record<string, CompositeLines>;

export type ComparisonPlotEntry = {
  filename: string;
  title: string;
  caption: string;
  section: string;
  runs: string[];
  rendered: boolean;
};

export type ComparisonMetadata = {
  mode: "comparison";
  runNames: string[];
  sources: Array<{ runName: string; path: string }>;
  plots: ComparisonPlotEntry[];
};

export type ComparisonResult = {
  metadata: ComparisonMetadata;
  plots: PlotSpec[];
  composite: CompositeLineData;
  warnings: PipelineWarning[];
};

/**
 * Collapses definitions that share a filename. Definitions are expected in
 * configuration-file order (newest file first), so the first one seen wins.
 */
export function mergePlotDefinitions(definitions: PlotDefinition[]): PlotDefinition[] {
  const byFilename = new Map<string, PlotDefinition>();
  for (const def of definitions) {
    if (!byFilename.has(def.filename)) byFilename.set(def.filename, def);
  }
  return [...byFilename.values()];
}

export function buildCompositeLineData(plotIds: string[], loaded: LoadedRunMetadata[]): CompositeLineData {
  const composite: CompositeLineData = {};
  for (const id of plotIds) {
    const perRun: CompositeLines = {};
    for (const entry of loaded) {
      const stored = entry.record.plots[id];
      if (!stored) continue;
      perRun[entry.run.name] = stored.lines;
    }
    composite[id] = perRun;
  }
  return composite;
}

function plotIdentity(plot: PlotDefinition): Pick<ComparisonPlotEntry, "filename" | "title" | "caption" | "section"> {
  return { filename: plot.filename, title: plot.title, caption: plot.caption, section: plot.section };
}

export async function reconstructComparison(input: {
  definitions: PlotDefinition[];
  loaded: LoadedRunMetadata[];
  backend: PlottingBackend;
  outputDirectory: string;
  extension: string;
  log?: RunLog;
  observer?: ProgressObserver;
}): Promise<ComparisonResult> {
  const plotsToBuild = mergePlotDefinitions(input.definitions);
  const composite = buildCompositeLineData(plotsToBuild.map((p) => p.filename), input.loaded);

  const warnings: PipelineWarning[] = [];
  const plots: PlotSpec[] = [];
  const entries: ComparisonPlotEntry[] = [];

  for (const [index, plot] of plotsToBuild.entries()) {
    input.observer?.({ index, total: plotsToBuild.length, label: plot.filename });
    const perRun = composite[plot.filename];
    const runs = Object.keys(perRun);
    try {
      plots.push(await input.backend.renderOne(plot, perRun, input.outputDirectory, input.extension));
      entries.push({ ...plotIdentity(plot), runs, rendered: true });
    } catch (err) {
      const message = `Could not render composite figure ${plot.filename}: ${errorMessage(err)}`;
      warnings.push({ code: "composite_render_failed", message, detail: plot.filename });
      input.log?.error(message);
      entries.push({ ...plotIdentity(plot), runs, rendered: false });
    }
  }

  return {
    metadata: {
      mode: "comparison",
      runNames: input.loaded.map((l) => l.run.name),
      sources: input.loaded.map((l) => ({ runName: l.run.name, path: l.path })),
      plots: entries
    },
    plots,
    composite,
    warnings
  };
}
