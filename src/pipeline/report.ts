import fs from "node:fs/promises";
import path from "node:path";
import type { PipelineConfig } from "../config.js";
import type { PlotMetadataRecord } from "./metadata.js";
import type { ComparisonMetadata } from "./reconstruct.js";
import type { ScriptResult } from "./scripts.js";
import { FIGURE_EXTENSION, REPORT_FILENAME } from "./utils.js";
import { WebpageCreator, type FigureEntry, type RunMetadataEntry } from "./webpage.js";

export type StandaloneMetadata = {
  mode: "standalone";
  record: PlotMetadataRecord;
  path: string;
  written: boolean;
};

export type PipelineMetadata = StandaloneMetadata | ComparisonMetadata;

export function figureEntries(metadata: PipelineMetadata, extension = FIGURE_EXTENSION): FigureEntry[] {
  if (metadata.mode === "standalone") {
    return Object.entries(metadata.record.plots).map(([filename, plot]) => ({
      filename,
      title: plot.title,
      caption: plot.caption,
      section: plot.section,
      image: `${filename}.${extension}`
    }));
  }
  return metadata.plots.map((plot) => ({
    filename: plot.filename,
    title: plot.title,
    caption: plot.caption,
    section: plot.section,
    image: plot.rendered ? `${plot.filename}.${extension}` : null,
    ...(plot.rendered ? {} : { note: "This comparison figure could not be rendered." })
  }));
}

export function reportTitle(config: PipelineConfig, runNames: string[]): string {
  const joined = runNames.join(", ");
  return config.titlePrefix ? `${config.titlePrefix} ${joined}` : joined;
}

/** Assembles the page model; section order is plot metadata, configuration, title, runs, scripts. */
export async function buildReport(input: {
  metadata: PipelineMetadata;
  config: PipelineConfig;
  runs: RunMetadataEntry[];
  title: string;
  scripts: ScriptResult[];
}): Promise<WebpageCreator> {
  const page = new WebpageCreator();
  if (input.config.stylesheetPath) {
    page.addStylesheet(await fs.readFile(input.config.stylesheetPath, "utf8"));
  }
  return page
    .addPlotMetadata(figureEntries(input.metadata))
    .addConfig(input.config)
    .addTitle(input.title)
    .addRunMetadata(input.runs)
    .addScriptResults(input.scripts);
}

export async function writeReport(page: WebpageCreator, outputDirectory: string): Promise<string> {
  const reportPath = path.join(outputDirectory, REPORT_FILENAME);
  await page.save(reportPath);
  return reportPath;
}
