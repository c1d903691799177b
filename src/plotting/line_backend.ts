import path from "node:path";
import sharp from "sharp";
import { ConfigError } from "../errors.js";
import { ensureDir, readYamlFile } from "../pipeline/utils.js";
import type {
  AxisSpec,
  CatalogueHandle,
  CompositeLines,
  LineSeries,
  PlotDefinition,
  PlotSet,
  PlotSpec,
  PlottingBackend,
  ProgressObserver
} from "./contracts.js";
import { ObservationalDataSchema, PlotConfigFileSchema, type PlotConfigEntry } from "./formats.js";
import { binnedMean, binnedMedian, histogram } from "./statistics.js";
import { buildLineChartSvg } from "./svg_chart.js";

export type Rasterizer = (svg: string, outPath: string) => Promise<void>;

export const sharpRasterizer: Rasterizer = async (svg, outPath) => {
  await sharp(Buffer.from(svg)).png({ compressionLevel: 6 }).toFile(outPath);
};

function titleFromFilename(filename: string): string {
  const words = filename.split(/[_-]+/).filter(Boolean);
  return words.map((w, i) => (i === 0 ? w.charAt(0).toUpperCase() + w.slice(1) : w)).join(" ");
}

function axisFrom(config: { quantity: string; label?: string; log: boolean }): AxisSpec {
  return { quantity: config.quantity, label: config.label ?? config.quantity, log: config.log };
}

async function loadObservational(files: string[], observationalDataDir: string): Promise<LineSeries[]> {
  const series: LineSeries[] = [];
  for (const file of files) {
    const filePath = path.resolve(observationalDataDir, file);
    const parsed = ObservationalDataSchema.safeParse(await readYamlFile(filePath));
    if (!parsed.success) throw new ConfigError(`Invalid observational data ${filePath}: ${parsed.error.message}`);
    series.push({ label: parsed.data.name, x: parsed.data.x, y: parsed.data.y });
  }
  return series;
}

async function toDefinition(
  key: string,
  entry: PlotConfigEntry,
  sourceFile: string,
  observationalDataDir: string
): Promise<PlotDefinition> {
  const filename = entry.filename ?? key;
  return {
    filename,
    kind: entry.type,
    title: entry.metadata.title ?? titleFromFilename(filename),
    caption: entry.metadata.caption ?? "",
    section: entry.metadata.section ?? "Figures",
    x: axisFrom(entry.x),
    y: entry.y ? axisFrom(entry.y) : null,
    bins: { count: entry.bins.count, start: entry.bins.start, end: entry.bins.end },
    observational: await loadObservational(entry.observational_data, observationalDataDir),
    sourceFile
  };
}

/** Reads every plot configuration file, keeping file order then declaration order. */
export async function loadPlotDefinitions(configFiles: string[], observationalDataDir: string): Promise<PlotDefinition[]> {
  const definitions: PlotDefinition[] = [];
  for (const file of configFiles) {
    const raw = (await readYamlFile(file)) ?? {};
    const parsed = PlotConfigFileSchema.safeParse(raw);
    if (!parsed.success) throw new ConfigError(`Invalid plot configuration ${file}: ${parsed.error.message}`);
    for (const [key, entry] of Object.entries(parsed.data)) {
      definitions.push(await toDefinition(key, entry, file, observationalDataDir));
    }
  }
  return definitions;
}

function requireQuantity(catalogue: CatalogueHandle, quantity: string, plot: string): number[] {
  const values = catalogue.quantities[quantity];
  if (!values) throw new ConfigError(`Plot ${plot} needs quantity ${quantity}, which ${catalogue.path} does not provide.`);
  return values;
}

function computeLine(plot: PlotDefinition, catalogue: CatalogueHandle): LineSeries {
  const x = requireQuantity(catalogue, plot.x.quantity, plot.filename);
  if (plot.kind === "histogram" || !plot.y) return histogram("Count", x, plot.bins, plot.x.log);
  const y = requireQuantity(catalogue, plot.y.quantity, plot.filename);
  if (plot.kind === "mean") return binnedMean("Mean", x, y, plot.bins, plot.x.log);
  return binnedMedian("Median", x, y, plot.bins, plot.x.log);
}

function specFor(plot: PlotDefinition, lines: LineSeries[]): PlotSpec {
  return {
    filename: plot.filename,
    kind: plot.kind,
    title: plot.title,
    caption: plot.caption,
    section: plot.section,
    xLabel: plot.x.label,
    yLabel: plot.y ? plot.y.label : "Count",
    xLog: plot.x.log,
    yLog: plot.y ? plot.y.log : false,
    lines
  };
}

/**
 * Built-in plotting backend: binned median, mean and histogram lines drawn as
 * SVG charts and rasterized to PNG.
 */
export class LinePlotBackend implements PlottingBackend {
  private readonly rasterize: Rasterizer;

  constructor(options?: { rasterize?: Rasterizer }) {
    this.rasterize = options?.rasterize ?? sharpRasterizer;
  }

  async create(configFiles: string[], observationalDataDir: string): Promise<PlotSet> {
    return { definitions: await loadPlotDefinitions(configFiles, observationalDataDir), catalogue: null };
  }

  link(plotSet: PlotSet, catalogue: CatalogueHandle): PlotSet {
    return { ...plotSet, catalogue };
  }

  async render(plotSet: PlotSet, outputDir: string, extension: string, observer?: ProgressObserver): Promise<PlotSpec[]> {
    const catalogue = plotSet.catalogue;
    if (!catalogue) throw new Error("Plot set has no linked catalogue.");

    await ensureDir(outputDir);
    const specs: PlotSpec[] = [];
    for (const [index, plot] of plotSet.definitions.entries()) {
      observer?.({ index, total: plotSet.definitions.length, label: plot.filename });
      const spec = specFor(plot, [computeLine(plot, catalogue)]);
      await this.draw(spec, plot.observational, outputDir, extension);
      specs.push(spec);
    }
    return specs;
  }

  async renderOne(plot: PlotDefinition, composite: CompositeLines, outputDir: string, extension: string): Promise<PlotSpec> {
    const lines: LineSeries[] = [];
    for (const [runName, series] of Object.entries(composite)) {
      for (const line of series) {
        lines.push({ ...line, label: series.length > 1 ? `${runName}: ${line.label}` : runName });
      }
    }
    const spec = specFor(plot, lines);
    await ensureDir(outputDir);
    await this.draw(spec, plot.observational, outputDir, extension);
    return spec;
  }

  private async draw(spec: PlotSpec, observational: LineSeries[], outputDir: string, extension: string): Promise<void> {
    const svg = buildLineChartSvg({
      title: spec.title,
      xLabel: spec.xLabel,
      yLabel: spec.yLabel,
      xLog: spec.xLog,
      yLog: spec.yLog,
      lines: spec.lines,
      observational
    });
    await this.rasterize(svg, path.join(outputDir, `${spec.filename}.${extension}`));
  }
}
