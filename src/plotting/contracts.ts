export type LineSeries = {
  label: string;
  x: number[];
  y: number[];
  yLow?: number[];
  yHigh?: number[];
};

export type PlotKind = "median" | "mean" | "histogram";

export type AxisSpec = {
  quantity: string;
  label: string;
  log: boolean;
};

export type BinSpec = {
  count: number;
  start: number;
  end: number;
};

/** One configured figure, before any data is attached. */
export type PlotDefinition = {
  filename: string;
  kind: PlotKind;
  title: string;
  caption: string;
  section: string;
  x: AxisSpec;
  y: AxisSpec | null;
  bins: BinSpec;
  observational: LineSeries[];
  sourceFile: string;
};

/** A rendered figure: its definition's identity plus the plotted line data. */
export type PlotSpec = {
  filename: string;
  kind: PlotKind;
  title: string;
  caption: string;
  section: string;
  xLabel: string;
  yLabel: string;
  xLog: boolean;
  yLog: boolean;
  lines: LineSeries[];
};

export type CatalogueHandle = {
  path: string;
  length: number;
  quantities: Record<string, number[]>;
  units: Record<string, string>;
};

export type SnapshotMetadataValue = string | number | boolean | null;

export type SnapshotHandle = {
  path: string;
  runName: string | null;
  metadata: Record<string, SnapshotMetadataValue | Record<string, SnapshotMetadataValue>>;
};

export type PlotSet = {
  definitions: PlotDefinition[];
  catalogue: CatalogueHandle | null;
};

/** Per-run line data for one figure, keyed by run name in run order. */
export type CompositeLines = Record<string, LineSeries[]>;

export type ProgressEvent = {
  index: number;
  total: number;
  label: string;
};

export type ProgressObserver = (event: ProgressEvent) => void;

export type PlottingBackend = {
  create(configFiles: string[], observationalDataDir: string): Promise<PlotSet>;
  link(plotSet: PlotSet, catalogue: CatalogueHandle): PlotSet;
  render(plotSet: PlotSet, outputDir: string, extension: string, observer?: ProgressObserver): Promise<PlotSpec[]>;
  renderOne(plot: PlotDefinition, composite: CompositeLines, outputDir: string, extension: string): Promise<PlotSpec>;
};

export type CatalogueLoader = {
  load(filePath: string, registrationFile?: string): Promise<CatalogueHandle>;
};

export type SnapshotLoader = {
  load(filePath: string): Promise<SnapshotHandle>;
};
