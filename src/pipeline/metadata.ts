import path from "node:path";
import { z } from "zod";
import { ConfigError, MetadataInvalidError, MetadataMissingError } from "../errors.js";
import type { PlotSpec } from "../plotting/contracts.js";
import type { RunLog } from "../run_log.js";
import type { Run } from "./runs.js";
import { errorMessage, fileExists, fileStem, nowIso, readYamlFile, writeYamlFile } from "./utils.js";
import type { PipelineWarning } from "./warnings.js";

export type PipelineMode = "standalone" | "comparison";

export const METADATA_EXTENSION = "yml";
export const DEFAULT_METADATA_BASE_NAME = "data";
export const METADATA_VERSION = 1;

const LineSeriesSchema = z.object({
  label: z.string(),
  x: z.array(z.number()),
  y: z.array(z.number()),
  yLow: z.array(z.number()).optional(),
  yHigh: z.array(z.number()).optional()
});

const PlotRecordSchema = z.object({
  kind: z.enum(["median", "mean", "histogram"]),
  title: z.string(),
  caption: z.string(),
  section: z.string(),
  xLabel: z.string(),
  yLabel: z.string(),
  xLog: z.boolean(),
  yLog: z.boolean(),
  lines: z.array(LineSeriesSchema)
});

export const PlotMetadataRecordSchema = z.object({
  version: z.literal(METADATA_VERSION),
  generatedAt: z.string(),
  runName: z.string(),
  snapshot: z.string(),
  catalogue: z.string(),
  plots: z.record(z.string(), PlotRecordSchema)
});

export type PlotRecord = z.infer<typeof PlotRecordSchema>;
export type PlotMetadataRecord = z.infer<typeof PlotMetadataRecordSchema>;

export function selectMode(snapshots: readonly string[]): PipelineMode {
  if (snapshots.length === 0) throw new ConfigError("At least one snapshot is required.");
  return snapshots.length === 1 ? "standalone" : "comparison";
}

/** Last four characters of the snapshot's stem, zero-padded: `snapshot_0012.hdf5` -> `0012`. */
export function snapshotIndexSuffix(snapshotPath: string): string {
  return fileStem(snapshotPath).slice(-4).padStart(4, "0");
}

export function metadataFilename(inputDirectory: string, baseName: string, snapshotPath: string): string {
  return path.join(inputDirectory, `${baseName}_${snapshotIndexSuffix(snapshotPath)}.${METADATA_EXTENSION}`);
}

export function metadataPathForRun(run: Run, baseName: string): string {
  return metadataFilename(run.inputDirectory, baseName, run.snapshotPath);
}

export function buildMetadataRecord(run: Run, plots: PlotSpec[], generatedAt = nowIso()): PlotMetadataRecord {
  const records: Record<string, PlotRecord> = {};
  for (const plot of plots) {
    records[plot.filename] = {
      kind: plot.kind,
      title: plot.title,
      caption: plot.caption,
      section: plot.section,
      xLabel: plot.xLabel,
      yLabel: plot.yLabel,
      xLog: plot.xLog,
      yLog: plot.yLog,
      lines: plot.lines.map((line) => ({ ...line }))
    };
  }

  return {
    version: METADATA_VERSION,
    generatedAt,
    runName: run.name,
    snapshot: path.basename(run.snapshotPath),
    catalogue: path.basename(run.cataloguePath),
    plots: records
  };
}

export async function writeMetadataRecord(filePath: string, record: PlotMetadataRecord): Promise<void> {
  await writeYamlFile(filePath, record);
}

export async function readMetadataRecord(filePath: string): Promise<PlotMetadataRecord> {
  let raw: unknown;
  try {
    raw = await readYamlFile(filePath);
  } catch (err) {
    throw new MetadataInvalidError(filePath, errorMessage(err));
  }
  const parsed = PlotMetadataRecordSchema.safeParse(raw);
  if (!parsed.success) throw new MetadataInvalidError(filePath, parsed.error.message);
  return parsed.data;
}

export type LoadedRunMetadata = {
  run: Run;
  path: string;
  record: PlotMetadataRecord;
};

export type LoadMetadataResult = {
  loaded: LoadedRunMetadata[];
  warnings: PipelineWarning[];
};

/**
 * Loads every run's exported record from its deterministic path. Missing files
 * are always reported; they abort the load unless `skipMissing` is set, in which
 * case those runs are left out.
 */
export async function readMetadataRecords(
  runs: Run[],
  baseName: string,
  options: { skipMissing: boolean; log?: RunLog }
): Promise<LoadMetadataResult> {
  const warnings: PipelineWarning[] = [];
  const missing: string[] = [];
  const found: Array<{ run: Run; path: string }> = [];

  for (const run of runs) {
    const filePath = metadataPathForRun(run, baseName);
    if (await fileExists(filePath)) {
      found.push({ run, path: filePath });
      continue;
    }
    missing.push(filePath);
    const action = options.skipMissing ? "skipping run" : "cannot compare";
    const message = `No plot metadata for run "${run.name}" at ${filePath}; ${action}.`;
    warnings.push({ code: "metadata_missing", message, detail: filePath });
    options.log?.warn(message);
  }

  if (missing.length > 0 && !options.skipMissing) throw new MetadataMissingError(missing);

  const loaded: LoadedRunMetadata[] = [];
  for (const entry of found) {
    options.log?.log(`Loading plot metadata for "${entry.run.name}" from ${entry.path}`);
    loaded.push({ ...entry, record: await readMetadataRecord(entry.path) });
  }
  return { loaded, warnings };
}
