import { plotConfigFiles, type PipelineConfig } from "../config.js";
import { ConfigError, MetadataMissingError } from "../errors.js";
import type { CatalogueLoader, PlotDefinition, PlotSpec, PlottingBackend, ProgressObserver, SnapshotHandle, SnapshotLoader } from "../plotting/contracts.js";
import { LinePlotBackend } from "../plotting/line_backend.js";
import { jsonCatalogueLoader, jsonSnapshotLoader } from "../plotting/loaders.js";
import { RunLog } from "../run_log.js";
import { detectFilenameCollisions, type FilenameCollision } from "./collisions.js";
import {
  buildMetadataRecord,
  metadataPathForRun,
  readMetadataRecords,
  selectMode,
  writeMetadataRecord,
  type PipelineMode
} from "./metadata.js";
import { mergePlotDefinitions, reconstructComparison } from "./reconstruct.js";
import { buildReport, reportTitle, writeReport, type PipelineMetadata, type StandaloneMetadata } from "./report.js";
import { alignRunInputs, buildRuns, defaultRunName, uniqueRunNames, type Run } from "./runs.js";
import { dispatchScripts, type ScriptResult } from "./scripts.js";
import { errorMessage, FIGURE_EXTENSION, fileExists, nowIso } from "./utils.js";
import type { PipelineWarning } from "./warnings.js";

export type PipelineInput = {
  config: PipelineConfig;
  snapshots: string[];
  catalogues: string[];
  inputDirectories: string[];
  outputDirectory: string;
  metadataBaseName: string;
  runNames?: string[];
  skipMissingMetadata?: boolean;
  failOnScriptError?: boolean;
};

export type PipelineDeps = {
  backend: PlottingBackend;
  catalogueLoader: CatalogueLoader;
  snapshotLoader: SnapshotLoader;
  log: RunLog;
  observer?: ProgressObserver;
  now?: () => string;
};

export type PipelineResult = {
  mode: PipelineMode;
  runs: Run[];
  plots: PlotSpec[];
  metadata: PipelineMetadata;
  collisions: FilenameCollision[];
  scripts: ScriptResult[];
  warnings: PipelineWarning[];
  reportPath: string;
  metadataPath?: string;
};

export function defaultPipelineDeps(log = new RunLog()): PipelineDeps {
  return {
    backend: new LinePlotBackend(),
    catalogueLoader: jsonCatalogueLoader,
    snapshotLoader: jsonSnapshotLoader,
    log
  };
}

async function loadSnapshotHeader(
  snapshotPath: string,
  mode: PipelineMode,
  deps: PipelineDeps
): Promise<SnapshotHandle | null> {
  // Comparison runs only need exported metadata, so a missing header is not an error there.
  if (mode === "comparison" && !(await fileExists(snapshotPath))) {
    deps.log.log(`Snapshot ${snapshotPath} not found; run metadata will be limited to file names.`);
    return null;
  }
  return await deps.snapshotLoader.load(snapshotPath);
}

async function runStandalone(
  run: Run,
  input: PipelineInput,
  deps: PipelineDeps,
  warnings: PipelineWarning[]
): Promise<{ definitions: PlotDefinition[]; plots: PlotSpec[]; metadata: StandaloneMetadata }> {
  const config = input.config;
  const log = deps.log;
  log.log(`Loading catalogue ${run.cataloguePath}`);
  const catalogue = await deps.catalogueLoader.load(run.cataloguePath, config.registrationFile ?? undefined);

  const plotSet = await deps.backend.create(await plotConfigFiles(config), config.observationalDataDirectory);
  // Same rule as comparison mode: the newest configuration file wins a shared filename.
  const linked = deps.backend.link({ ...plotSet, definitions: mergePlotDefinitions(plotSet.definitions) }, catalogue);
  const plots = await deps.backend.render(linked, input.outputDirectory, FIGURE_EXTENSION, deps.observer);
  log.log(`Rendered ${plots.length} figure(s) for "${run.name}"`);

  const record = buildMetadataRecord(run, plots, (deps.now ?? nowIso)());
  const metadataPath = metadataPathForRun(run, input.metadataBaseName);
  let written = false;
  try {
    await writeMetadataRecord(metadataPath, record);
    written = true;
    log.log(`Wrote plot metadata to ${metadataPath}`);
  } catch (err) {
    const message = `Could not write plot metadata to ${metadataPath}: ${errorMessage(err)}`;
    warnings.push({ code: "metadata_write_failed", message, detail: metadataPath });
    log.error(message);
  }

  return { definitions: plotSet.definitions, plots, metadata: { mode: "standalone", record, path: metadataPath, written } };
}

async function runComparison(
  runs: Run[],
  input: PipelineInput,
  deps: PipelineDeps,
  warnings: PipelineWarning[]
): Promise<{ definitions: PlotDefinition[]; plots: PlotSpec[]; metadata: PipelineMetadata }> {
  const loadedMetadata = await readMetadataRecords(runs, input.metadataBaseName, {
    skipMissing: input.skipMissingMetadata ?? false,
    log: deps.log
  });
  warnings.push(...loadedMetadata.warnings);
  if (loadedMetadata.loaded.length === 0) {
    throw new MetadataMissingError(runs.map((run) => metadataPathForRun(run, input.metadataBaseName)));
  }

  const plotSet = await deps.backend.create(await plotConfigFiles(input.config), input.config.observationalDataDirectory);
  const result = await reconstructComparison({
    definitions: plotSet.definitions,
    loaded: loadedMetadata.loaded,
    backend: deps.backend,
    outputDirectory: input.outputDirectory,
    extension: FIGURE_EXTENSION,
    log: deps.log,
    observer: deps.observer
  });
  warnings.push(...result.warnings);
  deps.log.log(`Rendered ${result.plots.length} comparison figure(s)`);
  return { definitions: plotSet.definitions, plots: result.plots, metadata: result.metadata };
}

/**
 * Runs the whole report build in program order: mode selection, metadata round
 * trip, collision check, auxiliary scripts, report.
 */
export async function runPipeline(input: PipelineInput, deps: PipelineDeps): Promise<PipelineResult> {
  const warnings: PipelineWarning[] = [];
  const mode = selectMode(input.snapshots);
  deps.log.log(`Mode: ${mode}`);

  const aligned = alignRunInputs(input);
  warnings.push(...aligned.warnings);
  if (aligned.snapshots.length === 0) {
    throw new ConfigError("No complete run: each run needs a snapshot, a catalogue and an input directory.");
  }

  const drafts = buildRuns(aligned, aligned.snapshots.map(() => ""));
  const headers: Array<SnapshotHandle | null> = [];
  const rawNames: string[] = [];
  for (const [i, draft] of drafts.entries()) {
    const header = await loadSnapshotHeader(draft.snapshotPath, mode, deps);
    headers.push(header);
    rawNames.push(defaultRunName(draft.inputDirectory, input.runNames?.[i], header));
  }
  const named = uniqueRunNames(rawNames);
  warnings.push(...named.warnings);
  for (const warning of [...aligned.warnings, ...named.warnings]) deps.log.warn(warning.message);
  const runs = drafts.map((draft, i) => ({ ...draft, name: named.names[i] }));

  const produced =
    mode === "standalone" ? await runStandalone(runs[0], input, deps, warnings) : await runComparison(runs, input, deps, warnings);

  const collisionCheck = detectFilenameCollisions(produced.definitions, FIGURE_EXTENSION);
  warnings.push(...collisionCheck.warnings);
  for (const warning of collisionCheck.warnings) deps.log.warn(warning.message);

  const dispatched = await dispatchScripts(
    input.config.scripts,
    {
      snapshots: aligned.snapshots,
      catalogues: aligned.catalogues,
      inputDirectories: aligned.inputDirectories,
      runNames: runs.map((run) => run.name),
      outputDirectory: input.outputDirectory,
      configDirectory: input.config.configDirectory
    },
    { failOnError: input.failOnScriptError ?? false, log: deps.log }
  );
  warnings.push(...dispatched.warnings);

  const page = await buildReport({
    metadata: produced.metadata,
    config: input.config,
    runs: runs.map((run, i) => ({ run, snapshot: headers[i] })),
    title: reportTitle(input.config, runs.map((run) => run.name)),
    scripts: dispatched.results
  });
  const reportPath = await writeReport(page, input.outputDirectory);
  deps.log.log(`Wrote report to ${reportPath}`);

  return {
    mode,
    runs,
    plots: produced.plots,
    metadata: produced.metadata,
    collisions: collisionCheck.collisions,
    scripts: dispatched.results,
    warnings,
    reportPath,
    ...(produced.metadata.mode === "standalone" ? { metadataPath: produced.metadata.path } : {})
  };
}
