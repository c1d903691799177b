#!/usr/bin/env node
import dotenv from "dotenv";

dotenv.config();

// Dynamic imports so `.env` is loaded before any module reads process.env.
const { parseCliArguments } = await import("./cli.js");
const { loadConfig } = await import("./config.js");
const { PipelineError } = await import("./errors.js");
const { defaultPipelineDeps, runPipeline } = await import("./pipeline/pipeline.js");
const { RunLog, attachConsoleSink } = await import("./run_log.js");

const options = parseCliArguments(process.argv.slice(2));
const log = new RunLog();
attachConsoleSink(log, { debug: options.debug });

try {
  const config = await loadConfig(options.configDirectory);
  const deps = defaultPipelineDeps(log);
  if (options.debug) {
    deps.observer = ({ index, total, label }) => log.progress(`[${index + 1}/${total}] ${label}`);
  }

  const result = await runPipeline(
    {
      config,
      snapshots: options.snapshots,
      catalogues: options.catalogues,
      inputDirectories: options.inputDirectories,
      outputDirectory: options.outputDirectory,
      metadataBaseName: options.metadataBaseName,
      runNames: options.runNames,
      skipMissingMetadata: options.skipMissingMetadata,
      failOnScriptError: options.failOnScriptError
    },
    deps
  );

  const warningNote = result.warnings.length > 0 ? ` with ${result.warnings.length} warning(s)` : "";
  console.log(`${result.mode} report written to ${result.reportPath}${warningNote}`);
} catch (err) {
  const label = err instanceof PipelineError ? err.name : "Error";
  console.error(`${label}: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
}
