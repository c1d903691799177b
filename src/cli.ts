import { Command } from "commander";
import { DEFAULT_METADATA_BASE_NAME } from "./pipeline/metadata.js";

export type CliOptions = {
  configDirectory: string;
  catalogues: string[];
  snapshots: string[];
  outputDirectory: string;
  inputDirectories: string[];
  metadataBaseName: string;
  runNames: string[] | undefined;
  debug: boolean;
  skipMissingMetadata: boolean;
  failOnScriptError: boolean;
};

type RawOptions = {
  config: string;
  catalogues: string[];
  snapshots: string[];
  output: string;
  inputDirectories?: string[];
  metadata: string;
  runNames?: string[];
  debug?: boolean;
  skipMissingMetadata?: boolean;
  failOnScriptError?: boolean;
};

function envFlag(name: string, env: NodeJS.ProcessEnv): boolean {
  const raw = env[name]?.trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

export function buildProgram(): Command {
  return new Command()
    .name("halo-pipeline")
    .description("Build a figure report for one simulation run, or compare several runs from their exported plot metadata.")
    .requiredOption("-C, --config <dir>", "configuration directory (config.yml, plot definitions, stylesheet)")
    .requiredOption("-c, --catalogues <files...>", "halo catalogue file for each run")
    .requiredOption("-s, --snapshots <files...>", "snapshot file for each run")
    .requiredOption("-o, --output <dir>", "output directory for figures and the report")
    .option("-i, --input-directories <dirs...>", "base directory for each run's files (default: current directory)")
    .option("-m, --metadata <name>", "base name of the exported plot metadata files", DEFAULT_METADATA_BASE_NAME)
    .option("-n, --run-names <names...>", "names for the runs, in run order")
    .option("-d, --debug", "print progress and diagnostics")
    .option("--skip-missing-metadata", "in comparison mode, leave out runs without exported metadata")
    .option("--fail-on-script-error", "stop when an auxiliary script fails");
}

/**
 * Parses user arguments (without the node and script entries). Input directories
 * default to "." for every snapshot when none are given.
 */
export function parseCliArguments(argv: string[], env: NodeJS.ProcessEnv = process.env, program = buildProgram()): CliOptions {
  program.parse(argv, { from: "user" });
  const raw = program.opts<RawOptions>();

  return {
    configDirectory: raw.config,
    catalogues: raw.catalogues,
    snapshots: raw.snapshots,
    outputDirectory: raw.output,
    inputDirectories: raw.inputDirectories ?? raw.snapshots.map(() => "."),
    metadataBaseName: raw.metadata,
    runNames: raw.runNames,
    debug: Boolean(raw.debug) || envFlag("HALO_PIPELINE_DEBUG", env),
    skipMissingMetadata: Boolean(raw.skipMissingMetadata),
    failOnScriptError: Boolean(raw.failOnScriptError) || envFlag("HALO_PIPELINE_FAIL_ON_SCRIPT_ERROR", env)
  };
}
