import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { errorMessage, fileExists, isMissingPath, listFilesNewestFirst, readYamlFile } from "./pipeline/utils.js";

export const CONFIG_FILENAME = "config.yml";

const ScriptTaskSchema = z
  .object({
    filename: z.string().min(1),
    interpreter: z.string().min(1).optional(),
    arguments: z.array(z.union([z.string(), z.number()]).transform((v) => String(v))).default([]),
    title: z.string().optional(),
    caption: z.string().optional(),
    section: z.string().optional(),
    output_file: z.string().min(1).optional()
  })
  .strict();

const ConfigFileSchema = z
  .object({
    stylesheet: z.string().min(1).optional(),
    plot_directory: z.string().min(1).default("plots"),
    registration_file: z.string().min(1).optional(),
    observational_data_directory: z.string().min(1).default("observational_data"),
    title_prefix: z.string().default(""),
    scripts: z.array(ScriptTaskSchema).default([])
  })
  .strict();

export type ScriptTask = {
  filename: string;
  interpreter: string | null;
  arguments: readonly string[];
  title: string;
  caption: string;
  section: string;
  outputFile: string | null;
};

export type PipelineConfig = {
  readonly configDirectory: string;
  readonly stylesheetPath: string | null;
  readonly plotDirectory: string;
  readonly registrationFile: string | null;
  readonly observationalDataDirectory: string;
  readonly titlePrefix: string;
  readonly scripts: readonly ScriptTask[];
};

function resolveIn(configDirectory: string, value: string | undefined): string | null {
  return value ? path.resolve(configDirectory, value) : null;
}

/** Builds the immutable configuration value from an already-parsed `config.yml` body. */
export function parseConfig(configDirectory: string, raw: unknown): PipelineConfig {
  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${CONFIG_FILENAME} in ${configDirectory}: ${parsed.error.message}`);
  }

  const dir = path.resolve(configDirectory);
  const data = parsed.data;
  const scripts: ScriptTask[] = data.scripts.map((s) =>
    Object.freeze({
      filename: s.filename,
      interpreter: s.interpreter ?? null,
      arguments: Object.freeze([...s.arguments]),
      title: s.title ?? path.basename(s.filename),
      caption: s.caption ?? "",
      section: s.section ?? "Auxiliary figures",
      outputFile: s.output_file ?? null
    })
  );

  return Object.freeze({
    configDirectory: dir,
    stylesheetPath: resolveIn(dir, data.stylesheet),
    plotDirectory: path.resolve(dir, data.plot_directory),
    registrationFile: resolveIn(dir, data.registration_file),
    observationalDataDirectory: path.resolve(dir, data.observational_data_directory),
    titlePrefix: data.title_prefix,
    scripts: Object.freeze(scripts)
  });
}

/** Loads `config.yml` from the config directory; a missing file means all defaults. */
export async function loadConfig(configDirectory: string): Promise<PipelineConfig> {
  const filePath = path.join(configDirectory, CONFIG_FILENAME);
  if (!(await fileExists(filePath))) return parseConfig(configDirectory, {});

  let raw: unknown;
  try {
    raw = await readYamlFile(filePath);
  } catch (err) {
    throw new ConfigError(`Could not parse ${filePath}: ${errorMessage(err)}`);
  }
  return parseConfig(configDirectory, raw);
}

/** Plot configuration files, most recently modified first. */
export async function plotConfigFiles(config: PipelineConfig): Promise<string[]> {
  try {
    return await listFilesNewestFirst(config.plotDirectory, [".yml", ".yaml"]);
  } catch (err) {
    if (isMissingPath(err)) throw new ConfigError(`Plot directory ${config.plotDirectory} does not exist.`);
    throw err;
  }
}
