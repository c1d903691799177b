export type PipelineErrorCode = "config_invalid" | "metadata_missing" | "metadata_invalid" | "script_failed";

export class PipelineError extends Error {
  code: PipelineErrorCode;
  constructor(code: PipelineErrorCode, message: string) {
    super(message);
    this.name = "PipelineError";
    this.code = code;
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super("config_invalid", message);
    this.name = "ConfigError";
  }
}

export class MetadataMissingError extends PipelineError {
  missingPaths: string[];
  constructor(missingPaths: string[]) {
    super("metadata_missing", `Missing plot metadata for comparison: ${missingPaths.join(", ")}`);
    this.name = "MetadataMissingError";
    this.missingPaths = missingPaths;
  }
}

export class MetadataInvalidError extends PipelineError {
  filePath: string;
  constructor(filePath: string, details: string) {
    super("metadata_invalid", `Invalid plot metadata in ${filePath}: ${details}`);
    this.name = "MetadataInvalidError";
    this.filePath = filePath;
  }
}

export class ScriptFailedError extends PipelineError {
  script: string;
  exitCode: number | null;
  constructor(script: string, exitCode: number | null, details: string) {
    super("script_failed", `Auxiliary script ${script} failed (exit ${exitCode ?? "none"})${details ? `: ${details}` : ""}`);
    this.name = "ScriptFailedError";
    this.script = script;
    this.exitCode = exitCode;
  }
}
