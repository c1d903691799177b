export type PipelineWarningCode =
  | "input_lists_truncated"
  | "duplicate_run_name"
  | "metadata_write_failed"
  | "metadata_missing"
  | "composite_render_failed"
  | "filename_collision"
  | "script_failed";

export type PipelineWarning = {
  code: PipelineWarningCode;
  message: string;
  detail?: string;
};
