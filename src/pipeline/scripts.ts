import { spawn } from "node:child_process";
import path from "node:path";
import type { ScriptTask } from "../config.js";
import { ScriptFailedError } from "../errors.js";
import type { RunLog } from "../run_log.js";
import type { PipelineWarning } from "./warnings.js";

export type ScriptContext = {
  snapshots: string[];
  catalogues: string[];
  inputDirectories: string[];
  runNames: string[];
  outputDirectory: string;
  configDirectory: string;
};

export type ScriptResult = {
  task: ScriptTask;
  command: string;
  args: string[];
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  error?: string;
  ok: boolean;
  durationMs: number;
};

export type DispatchResult = {
  results: ScriptResult[];
  warnings: PipelineWarning[];
};

const INTERPRETERS_BY_EXTENSION: Record<string, string> = {
  ".py": "python3",
  ".sh": "bash",
  ".js": process.execPath,
  ".mjs": process.execPath,
  ".cjs": process.execPath
};

/**
 * Positional contract every auxiliary script receives: N snapshots, N catalogues,
 * N input directories, N run names, the output directory and the configuration
 * directory, followed by the task's own arguments.
 */
export function scriptArguments(task: ScriptTask, ctx: ScriptContext): string[] {
  return [
    ...ctx.snapshots,
    ...ctx.catalogues,
    ...ctx.inputDirectories,
    ...ctx.runNames,
    ctx.outputDirectory,
    ctx.configDirectory,
    ...task.arguments
  ];
}

export function scriptInvocation(task: ScriptTask, ctx: ScriptContext): { command: string; args: string[] } {
  const scriptPath = path.resolve(ctx.configDirectory, task.filename);
  const interpreter = task.interpreter ?? INTERPRETERS_BY_EXTENSION[path.extname(scriptPath).toLowerCase()];
  const contract = scriptArguments(task, ctx);
  if (!interpreter) return { command: scriptPath, args: contract };

  const [command, ...interpreterArgs] = interpreter.trim().split(/\s+/);
  return { command, args: [...interpreterArgs, scriptPath, ...contract] };
}

function forwardLines(text: string, emit: (line: string) => void): void {
  for (const line of text.split(/\r?\n/)) {
    if (line.trim().length > 0) emit(line);
  }
}

export async function runScript(task: ScriptTask, ctx: ScriptContext, log?: RunLog): Promise<ScriptResult> {
  const { command, args } = scriptInvocation(task, ctx);
  const startedAt = Date.now();
  log?.log(`Running auxiliary script ${task.filename}`);

  const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"], env: process.env });
  const out = { stdout: "", stderr: "" };
  child.stdout?.setEncoding("utf8");
  child.stderr?.setEncoding("utf8");
  child.stdout?.on("data", (chunk: string) => {
    out.stdout += chunk;
  });
  child.stderr?.on("data", (chunk: string) => {
    out.stderr += chunk;
  });

  return await new Promise<ScriptResult>((resolve) => {
    let settled = false;
    const settle = (exitCode: number | null, signal: NodeJS.Signals | null, error?: string) => {
      if (settled) return;
      settled = true;
      forwardLines(out.stdout, (line) => log?.log(`[${task.filename}] ${line}`));
      forwardLines(out.stderr, (line) => log?.warn(`[${task.filename}] ${line}`));
      resolve({
        task,
        command,
        args,
        exitCode,
        signal,
        stdout: out.stdout,
        stderr: out.stderr,
        ...(error ? { error } : {}),
        ok: !error && exitCode === 0,
        durationMs: Date.now() - startedAt
      });
    };

    child.on("error", (err: Error) => settle(null, null, err.message));
    child.on("close", (code: number | null, signal: NodeJS.Signals | null) => settle(code, signal));
  });
}

function describeFailure(result: ScriptResult): string {
  if (result.error) return result.error;
  if (result.signal) return `terminated by ${result.signal}`;
  return `exit code ${result.exitCode ?? "unknown"}`;
}

/**
 * Runs each task to completion before starting the next; later scripts may read
 * what earlier ones wrote to the output directory.
 */
export async function dispatchScripts(
  tasks: readonly ScriptTask[],
  ctx: ScriptContext,
  options: { failOnError: boolean; log?: RunLog }
): Promise<DispatchResult> {
  const results: ScriptResult[] = [];
  const warnings: PipelineWarning[] = [];

  for (const task of tasks) {
    const result = await runScript(task, ctx, options.log);
    results.push(result);
    if (result.ok) continue;

    const reason = describeFailure(result);
    if (options.failOnError) {
      throw new ScriptFailedError(task.filename, result.exitCode, result.error ?? result.stderr.trim());
    }
    const message = `Auxiliary script ${task.filename} failed (${reason}).`;
    warnings.push({ code: "script_failed", message, detail: result.stderr.trim() || undefined });
    options.log?.error(message);
  }

  return { results, warnings };
}
