import fs from "node:fs/promises";
import path from "node:path";
import * as YAML from "yaml";

export const FIGURE_EXTENSION = "png";
export const REPORT_FILENAME = "index.html";

export function nowIso(): string {
  return new Date().toISOString();
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export function isMissingPath(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

async function atomicWrite(filePath: string, data: string | Buffer): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  await fs.writeFile(tmpPath, data);
  await fs.rename(tmpPath, filePath);
}

export async function writeTextFile(filePath: string, text: string): Promise<void> {
  const out = text.endsWith("\n") ? text : `${text}\n`;
  await atomicWrite(filePath, out);
}

export async function writeYamlFile(filePath: string, obj: unknown): Promise<void> {
  await atomicWrite(filePath, YAML.stringify(obj));
}

export async function readYamlFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  return YAML.parse(raw);
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  return JSON.parse(raw);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Basename without its last extension: `snapshot_0000.hdf5` -> `snapshot_0000`. */
export function fileStem(filePath: string): string {
  const base = path.basename(filePath);
  const ext = path.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

/** Files in `dirPath` matching `extensions`, most recently modified first. */
export async function listFilesNewestFirst(dirPath: string, extensions: string[]): Promise<string[]> {
  const names = await fs.readdir(dirPath);
  const withTimes: Array<{ filePath: string; mtimeMs: number }> = [];
  for (const name of names) {
    if (!extensions.includes(path.extname(name).toLowerCase())) continue;
    const filePath = path.join(dirPath, name);
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) continue;
    withTimes.push({ filePath, mtimeMs: stat.mtimeMs });
  }

  // Equal timestamps fall back to name order so the result is stable.
  withTimes.sort((a, b) => b.mtimeMs - a.mtimeMs || a.filePath.localeCompare(b.filePath));
  return withTimes.map((f) => f.filePath);
}
