import type { PipelineConfig } from "../config.js";
import type { SnapshotHandle, SnapshotMetadataValue } from "../plotting/contracts.js";
import type { Run } from "./runs.js";
import type { ScriptResult } from "./scripts.js";
import { writeTextFile } from "./utils.js";

export type FigureEntry = {
  filename: string;
  title: string;
  caption: string;
  section: string;
  image: string | null;
  note?: string;
};

export type RunMetadataEntry = {
  run: Run;
  snapshot: SnapshotHandle | null;
};

export const DEFAULT_STYLESHEET = `
body { font-family: sans-serif; margin: 2rem auto; max-width: 1200px; color: #111827; }
h1 { border-bottom: 2px solid #1d4ed8; padding-bottom: 0.5rem; }
.figures { display: grid; grid-template-columns: repeat(auto-fill, minmax(320px, 1fr)); gap: 1rem; }
figure { margin: 0; border: 1px solid #e5e7eb; padding: 0.5rem; }
figure img { width: 100%; }
figcaption { font-size: 0.9rem; }
.note { color: #b91c1c; }
table { border-collapse: collapse; margin-bottom: 1rem; }
td, th { border: 1px solid #e5e7eb; padding: 0.25rem 0.5rem; text-align: left; }
`.trim();

export function escapeHtml(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll("\"", "&quot;")
    .replaceAll("'", "&#39;");
}

function slugId(value: string): string {
  return (
    value
      .trim()
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, "-")
      .replace(/^-+|-+$/g, "") || "section"
  );
}

/** Groups entries by section label, keeping the order in which sections first appear. */
export function groupBySection<T extends { section: string }>(entries: T[]): Array<{ section: string; entries: T[] }> {
  const groups = new Map<string, T[]>();
  for (const entry of entries) {
    const list = groups.get(entry.section);
    if (list) list.push(entry);
    else groups.set(entry.section, [entry]);
  }
  return [...groups.entries()].map(([section, list]) => ({ section, entries: list }));
}

function flattenMetadata(metadata: SnapshotHandle["metadata"]): Array<[string, SnapshotMetadataValue]> {
  const rows: Array<[string, SnapshotMetadataValue]> = [];
  for (const [key, value] of Object.entries(metadata)) {
    if (value !== null && typeof value === "object") {
      for (const [inner, innerValue] of Object.entries(value)) rows.push([`${key}.${inner}`, innerValue]);
    } else {
      rows.push([key, value]);
    }
  }
  return rows;
}

function tableRows(rows: Array<[string, string]>): string {
  return rows.map(([k, v]) => `<tr><th>${escapeHtml(k)}</th><td>${escapeHtml(v)}</td></tr>`).join("\n");
}

function renderFigure(entry: FigureEntry): string {
  const image = entry.image ? `<img src="${escapeHtml(entry.image)}" alt="${escapeHtml(entry.title)}">` : "";
  const note = entry.note ? `<p class="note">${escapeHtml(entry.note)}</p>` : "";
  return [
    `<figure id="${escapeHtml(entry.filename)}">`,
    image,
    `<figcaption><strong>${escapeHtml(entry.title)}</strong>${entry.caption ? ` ${escapeHtml(entry.caption)}` : ""}</figcaption>`,
    note,
    "</figure>"
  ]
    .filter((part) => part.length > 0)
    .join("\n");
}

/**
 * Page model for the report. Sections are added by successive enrichment calls
 * and rendered in the order the sections were added.
 */
export class WebpageCreator {
  private title = "Report";
  private stylesheet = DEFAULT_STYLESHEET;
  private readonly sections: string[] = [];

  addTitle(title: string): this {
    this.title = title;
    return this;
  }

  addStylesheet(css: string): this {
    this.stylesheet = css;
    return this;
  }

  addPlotMetadata(figures: FigureEntry[]): this {
    for (const group of groupBySection(figures)) {
      this.sections.push(
        [
          `<section id="${slugId(group.section)}">`,
          `<h2>${escapeHtml(group.section)}</h2>`,
          `<div class="figures">`,
          ...group.entries.map(renderFigure),
          "</div>",
          "</section>"
        ].join("\n")
      );
    }
    return this;
  }

  addConfig(config: PipelineConfig): this {
    const rows: Array<[string, string]> = [
      ["Configuration directory", config.configDirectory],
      ["Plot directory", config.plotDirectory],
      ["Observational data", config.observationalDataDirectory],
      ["Registration file", config.registrationFile ?? "(none)"],
      ["Stylesheet", config.stylesheetPath ?? "(default)"],
      ["Auxiliary scripts", String(config.scripts.length)]
    ];
    this.sections.push(`<section id="configuration">\n<h2>Configuration</h2>\n<table>\n${tableRows(rows)}\n</table>\n</section>`);
    return this;
  }

  addRunMetadata(entries: RunMetadataEntry[]): this {
    const blocks = entries.map(({ run, snapshot }) => {
      const rows: Array<[string, string]> = [
        ["Snapshot", run.snapshotPath],
        ["Catalogue", run.cataloguePath],
        ["Input directory", run.inputDirectory],
        ...flattenMetadata(snapshot?.metadata ?? {}).map(([k, v]): [string, string] => [k, String(v)])
      ];
      return `<h3>${escapeHtml(run.name)}</h3>\n<table>\n${tableRows(rows)}\n</table>`;
    });
    this.sections.push(`<section id="runs">\n<h2>Runs</h2>\n${blocks.join("\n")}\n</section>`);
    return this;
  }

  addScriptResults(results: ScriptResult[]): this {
    if (results.length === 0) return this;
    const figures: FigureEntry[] = results.map((result) => ({
      filename: result.task.outputFile ?? result.task.filename,
      title: result.task.title,
      caption: result.task.caption,
      section: result.task.section,
      image: result.ok ? result.task.outputFile : null,
      ...(result.ok ? {} : { note: `Script ${result.task.filename} failed (exit ${result.exitCode ?? "none"}).` })
    }));
    return this.addPlotMetadata(figures);
  }

  render(): string {
    return [
      "<!DOCTYPE html>",
      `<html lang="en">`,
      "<head>",
      `<meta charset="utf-8">`,
      `<title>${escapeHtml(this.title)}</title>`,
      `<style>\n${this.stylesheet}\n</style>`,
      "</head>",
      "<body>",
      `<h1>${escapeHtml(this.title)}</h1>`,
      ...this.sections,
      "</body>",
      "</html>"
    ].join("\n");
  }

  async save(filePath: string): Promise<void> {
    await writeTextFile(filePath, this.render());
  }
}
