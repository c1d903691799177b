import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ConfigError } from "../src/errors.js";
import type { CatalogueHandle } from "../src/plotting/contracts.js";
import { LinePlotBackend, loadPlotDefinitions } from "../src/plotting/line_backend.js";
import { buildLineChartSvg, escapeXml } from "../src/plotting/svg_chart.js";

let tmp: string;
let obsDir: string;

beforeEach(async () => {
  tmp = await fs.mkdtemp(path.join(os.tmpdir(), "halo-backend-"));
  obsDir = path.join(tmp, "observational_data");
  await fs.mkdir(obsDir);
  await fs.writeFile(path.join(obsDir, "survey.yml"), "name: Survey 2020\nx: [1, 10]\ny: [2, 3]\n", "utf8");
});

afterEach(async () => {
  await fs.rm(tmp, { recursive: true, force: true });
});

async function writePlots(name: string, body: string): Promise<string> {
  const p = path.join(tmp, name);
  await fs.writeFile(p, body, "utf8");
  return p;
}

const MEDIAN_PLOT = [
  "density_temperature:",
  "  type: median",
  "  x: { quantity: density, label: Density }",
  "  y: { quantity: temperature }",
  "  bins: { count: 2, start: 0, end: 10 }",
  "  metadata: { title: Density and temperature, caption: Median gas temperature, section: Gas }",
  "  observational_data: [survey.yml]",
  ""
].join("\n");

const catalogue: CatalogueHandle = {
  path: "halos.json",
  length: 4,
  quantities: { density: [1, 2, 6, 8], temperature: [10, 20, 30, 50] },
  units: {}
};

describe("plot definitions", () => {
  it("reads definitions with defaults and observational overlays", async () => {
    const file = await writePlots("gas.yml", MEDIAN_PLOT);
    const [def] = await loadPlotDefinitions([file], obsDir);
    expect(def).toEqual({
      filename: "density_temperature",
      kind: "median",
      title: "Density and temperature",
      caption: "Median gas temperature",
      section: "Gas",
      x: { quantity: "density", label: "Density", log: false },
      y: { quantity: "temperature", label: "temperature", log: false },
      bins: { count: 2, start: 0, end: 10 },
      observational: [{ label: "Survey 2020", x: [1, 10], y: [2, 3] }],
      sourceFile: file
    });
  });

  it("keeps duplicates across files in file order", async () => {
    const a = await writePlots("a.yml", "mass_function:\n  type: histogram\n  x: { quantity: m200 }\n  bins: { count: 3, start: 0, end: 3 }\n");
    const b = await writePlots(
      "b.yml",
      "other:\n  type: histogram\n  filename: mass_function\n  x: { quantity: m200 }\n  bins: { count: 3, start: 0, end: 3 }\n"
    );
    const defs = await loadPlotDefinitions([a, b], obsDir);
    expect(defs.map((d) => [d.filename, d.title, d.section])).toEqual([
      ["mass_function", "Mass function", "Figures"],
      ["mass_function", "Mass function", "Figures"]
    ]);
  });

  it("rejects median plots without a y axis", async () => {
    const file = await writePlots("bad.yml", "p:\n  type: median\n  x: { quantity: a }\n  bins: { count: 2, start: 0, end: 1 }\n");
    await expect(loadPlotDefinitions([file], obsDir)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("LinePlotBackend", () => {
  it("renders one figure per definition and returns the plotted lines", async () => {
    const rasterize = vi.fn(async () => undefined);
    const backend = new LinePlotBackend({ rasterize });
    const plotSet = backend.link(await backend.create([await writePlots("gas.yml", MEDIAN_PLOT)], obsDir), catalogue);
    const observer = vi.fn();

    const specs = await backend.render(plotSet, path.join(tmp, "out"), "png", observer);

    expect(specs).toHaveLength(1);
    expect(specs[0].lines).toEqual([
      { label: "Median", x: [2.5, 7.5], y: [15, 40], yLow: [expect.closeTo(11.6), expect.closeTo(33.2)], yHigh: [expect.closeTo(18.4), expect.closeTo(46.8)] }
    ]);
    expect(specs[0]).toMatchObject({ filename: "density_temperature", xLabel: "Density", yLabel: "temperature", section: "Gas" });
    expect(rasterize).toHaveBeenCalledWith(expect.stringContaining("<svg"), path.join(tmp, "out", "density_temperature.png"));
    expect(observer).toHaveBeenCalledWith({ index: 0, total: 1, label: "density_temperature" });
  });

  it("fails when a plot needs a quantity the catalogue lacks", async () => {
    const backend = new LinePlotBackend({ rasterize: async () => undefined });
    const plotSet = backend.link(await backend.create([await writePlots("gas.yml", MEDIAN_PLOT)], obsDir), {
      ...catalogue,
      quantities: { density: [1] }
    });
    await expect(backend.render(plotSet, tmp, "png")).rejects.toThrow(/needs quantity temperature/);
  });

  it("refuses to render before a catalogue is linked", async () => {
    const backend = new LinePlotBackend({ rasterize: async () => undefined });
    await expect(backend.render({ definitions: [], catalogue: null }, tmp, "png")).rejects.toThrow(/no linked catalogue/);
  });

  it("labels composite lines by run name", async () => {
    const rasterize = vi.fn(async () => undefined);
    const backend = new LinePlotBackend({ rasterize });
    const [def] = (await backend.create([await writePlots("gas.yml", MEDIAN_PLOT)], obsDir)).definitions;

    const spec = await backend.renderOne(
      def,
      {
        "Run A": [{ label: "Median", x: [1], y: [2] }],
        "Run B": [
          { label: "Median", x: [1], y: [3] },
          { label: "Mean", x: [1], y: [4] }
        ]
      },
      tmp,
      "png"
    );

    expect(spec.lines.map((l) => l.label)).toEqual(["Run A", "Run B: Median", "Run B: Mean"]);
    expect(rasterize).toHaveBeenCalledTimes(1);
  });
});

describe("svg chart", () => {
  it("escapes text and draws one polyline per series", () => {
    const svg = buildLineChartSvg({
      title: "M<sub>*</sub> & friends",
      xLabel: "x",
      yLabel: "y",
      xLog: false,
      yLog: false,
      lines: [
        { label: "A", x: [0, 1], y: [0, 1] },
        { label: "B", x: [0, 1], y: [1, 0] }
      ],
      observational: [{ label: "Obs", x: [0, 1], y: [0.5, 0.5] }]
    });
    expect(svg).toContain(">M&lt;sub&gt;*&lt;/sub&gt; &amp; friends</text>");
    expect(svg.match(/<polyline /g)).toHaveLength(3);
    expect(svg.match(/stroke-dasharray="6 4" points=/g)).toHaveLength(1);
  });

  it("escapes quotes", () => {
    expect(escapeXml(`"a" 'b'`)).toBe("&quot;a&quot; &#39;b&#39;");
  });
});
