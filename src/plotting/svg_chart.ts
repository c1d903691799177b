import type { LineSeries } from "./contracts.js";

export type ChartInput = {
  title: string;
  xLabel: string;
  yLabel: string;
  xLog: boolean;
  yLog: boolean;
  lines: LineSeries[];
  observational: LineSeries[];
};

const WIDTH = 640;
const HEIGHT = 480;
const MARGIN = { top: 40, right: 20, bottom: 56, left: 72 };
const PALETTE = ["#1d4ed8", "#b91c1c", "#047857", "#9333ea", "#c2410c", "#0f766e"];
const OBSERVATIONAL_COLOR = "#475569";

export function escapeXml(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll("\"", "&quot;")
    .replaceAll("'", "&#39;");
}

type Range = { min: number; max: number };

function axisRange(values: number[], log: boolean): Range {
  const usable = values.filter((v) => Number.isFinite(v) && (!log || v > 0));
  if (usable.length === 0) return log ? { min: 1, max: 10 } : { min: 0, max: 1 };
  let min = Math.min(...usable);
  let max = Math.max(...usable);
  if (log) {
    min = Math.log10(min);
    max = Math.log10(max);
  }
  if (min === max) {
    min -= 0.5;
    max += 0.5;
  }
  return { min, max };
}

function project(value: number, range: Range, log: boolean, pixelsFrom: number, pixelsTo: number): number | null {
  if (!Number.isFinite(value) || (log && value <= 0)) return null;
  const v = log ? Math.log10(value) : value;
  return pixelsFrom + ((v - range.min) / (range.max - range.min)) * (pixelsTo - pixelsFrom);
}

function formatTick(value: number, log: boolean): string {
  if (log) return `1e${Math.round(value)}`;
  const abs = Math.abs(value);
  if (abs !== 0 && (abs >= 1e4 || abs < 1e-2)) return value.toExponential(1);
  return String(Number(value.toFixed(2)));
}

function ticks(range: Range, log: boolean): number[] {
  if (log) {
    const out: number[] = [];
    for (let d = Math.ceil(range.min); d <= Math.floor(range.max); d++) out.push(d);
    if (out.length > 0) return out;
  }
  return Array.from({ length: 5 }, (_, i) => range.min + ((range.max - range.min) * i) / 4);
}

function polyline(
  series: LineSeries,
  xRange: Range,
  yRange: Range,
  input: ChartInput,
  style: { color: string; dashed: boolean }
): string {
  const px = (v: number) => project(v, xRange, input.xLog, MARGIN.left, WIDTH - MARGIN.right);
  const py = (v: number) => project(v, yRange, input.yLog, HEIGHT - MARGIN.bottom, MARGIN.top);
  const points: string[] = [];
  for (let i = 0; i < Math.min(series.x.length, series.y.length); i++) {
    const x = px(series.x[i]);
    const y = py(series.y[i]);
    if (x === null || y === null) continue;
    points.push(`${x.toFixed(1)},${y.toFixed(1)}`);
  }
  const dash = style.dashed ? ` stroke-dasharray="6 4"` : "";
  const parts = [`<polyline fill="none" stroke="${style.color}" stroke-width="2"${dash} points="${points.join(" ")}"/>`];

  if (series.yLow && series.yHigh) {
    const band: string[] = [];
    const low: string[] = [];
    for (let i = 0; i < series.x.length; i++) {
      const x = px(series.x[i]);
      const hi = py(series.yHigh[i]);
      const lo = py(series.yLow[i]);
      if (x === null || hi === null || lo === null) continue;
      band.push(`${x.toFixed(1)},${hi.toFixed(1)}`);
      low.unshift(`${x.toFixed(1)},${lo.toFixed(1)}`);
    }
    if (band.length > 1) {
      parts.unshift(`<polygon fill="${style.color}" fill-opacity="0.15" stroke="none" points="${[...band, ...low].join(" ")}"/>`);
    }
  }
  return parts.join("\n");
}

export function buildLineChartSvg(input: ChartInput): string {
  const all = [...input.lines, ...input.observational];
  const xRange = axisRange(all.flatMap((s) => s.x), input.xLog);
  const yRange = axisRange(
    all.flatMap((s) => [...s.y, ...(s.yLow ?? []), ...(s.yHigh ?? [])]),
    input.yLog
  );

  const plotBottom = HEIGHT - MARGIN.bottom;
  const plotRight = WIDTH - MARGIN.right;
  const out: string[] = [];
  out.push(`<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}">`);
  out.push(`<rect width="${WIDTH}" height="${HEIGHT}" fill="#ffffff"/>`);
  out.push(`<text x="${WIDTH / 2}" y="24" text-anchor="middle" font-family="sans-serif" font-size="16">${escapeXml(input.title)}</text>`);
  out.push(
    `<rect x="${MARGIN.left}" y="${MARGIN.top}" width="${plotRight - MARGIN.left}" height="${plotBottom - MARGIN.top}" fill="none" stroke="#111827"/>`
  );

  for (const t of ticks(xRange, input.xLog)) {
    const x = MARGIN.left + ((t - xRange.min) / (xRange.max - xRange.min)) * (plotRight - MARGIN.left);
    out.push(`<line x1="${x.toFixed(1)}" y1="${plotBottom}" x2="${x.toFixed(1)}" y2="${plotBottom + 5}" stroke="#111827"/>`);
    out.push(
      `<text x="${x.toFixed(1)}" y="${plotBottom + 18}" text-anchor="middle" font-family="sans-serif" font-size="11">${formatTick(t, input.xLog)}</text>`
    );
  }
  for (const t of ticks(yRange, input.yLog)) {
    const y = plotBottom - ((t - yRange.min) / (yRange.max - yRange.min)) * (plotBottom - MARGIN.top);
    out.push(`<line x1="${MARGIN.left - 5}" y1="${y.toFixed(1)}" x2="${MARGIN.left}" y2="${y.toFixed(1)}" stroke="#111827"/>`);
    out.push(
      `<text x="${MARGIN.left - 8}" y="${(y + 4).toFixed(1)}" text-anchor="end" font-family="sans-serif" font-size="11">${formatTick(t, input.yLog)}</text>`
    );
  }

  out.push(
    `<text x="${(MARGIN.left + plotRight) / 2}" y="${HEIGHT - 14}" text-anchor="middle" font-family="sans-serif" font-size="13">${escapeXml(input.xLabel)}</text>`
  );
  out.push(
    `<text transform="translate(18 ${(MARGIN.top + plotBottom) / 2}) rotate(-90)" text-anchor="middle" font-family="sans-serif" font-size="13">${escapeXml(input.yLabel)}</text>`
  );

  input.observational.forEach((series) => {
    out.push(polyline(series, xRange, yRange, input, { color: OBSERVATIONAL_COLOR, dashed: true }));
  });
  input.lines.forEach((series, i) => {
    out.push(polyline(series, xRange, yRange, input, { color: PALETTE[i % PALETTE.length], dashed: false }));
  });

  const legend = [
    ...input.lines.map((s, i) => ({ label: s.label, color: PALETTE[i % PALETTE.length], dashed: false })),
    ...input.observational.map((s) => ({ label: s.label, color: OBSERVATIONAL_COLOR, dashed: true }))
  ];
  legend.forEach((entry, i) => {
    const y = MARGIN.top + 16 + i * 16;
    const dash = entry.dashed ? ` stroke-dasharray="6 4"` : "";
    out.push(`<line x1="${plotRight - 150}" y1="${y - 4}" x2="${plotRight - 126}" y2="${y - 4}" stroke="${entry.color}" stroke-width="2"${dash}/>`);
    out.push(`<text x="${plotRight - 120}" y="${y}" font-family="sans-serif" font-size="11">${escapeXml(entry.label)}</text>`);
  });

  out.push("</svg>");
  return `${out.join("\n")}\n`;
}
