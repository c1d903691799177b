import type { BinSpec, LineSeries } from "./contracts.js";

/** Bin edges over [start, end], log-spaced when `log` is set. */
export function binEdges(bins: BinSpec, log: boolean): number[] {
  const edges: number[] = [];
  if (log) {
    const lo = Math.log10(bins.start);
    const hi = Math.log10(bins.end);
    for (let i = 0; i <= bins.count; i++) edges.push(10 ** (lo + ((hi - lo) * i) / bins.count));
  } else {
    for (let i = 0; i <= bins.count; i++) edges.push(bins.start + ((bins.end - bins.start) * i) / bins.count);
  }
  return edges;
}

function binCentre(lo: number, hi: number, log: boolean): number {
  return log ? Math.sqrt(lo * hi) : (lo + hi) / 2;
}

/** Index of the bin holding `value`, or -1. The last bin is closed on the right. */
export function binIndex(edges: number[], value: number): number {
  const last = edges.length - 1;
  if (!(value >= edges[0] && value <= edges[last])) return -1;
  if (value === edges[last]) return last - 1;
  let lo = 0;
  let hi = last;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (value >= edges[mid]) lo = mid;
    else hi = mid;
  }
  return lo;
}

/** Linear-interpolated percentile of an ascending array, `q` in [0, 100]. */
export function percentile(sorted: number[], q: number): number {
  if (sorted.length === 0) return Number.NaN;
  if (sorted.length === 1) return sorted[0];
  const pos = ((sorted.length - 1) * q) / 100;
  const below = Math.floor(pos);
  const above = Math.min(sorted.length - 1, below + 1);
  return sorted[below] + (sorted[above] - sorted[below]) * (pos - below);
}

function groupByBin(x: number[], y: number[], edges: number[]): number[][] {
  const groups: number[][] = Array.from({ length: edges.length - 1 }, () => []);
  const n = Math.min(x.length, y.length);
  for (let i = 0; i < n; i++) {
    if (!Number.isFinite(y[i])) continue;
    const idx = binIndex(edges, x[i]);
    if (idx >= 0) groups[idx].push(y[i]);
  }
  return groups;
}

export function binnedMedian(label: string, x: number[], y: number[], bins: BinSpec, xLog: boolean): LineSeries {
  const edges = binEdges(bins, xLog);
  const out: LineSeries = { label, x: [], y: [], yLow: [], yHigh: [] };
  groupByBin(x, y, edges).forEach((values, i) => {
    if (values.length === 0) return;
    const sorted = [...values].sort((a, b) => a - b);
    out.x.push(binCentre(edges[i], edges[i + 1], xLog));
    out.y.push(percentile(sorted, 50));
    out.yLow?.push(percentile(sorted, 16));
    out.yHigh?.push(percentile(sorted, 84));
  });
  return out;
}

export function binnedMean(label: string, x: number[], y: number[], bins: BinSpec, xLog: boolean): LineSeries {
  const edges = binEdges(bins, xLog);
  const out: LineSeries = { label, x: [], y: [], yLow: [], yHigh: [] };
  groupByBin(x, y, edges).forEach((values, i) => {
    if (values.length === 0) return;
    const mean = values.reduce((acc, v) => acc + v, 0) / values.length;
    const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / values.length;
    const std = Math.sqrt(variance);
    out.x.push(binCentre(edges[i], edges[i + 1], xLog));
    out.y.push(mean);
    out.yLow?.push(mean - std);
    out.yHigh?.push(mean + std);
  });
  return out;
}

export function histogram(label: string, x: number[], bins: BinSpec, xLog: boolean): LineSeries {
  const edges = binEdges(bins, xLog);
  const counts = new Array<number>(bins.count).fill(0);
  for (const value of x) {
    const idx = binIndex(edges, value);
    if (idx >= 0) counts[idx] += 1;
  }
  return {
    label,
    x: counts.map((_, i) => binCentre(edges[i], edges[i + 1], xLog)),
    y: counts
  };
}
