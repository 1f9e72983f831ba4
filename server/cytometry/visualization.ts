import type { Channel, Dataset } from "@shared/types/cytometry";
import { populationNames } from "./assembly";
import { CYTOMETRY_DEFAULTS } from "./config";
import { NoDataError } from "./errors";
import { extent } from "./stats";

const GLYPHS = ["#", "o", "+", "x", "*", "@", "%", "="] as const;

export interface HistogramSeries {
  population: string;
  counts: number[];
}

export interface Histogram {
  channel: Channel;
  edges: number[];
  series: HistogramSeries[];
}

export interface DensitySeries {
  population: string;
  cells: number[][];
}

export interface DensityGrid {
  xChannel: Channel;
  yChannel: Channel;
  logScale: boolean;
  xRange: [number, number];
  yRange: [number, number];
  width: number;
  height: number;
  series: DensitySeries[];
}

export interface DensityOptions {
  logScale?: boolean;
  width?: number;
  height?: number;
}

export interface OverviewOptions extends DensityOptions {
  bins?: number;
  barWidth?: number;
}

export function toLogScale(values: number[]): number[] {
  return values.map((v) => Math.log10(Math.max(v, 1)));
}

function binIndex(value: number, min: number, max: number, bins: number): number {
  if (max === min) return 0;
  const index = Math.floor(((value - min) / (max - min)) * bins);
  return Math.min(Math.max(index, 0), bins - 1);
}

function assertNotEmpty(dataset: Dataset): void {
  if (dataset.population.length === 0) throw new NoDataError();
}

function glyphFor(index: number): string {
  return GLYPHS[index % GLYPHS.length];
}

function axisLabel(channel: Channel, logScale: boolean): string {
  return logScale ? `${channel} (log)` : channel;
}

/** Bins are shared by all populations and span the channel's full range. */
export function histogram(
  dataset: Dataset,
  channel: Channel,
  bins: number = CYTOMETRY_DEFAULTS.histogramBins,
): Histogram {
  assertNotEmpty(dataset);
  if (!Number.isInteger(bins) || bins < 1) {
    throw new RangeError(`Histogram needs at least one bin, got ${bins}`);
  }

  const values = dataset[channel];
  const [min, max] = extent(values);
  const width = (max - min) / bins;
  const edges = Array.from({ length: bins + 1 }, (_, i) => (i === bins ? max : min + i * width));

  const names = populationNames(dataset);
  const byName = new Map(names.map((name) => [name, new Array<number>(bins).fill(0)] as const));
  values.forEach((value, i) => {
    const counts = byName.get(dataset.population[i]);
    if (counts) counts[binIndex(value, min, max, bins)] += 1;
  });

  return {
    channel,
    edges,
    series: names.map((population) => ({ population, counts: byName.get(population) ?? [] })),
  };
}

export function densityGrid(
  dataset: Dataset,
  xChannel: Channel,
  yChannel: Channel,
  options: DensityOptions = {},
): DensityGrid {
  assertNotEmpty(dataset);
  const { logScale = false, width = 60, height = 20 } = options;

  const xs = logScale ? toLogScale(dataset[xChannel]) : dataset[xChannel];
  const ys = logScale ? toLogScale(dataset[yChannel]) : dataset[yChannel];
  const xRange = extent(xs);
  const yRange = extent(ys);

  const names = populationNames(dataset);
  const byName = new Map(
    names.map((name) => [
      name,
      Array.from({ length: height }, () => new Array<number>(width).fill(0)),
    ] as const),
  );

  xs.forEach((x, i) => {
    const cells = byName.get(dataset.population[i]);
    if (!cells) return;
    const col = binIndex(x, xRange[0], xRange[1], width);
    const row = height - 1 - binIndex(ys[i], yRange[0], yRange[1], height);
    cells[row][col] += 1;
  });

  return {
    xChannel,
    yChannel,
    logScale,
    xRange,
    yRange,
    width,
    height,
    series: names.map((population) => ({ population, cells: byName.get(population) ?? [] })),
  };
}

function legend(populations: string[]): string {
  return populations.map((name, i) => `${glyphFor(i)} ${name}`).join("  ");
}

// Each cell shows the glyph of the population with the most events in it.
export function renderDensity(grid: DensityGrid): string {
  const lines = [
    `${axisLabel(grid.xChannel, grid.logScale)} vs ${axisLabel(grid.yChannel, grid.logScale)}`,
  ];

  for (let row = 0; row < grid.height; row++) {
    let line = "";
    for (let col = 0; col < grid.width; col++) {
      let best = -1;
      let bestCount = 0;
      grid.series.forEach((s, i) => {
        if (s.cells[row][col] > bestCount) {
          best = i;
          bestCount = s.cells[row][col];
        }
      });
      line += best >= 0 ? glyphFor(best) : " ";
    }
    lines.push(`|${line}|`);
  }

  lines.push(`+${"-".repeat(grid.width)}+`);
  lines.push(
    `x: [${grid.xRange[0].toFixed(2)}, ${grid.xRange[1].toFixed(2)}]  y: [${grid.yRange[0].toFixed(2)}, ${grid.yRange[1].toFixed(2)}]`,
  );
  lines.push(legend(grid.series.map((s) => s.population)));
  return lines.join("\n");
}

export function renderHistogram(hist: Histogram, barWidth = 40): string {
  const bins = hist.edges.length - 1;
  const totals = Array.from({ length: bins }, (_, b) =>
    hist.series.reduce((sum, s) => sum + s.counts[b], 0),
  );
  const peak = Math.max(1, ...totals);

  const lines = [`${hist.channel} histogram`];
  for (let b = 0; b < bins; b++) {
    const bar = hist.series
      .map((s, i) => glyphFor(i).repeat(Math.round((s.counts[b] / peak) * barWidth)))
      .join("");
    lines.push(`${hist.edges[b].toFixed(2)} | ${bar} ${totals[b]}`);
  }
  lines.push(legend(hist.series.map((s) => s.population)));
  return lines.join("\n");
}

/** FSC×SSC and FL1×FL2 density views followed by FSC and FL1 histograms. */
export function renderOverview(dataset: Dataset, options: OverviewOptions = {}): string {
  const { bins = CYTOMETRY_DEFAULTS.histogramBins, barWidth = 40, ...density } = options;
  return [
    renderDensity(densityGrid(dataset, "FSC", "SSC", density)),
    renderDensity(densityGrid(dataset, "FL1", "FL2", density)),
    renderHistogram(histogram(dataset, "FSC", bins), barWidth),
    renderHistogram(histogram(dataset, "FL1", bins), barWidth),
  ].join("\n\n");
}
