import type {
  AllocationPolicy,
  ChannelColumns,
  Dataset,
  DoublePositiveShift,
  GenerationResult,
  PopulationCount,
  PopulationSpec,
} from "@shared/types/cytometry";
import { assembleDataset } from "./assembly";
import { CYTOMETRY_DEFAULTS } from "./config";
import { EmptyRegistryError, InvalidCountError } from "./errors";
import type { RandomSource } from "./random";
import type { PopulationRegistry } from "./registry";

export interface GenerateOptions {
  allocation?: AllocationPolicy;
  doublePositiveShift?: DoublePositiveShift;
}

export interface DoublePositiveResult {
  columns: ChannelColumns;
  selected: number[];
}

type Proportioned = Pick<PopulationSpec, "proportion">;

/**
 * Rows per population. "independent" rounds each share on its own and lets
 * the sum drift from `totalCount`; "largest_remainder" hands the leftover rows
 * to the largest fractional parts so the sum is exactly round(Σp · total).
 */
export function allocateCounts(
  specs: readonly Proportioned[],
  totalCount: number,
  policy: AllocationPolicy = "independent",
): number[] {
  if (policy === "independent") {
    return specs.map((spec) => Math.round(spec.proportion * totalCount));
  }

  const exact = specs.map((spec) => spec.proportion * totalCount);
  const counts = exact.map(Math.floor);
  const target = Math.round(exact.reduce((sum, x) => sum + x, 0));
  let remainder = target - counts.reduce((sum, c) => sum + c, 0);

  const order = exact
    .map((x, i) => ({ i, fraction: x - Math.floor(x) }))
    .sort((a, b) => b.fraction - a.fraction || a.i - b.i);

  for (let k = 0; remainder > 0 && order.length > 0; k = (k + 1) % order.length) {
    counts[order[k].i] += 1;
    remainder -= 1;
  }
  return counts;
}

function drawColumn(mean: number, std: number, n: number, random: RandomSource): number[] {
  const values = new Array<number>(n);
  for (let i = 0; i < n; i++) values[i] = random.normal(mean, std);
  return values;
}

export function drawPopulation(spec: PopulationSpec, n: number, random: RandomSource): ChannelColumns {
  return {
    FSC: drawColumn(spec.fscMean, spec.fscStd, n, random),
    SSC: drawColumn(spec.sscMean, spec.sscStd, n, random),
    FL1: drawColumn(spec.fl1Mean, spec.fl1Std, n, random),
    FL2: drawColumn(spec.fl2Mean, spec.fl2Std, n, random),
  };
}

/**
 * Lifts a random `doublePositiveFraction` of the rows above the population
 * mean in both fluorescence channels, then adds a |N(shiftMean, shiftStd)|
 * boost per channel. Returns new columns; the input is left as drawn.
 */
export function applyDoublePositive(
  columns: ChannelColumns,
  spec: PopulationSpec,
  random: RandomSource,
  shift: DoublePositiveShift = CYTOMETRY_DEFAULTS.doublePositiveShift,
): DoublePositiveResult {
  const n = columns.FL1.length;
  const count = Math.round(spec.doublePositiveFraction * n);
  const selected = random.sampleIndices(n, count).sort((a, b) => a - b);

  const FL1 = [...columns.FL1];
  const FL2 = [...columns.FL2];
  for (const i of selected) {
    FL1[i] = Math.max(FL1[i], spec.fl1Mean) + Math.abs(random.normal(shift.shiftMean, shift.shiftStd));
    FL2[i] = Math.max(FL2[i], spec.fl2Mean) + Math.abs(random.normal(shift.shiftMean, shift.shiftStd));
  }

  return { columns: { ...columns, FL1, FL2 }, selected };
}

export function generate(
  registry: PopulationRegistry,
  totalCount: number,
  random: RandomSource,
  options: GenerateOptions = {},
): GenerationResult {
  if (!Number.isInteger(totalCount) || totalCount <= 0) {
    throw new InvalidCountError(totalCount);
  }
  const specs = registry.snapshot();
  if (specs.length === 0) throw new EmptyRegistryError();

  const shift = options.doublePositiveShift ?? CYTOMETRY_DEFAULTS.doublePositiveShift;
  const sizes = allocateCounts(specs, totalCount, options.allocation);

  const parts: Dataset[] = [];
  const counts: PopulationCount[] = [];
  const doublePositiveRows: number[] = [];
  let offset = 0;

  specs.forEach((spec, index) => {
    const n = sizes[index];
    const raw = drawPopulation(spec, n, random);
    const { columns, selected } = applyDoublePositive(raw, spec, random, shift);

    parts.push({ ...columns, population: new Array<string>(n).fill(spec.name) });
    counts.push({ name: spec.name, allocated: n, doublePositive: selected.length });
    for (const i of selected) doublePositiveRows.push(offset + i);
    offset += n;
  });

  return { dataset: assembleDataset(parts), counts, doublePositiveRows };
}
