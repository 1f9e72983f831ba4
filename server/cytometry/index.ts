export { PopulationRegistry } from "./registry";
export { generate, allocateCounts, drawPopulation, applyDoublePositive } from "./generator";
export type { GenerateOptions, DoublePositiveResult } from "./generator";
export { applySpillover, compensate, spilloverMatrix, validateCoefficients } from "./spillover";
export type { SpilloverMatrix } from "./spillover";
export {
  assembleDataset,
  emptyDataset,
  datasetSize,
  getRow,
  toRows,
  selectPopulation,
  populationNames,
  populationDistribution,
} from "./assembly";
export { FlowCytometrySimulator } from "./simulator";
export type { SimulationOutcome } from "./simulator";
export { createRandomSource, MersenneRandomSource } from "./random";
export type { RandomSource } from "./random";
export {
  CYTOMETRY_DEFAULTS,
  DEFAULT_POPULATIONS,
  defaultSimulatorConfig,
  loadSimulatorConfig,
} from "./config";
export type { SimulatorConfig } from "./config";
export { histogram, densityGrid, renderDensity, renderHistogram, renderOverview, toLogScale } from "./visualization";
export type { Histogram, DensityGrid } from "./visualization";
export { mean, stdDev, summarizeChannel } from "./stats";
export * from "./errors";
