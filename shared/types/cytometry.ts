export const CHANNELS = ["FSC", "SSC", "FL1", "FL2"] as const;

export type Channel = typeof CHANNELS[number];

export type PopulationSpec = {
  name: string;
  proportion: number;
  fscMean: number;
  fscStd: number;
  sscMean: number;
  sscStd: number;
  fl1Mean: number;
  fl1Std: number;
  fl2Mean: number;
  fl2Std: number;
  doublePositiveFraction: number;
};

export type PopulationField = Exclude<keyof PopulationSpec, "name">;

export type ChannelColumns = Record<Channel, number[]>;

export type Dataset = ChannelColumns & {
  population: string[];
};

export type SampleRow = Record<Channel, number> & {
  population: string;
};

export type SpilloverCoefficients = {
  fl2IntoFl1: number;
  fl1IntoFl2: number;
};

export type DoublePositiveShift = {
  shiftMean: number;
  shiftStd: number;
};

export type AllocationPolicy = "independent" | "largest_remainder";

export type PopulationCount = {
  name: string;
  allocated: number;
  doublePositive: number;
};

export type GenerationResult = {
  dataset: Dataset;
  counts: PopulationCount[];
  doublePositiveRows: number[];
};

export type PopulationShare = {
  name: string;
  count: number;
  fraction: number;
};

export type ChannelSummary = {
  channel: Channel;
  mean: number;
  std: number;
  min: number;
  max: number;
};
