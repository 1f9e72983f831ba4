import type { Channel, ChannelSummary, Dataset } from "@shared/types/cytometry";

export const mean = (arr: number[]): number => {
  if (arr.length === 0) return NaN;
  let sum = 0;
  for (const v of arr) sum += v;
  return sum / arr.length;
};

// Sample standard deviation (n - 1).
export const stdDev = (arr: number[], m?: number): number => {
  if (arr.length < 2) return 0;
  const mu = m ?? mean(arr);
  let sumSq = 0;
  for (const v of arr) sumSq += (v - mu) ** 2;
  return Math.sqrt(sumSq / (arr.length - 1));
};

export const extent = (arr: number[]): [number, number] => {
  let min = Infinity;
  let max = -Infinity;
  for (const v of arr) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return [min, max];
};

export function summarizeChannel(dataset: Dataset, channel: Channel): ChannelSummary {
  const values = dataset[channel];
  const m = mean(values);
  const [min, max] = extent(values);
  return { channel, mean: m, std: stdDev(values, m), min, max };
}
