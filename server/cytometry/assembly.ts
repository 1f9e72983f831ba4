import { CHANNELS, type Dataset, type PopulationShare, type SampleRow } from "@shared/types/cytometry";

export function emptyDataset(): Dataset {
  return { FSC: [], SSC: [], FL1: [], FL2: [], population: [] };
}

export function datasetSize(dataset: Dataset): number {
  return dataset.population.length;
}

export function assembleDataset(parts: Dataset[]): Dataset {
  const result = emptyDataset();
  for (const part of parts) {
    for (const channel of CHANNELS) {
      result[channel] = result[channel].concat(part[channel]);
    }
    result.population = result.population.concat(part.population);
  }
  return result;
}

export function cloneDataset(dataset: Dataset): Dataset {
  return {
    FSC: [...dataset.FSC],
    SSC: [...dataset.SSC],
    FL1: [...dataset.FL1],
    FL2: [...dataset.FL2],
    population: [...dataset.population],
  };
}

export function getRow(dataset: Dataset, index: number): SampleRow {
  if (!Number.isInteger(index) || index < 0 || index >= datasetSize(dataset)) {
    throw new RangeError(`Row ${index} is outside a dataset of ${datasetSize(dataset)} rows`);
  }
  return {
    FSC: dataset.FSC[index],
    SSC: dataset.SSC[index],
    FL1: dataset.FL1[index],
    FL2: dataset.FL2[index],
    population: dataset.population[index],
  };
}

export function toRows(dataset: Dataset): SampleRow[] {
  return dataset.population.map((_, i) => getRow(dataset, i));
}

export function selectPopulation(dataset: Dataset, name: string): Dataset {
  const result = emptyDataset();
  dataset.population.forEach((pop, i) => {
    if (pop !== name) return;
    for (const channel of CHANNELS) result[channel].push(dataset[channel][i]);
    result.population.push(pop);
  });
  return result;
}

export function populationNames(dataset: Dataset): string[] {
  return Array.from(new Set(dataset.population));
}

export function populationDistribution(dataset: Dataset): PopulationShare[] {
  const total = datasetSize(dataset);
  const counts = new Map<string, number>();
  for (const pop of dataset.population) counts.set(pop, (counts.get(pop) ?? 0) + 1);

  return Array.from(counts, ([name, count]) => ({
    name,
    count,
    fraction: total > 0 ? count / total : 0,
  }));
}
