import type { Dataset, GenerationResult, PopulationShare } from "@shared/types/cytometry";
import { datasetSize, populationDistribution } from "./assembly";
import { defaultSimulatorConfig, parseDoublePositiveShift, type SimulatorConfig } from "./config";
import { NoDataError } from "./errors";
import { generate } from "./generator";
import { createRandomSource, type RandomSource } from "./random";
import { PopulationRegistry } from "./registry";
import { applySpillover } from "./spillover";

export interface SimulationOutcome {
  data: Dataset;
  raw: Dataset;
  generation: GenerationResult;
  distribution: PopulationShare[];
}

/**
 * One simulation session: a registry, a random stream and the last dataset
 * produced. `raw` keeps the pre-spillover signal next to the mixed `data`.
 */
export class FlowCytometrySimulator {
  readonly registry: PopulationRegistry;
  readonly config: SimulatorConfig;
  private random: RandomSource;
  private last: SimulationOutcome | null = null;

  constructor(config: SimulatorConfig = defaultSimulatorConfig(), random?: RandomSource) {
    this.config = { ...config, doublePositiveShift: parseDoublePositiveShift(config.doublePositiveShift) };
    this.registry = new PopulationRegistry(config.populations);
    this.random = random ?? createRandomSource(config.seed);
  }

  simulate(totalCount: number = this.config.totalCells): SimulationOutcome {
    const generation = generate(this.registry, totalCount, this.random, {
      allocation: this.config.allocation,
      doublePositiveShift: this.config.doublePositiveShift,
    });
    const data = applySpillover(generation.dataset, this.config.spillover);

    const outcome: SimulationOutcome = {
      data,
      raw: generation.dataset,
      generation,
      distribution: populationDistribution(data),
    };
    this.last = outcome;

    const rows = datasetSize(data);
    console.log(
      `[Simulator] Generated ${rows} events from ${generation.counts.length} populations ` +
      `(requested ${totalCount}, spillover FL2->FL1=${this.config.spillover.fl2IntoFl1}, FL1->FL2=${this.config.spillover.fl1IntoFl2})`,
    );
    if (rows !== totalCount) {
      console.log(`[Simulator] Row count differs from the requested total by ${rows - totalCount} (proportion rounding)`);
    }
    return outcome;
  }

  get hasData(): boolean {
    return this.last !== null;
  }

  requireData(): SimulationOutcome {
    if (!this.last) throw new NoDataError();
    return this.last;
  }
}
