import jStat from "jstat";
import { MersenneTwister19937, Random } from "random-js";

export interface RandomSource {
  /** Uniform draw in [0, 1). */
  uniform(): number;
  normal(mean: number, std: number): number;
  /** `count` distinct indices from [0, size), uniformly without replacement. */
  sampleIndices(size: number, count: number): number[];
}

export class MersenneRandomSource implements RandomSource {
  private random: Random;

  constructor(public readonly seed?: number) {
    const engine = seed !== undefined
      ? MersenneTwister19937.seed(seed)
      : MersenneTwister19937.autoSeed();
    this.random = new Random(engine);
  }

  uniform(): number {
    return this.random.real(0, 1, false);
  }

  private readonly openUniform = (): number => {
    let u = 0;
    while (u === 0) u = this.uniform();
    return u;
  };

  // jStat samples from one global uniform source; point it at this engine first.
  normal(mean: number, std: number): number {
    jStat.setRandom(this.openUniform);
    return jStat.normal.sample(mean, std);
  }

  sampleIndices(size: number, count: number): number[] {
    if (!Number.isInteger(count) || count < 0 || count > size) {
      throw new RangeError(`Cannot sample ${count} indices from ${size}`);
    }
    if (count === 0) return [];
    const indices = Array.from({ length: size }, (_, i) => i);
    return this.random.sample(indices, count);
  }
}

export function createRandomSource(seed?: number): RandomSource {
  return new MersenneRandomSource(seed);
}
