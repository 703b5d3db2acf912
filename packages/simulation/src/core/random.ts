import seedrandom from "seedrandom";
import { z } from "zod";
import { SimulationError } from "./errors.js";

type Prng = seedrandom.StatefulPRNG<seedrandom.State.Arc4>;

const byte = z.number().int().min(0).max(255);

/** Internal ARC4 state of the generator, as seedrandom reports it. */
export const generatorStateSchema = z.object({
  i: byte,
  j: byte,
  S: z.array(byte).length(256),
});

export type GeneratorState = z.infer<typeof generatorStateSchema>;

/** Persistable position of the stream: the seed, the draw count and the generator state itself. */
export interface RandomState {
  seed: string;
  draws: number;
  generator: GeneratorState;
}

/**
 * The single random stream of a simulation. Every probabilistic decision
 * draws from here, so the same seed and the same call order replay exactly.
 */
export class RandomnessEngine {
  private prng: Prng;
  private drawCount = 0;

  constructor(
    readonly seed: string,
    generator?: GeneratorState,
  ) {
    this.prng = seedrandom(seed, { state: generator ?? true });
  }

  /** Resumes from saved generator state; the draw count is carried, never replayed. */
  static restore(state: RandomState): RandomnessEngine {
    const rng = new RandomnessEngine(state.seed, state.generator);
    rng.drawCount = state.draws;
    return rng;
  }

  get draws(): number {
    return this.drawCount;
  }

  /** Uniform float in [0, 1). */
  nextFloat(): number {
    this.drawCount++;
    return this.prng();
  }

  /** Uniform integer in [0, maxExclusive). */
  nextInt(maxExclusive: number): number {
    return Math.floor(this.nextFloat() * maxExclusive);
  }

  rollDie(sides = 6): number {
    return this.nextInt(sides) + 1;
  }

  choose<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new SimulationError("InvalidTarget", "cannot choose from an empty list");
    }
    return items[this.nextInt(items.length)];
  }

  state(): RandomState {
    return { seed: this.seed, draws: this.drawCount, generator: generatorStateSchema.parse(this.prng.state()) };
  }
}
