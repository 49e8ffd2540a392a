/**
 * Seeded random number generator (LCG) so that a fixed seed and command
 * sequence always replay the same movement costs.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number = Date.now()) {
    this.state = seed >>> 0;
  }

  /** Float in [0, 1) */
  next(): number {
    // Numerical Recipes constants
    this.state = (Math.imul(this.state, 1664525) + 1013904223) >>> 0;
    return this.state / 0x100000000;
  }

  /** Integer in [min, max], both inclusive */
  nextInt(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }
}
