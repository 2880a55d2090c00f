import { type RandomSource } from "./interface";

/**
 * Source that yields a fixed sequence of values and then repeats.
 * Each value must lie in the range it is drawn for; scripts that drift out
 * of step with the engine's draws fail loudly instead of silently wrapping.
 */
export class SequenceRandom implements RandomSource {
  constructor(
    private readonly sequence: ReadonlyArray<number>,
    private readonly index = 0,
  ) {
    if (sequence.length === 0) throw new Error("Sequence must not be empty");
  }

  nextInt(min: number, max: number): { value: number; next: RandomSource } {
    const value = this.sequence[this.index];
    if (value === undefined) throw new Error("Sequence index out of bounds");
    if (value < min || value > max) {
      throw new Error(
        `Scripted value ${String(value)} at index ${String(this.index)} outside [${String(min)}, ${String(max)}]`,
      );
    }
    const nextIndex = (this.index + 1) % this.sequence.length;
    return { next: new SequenceRandom(this.sequence, nextIndex), value };
  }

  /** Position of the next value to be drawn. */
  get position(): number {
    return this.index;
  }
}
