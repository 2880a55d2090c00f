/**
 * Source of uniformly distributed integers for spawn decisions.
 * This allows us to have different RNG implementations for production and testing.
 */
export type RandomSource = {
  /**
   * Draw an integer in [min, max], both inclusive.
   * Returns the value and a new source state (immutable pattern)
   */
  nextInt(
    min: number,
    max: number,
  ): {
    value: number;
    next: RandomSource;
  };
};
