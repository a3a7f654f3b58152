export type WilderSeed = "mean" | "sum";

/**
 * Wilder's smoothing, α = 1/period.
 *
 * With `"mean"` seeding the first `period` samples are averaged and each
 * later sample applies `s·(1−α) + x·α`. With `"sum"` seeding (smoothed true
 * range and directional movement) the samples are totalled and later ones
 * apply `s − s/period + x`.
 */
export class WilderSmoother {
  private readonly alpha: number;
  private count = 0;
  private accumulator = 0;
  private smoothed: number | undefined;

  constructor(
    readonly period: number,
    readonly seed: WilderSeed = "mean"
  ) {
    this.alpha = 1 / period;
  }

  next(value: number): number | undefined {
    if (this.smoothed !== undefined) {
      this.smoothed =
        this.seed === "mean"
          ? this.smoothed * (1 - this.alpha) + value * this.alpha
          : this.smoothed - this.smoothed / this.period + value;
      return this.smoothed;
    }

    this.accumulator += value;
    this.count++;
    if (this.count === this.period) {
      this.smoothed = this.seed === "mean" ? this.accumulator / this.period : this.accumulator;
    }
    return this.smoothed;
  }

  get value(): number | undefined {
    return this.smoothed;
  }

  reset(): void {
    this.count = 0;
    this.accumulator = 0;
    this.smoothed = undefined;
  }
}
