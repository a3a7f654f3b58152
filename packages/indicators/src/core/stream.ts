import { NotInitializedError } from "../errors";
import type { StreamingIndicator } from "../types";

/**
 * Shared lifecycle for streaming indicators.
 *
 * Subclasses implement `update` (one step), `clear` (drop state), `items`
 * (turn a batch input into stream items) and `sentinel` (warmup value).
 * `init` replays the input through `next`, so a stream and the batch
 * function agree by construction on what each position holds.
 */
export abstract class IndicatorStream<TInput, TItem, TOutput>
  implements StreamingIndicator<TInput, TItem, TOutput>
{
  private last: TOutput | undefined;

  protected constructor(readonly name: string) {}

  protected abstract update(item: TItem): TOutput | undefined;
  protected abstract clear(): void;
  protected abstract items(input: TInput): readonly TItem[];
  protected abstract sentinel(): TOutput;

  init(input: TInput): TOutput[] {
    this.reset();
    return this.replay(input);
  }

  next(item: TItem): TOutput | undefined {
    const value = this.update(item);
    if (value !== undefined) {
      this.last = value;
    }
    return value;
  }

  reset(): void {
    this.clear();
    this.last = undefined;
  }

  isReady(): boolean {
    return this.last !== undefined;
  }

  /**
   * Last value produced by `next`.
   *
   * @throws NotInitializedError before the first value
   */
  current(): TOutput {
    if (this.last === undefined) {
      throw new NotInitializedError(this.name);
    }
    return this.last;
  }

  protected replay(input: TInput): TOutput[] {
    return this.items(input).map((item) => this.next(item) ?? this.sentinel());
  }

  /** Forget the last value without touching indicator state */
  protected forgetLast(): void {
    this.last = undefined;
  }
}
