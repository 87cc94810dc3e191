/**
 * One-time trial iterator is used to generate trials for tasks.
 *
 * The experiment loop pulls trials with {@link TrialIterator.advance} until it
 * returns `undefined`. Once exhausted the iterator keeps returning `undefined`
 * and never restarts, so trial payloads must not be `undefined` themselves.
 *
 * @example
 *
 * ```ts
 * let trial;
 * while ((trial = iterator.advance()) !== undefined) {
 *   present(trial);
 * }
 * ```
 */
export abstract class TrialIterator<T> implements IterableIterator<T> {
  /** Whether the iterator is exhausted */
  abstract finished: boolean;
  /**
   * Move to the next trial
   *
   * @returns Next value or `undefined` if the iterator is done
   */
  abstract advance(): T | undefined;
  /** Whether another trial can be produced */
  abstract hasNext(): boolean;
  /**
   * Look at a trial relative to the current one without moving the cursor
   *
   * @param n Positive for future trials, negative for past ones
   */
  abstract peek(n?: number): T | undefined;

  [Symbol.iterator]() {
    return this;
  }
  next(): IteratorResult<T, undefined> {
    const value = this.advance();
    if (value === undefined) return { value: undefined, done: true };
    return { value, done: false };
  }
}
/**
 * Responsive trial iterator is used to generate trials that depend on previous
 * responses.
 */
export abstract class ResponsiveTrialIterator<T, R> extends TrialIterator<T> {
  /** Set response for current trial */
  abstract response(value: R): void;
}
