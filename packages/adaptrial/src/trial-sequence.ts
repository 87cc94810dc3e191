import { range, shuffle } from '@adaptrial/shared/utils';
import { TrialIterator } from './trial-iterator';

export interface TrialSequenceOptions {
  /** Number of repeats for all conditions @default 1 */
  nReps?: number;
  /** Explicit trial-index list, used as is instead of a random sequence */
  trials?: readonly number[];
  /** Text label */
  name?: string;
}
/** Everything needed to resume a {@link TrialSequence} */
export interface TrialSequenceState<T> {
  name: string;
  conditions: T[];
  nReps: number;
  trials: number[];
  nTrials: number;
  nRemaining: number;
  thisN: number;
  thisRepN: number;
  thisTrialN: number;
  finished: boolean;
}

/**
 * Non-adaptive trial sequence. Every repetition contains all conditions in
 * random order and no condition is directly repeated across repetitions.
 *
 * @example
 *
 * ```ts
 * const sequence = new TrialSequence(['left', 'right', 'center'], {
 *   nReps: 4,
 * });
 * for (const condition of sequence) {
 *   console.log(condition, sequence.peek(1));
 * }
 * ```
 */
export class TrialSequence<T> extends TrialIterator<T> {
  readonly name: string;
  readonly conditions: readonly T[];
  readonly nConds: number;
  readonly nReps: number;
  /** Condition index of every trial */
  readonly trials: readonly number[];
  readonly nTrials: number;
  nRemaining: number;
  /** Trials completed so far, minus one */
  thisN = -1;
  /** Which repetition is running */
  thisRepN = 0;
  /** Trial number within the current repetition */
  thisTrialN = -1;
  thisTrial: T | undefined;
  finished = false;

  /** Sequence over the conditions `0..n-1` */
  static range(n: number, options?: TrialSequenceOptions) {
    return new TrialSequence(range(n), options);
  }
  /**
   * Oddball (MMN) sequence of standards (0) and deviants (1), with at least 3
   * standards between two deviants.
   *
   * @param nTrials Number of trials to return
   * @param deviantFreq Frequency of deviants, at most 0.25
   */
  static mmnSequence(nTrials: number, deviantFreq = 0.12) {
    if (!(deviantFreq > 0)) {
      throw new RangeError(
        `Deviant frequency should be > 0, but got ${deviantFreq}`,
      );
    }
    if (!Number.isInteger(nTrials) || nTrials < 0) {
      throw new RangeError(
        `Number of trials should be a non-negative integer, but got ${nTrials}`,
      );
    }
    if (deviantFreq > 0.25) {
      console.warn(
        `Deviant frequency should be <= 0.25, but got ${deviantFreq}. Using 0.25`,
      );
      deviantFreq = 0.25;
    }

    const nPartials = Math.ceil(2 / deviantFreq - 7);
    const reps = Math.ceil(nTrials / nPartials);
    const partials = range(nPartials).map((i) => [
      ...Array<number>(3 + i).fill(0),
      1,
    ]);
    const order = shuffle(range(nPartials * reps).map((i) => i % nPartials));
    const trials = order.flatMap((i) => partials[i]).slice(0, nTrials);
    return TrialSequence.range(2, { trials });
  }
  static fromState<T>(state: TrialSequenceState<T>) {
    const sequence = new TrialSequence(state.conditions, {
      nReps: state.nReps,
      trials: state.trials,
      name: state.name,
    });
    sequence.nRemaining = state.nRemaining;
    sequence.thisN = state.thisN;
    sequence.thisRepN = state.thisRepN;
    sequence.thisTrialN = state.thisTrialN;
    sequence.finished = state.finished;
    if (!state.finished && state.thisN >= 0) {
      sequence.thisTrial = sequence.#conditionAt(state.thisN);
    }
    return sequence;
  }

  constructor(conditions: readonly T[], options: TrialSequenceOptions = {}) {
    super();
    this.name = options.name ?? '';
    this.conditions = [...conditions];
    this.nConds = conditions.length;
    this.nReps = Math.trunc(options.nReps ?? 1);
    if (!(this.nReps >= 1)) {
      throw new RangeError(
        `Number of repeats should be >= 1, but got ${options.nReps}`,
      );
    }

    if (options.trials !== undefined) {
      const invalid = options.trials.find(
        (i) => !Number.isInteger(i) || i < 0 || i >= this.nConds,
      );
      if (invalid !== undefined) {
        throw new RangeError(
          `Trial index ${invalid} is out of the ${this.nConds} conditions`,
        );
      }
      this.trials = [...options.trials];
    } else {
      this.trials = this.#createSimpleSequence();
    }
    this.nTrials = this.trials.length;
    this.nRemaining = this.nTrials;
  }
  #createSimpleSequence() {
    const indices = range(this.nConds);
    const trials: number[] = [];
    for (let rep = 0; rep < this.nReps; rep++) {
      let permute = shuffle(indices);
      // a single condition can only repeat
      while (
        rep > 0 &&
        this.nConds > 1 &&
        permute[0] === trials[trials.length - 1]
      ) {
        permute = shuffle(indices);
      }
      trials.push(...permute);
    }
    return trials;
  }
  #conditionAt(position: number) {
    return this.conditions[this.trials[position]];
  }

  advance() {
    if (this.finished) return;
    this.thisTrialN++;
    this.thisN++;
    this.nRemaining--;
    if (this.thisTrialN >= this.nConds && this.nReps > 1) {
      // start a new repetition
      this.thisTrialN = 0;
      this.thisRepN++;
    }
    if (this.thisN >= this.nTrials) {
      this.nRemaining = 0;
      this.thisTrial = undefined;
      this.finished = true;
      return;
    }
    return (this.thisTrial = this.#conditionAt(this.thisN));
  }
  hasNext() {
    return !this.finished && this.nRemaining > 0;
  }
  /**
   * Get the condition `n` trials into the future (or the past, for negative
   * `n`) without advancing
   *
   * @returns `undefined` beyond the last or before the first trial
   */
  peek(n = 1) {
    const position = this.thisN + n;
    if (n > this.nRemaining || position < 0 || position >= this.nTrials) {
      return;
    }
    return this.#conditionAt(position);
  }

  /** Count matrix (nConds x nConds), `[i][j]` is how often `j` followed `i` */
  transitions() {
    const matrix = range(this.nConds).map(() =>
      Array<number>(this.nConds).fill(0),
    );
    for (let k = 1; k < this.nTrials; k++) {
      matrix[this.trials[k - 1]][this.trials[k]]++;
    }
    return matrix;
  }
  /** Frequencies of conditions in the order of {@link conditions} */
  conditionProbabilities() {
    const counts = Array<number>(this.nConds).fill(0);
    for (const i of this.trials) counts[i]++;
    return counts.map((count) => (this.nTrials ? count / this.nTrials : 0));
  }

  getState(): TrialSequenceState<T> {
    return {
      name: this.name,
      conditions: [...this.conditions],
      nReps: this.nReps,
      trials: [...this.trials],
      nTrials: this.nTrials,
      nRemaining: this.nRemaining,
      thisN: this.thisN,
      thisRepN: this.thisRepN,
      thisTrialN: this.thisTrialN,
      finished: this.finished,
    };
  }
  toString() {
    return `TrialSequence, trials ${this.nTrials}, remaining ${this.nRemaining}, current condition ${JSON.stringify(this.thisTrial)}`;
  }
}
