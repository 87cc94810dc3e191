import { clamp, mean } from '@adaptrial/shared/utils';
import type { Direction, StepType, ThresholdMethod } from '../types';
import { psychometricSummary, type PsychometricSummary } from './psychometric';
import { ResponsiveTrialIterator } from './trial-iterator';

export interface StaircaseOptions {
  /** Start value */
  start: number;
  /**
   * Step size. A list moves to the next entry at each reversal and keeps the
   * last one once it runs out @default 4
   */
  step?: number | readonly number[];
  /** Minimum number of reversals @default number of step sizes */
  reversal?: number;
  /**
   * Minimum number of trials. The staircase continues past it until enough
   * reversals are reached @default 0
   */
  trials?: number;
  /** Number of same incorrect trials before going up @default 1 */
  up?: number;
  /** Number of same correct trials before going down @default 2 */
  down?: number;
  /**
   * `'lin'` adds or subtracts the step, `'db'` and `'log'` multiply or divide
   * by the step in decibels or log units, so the value never reaches zero
   *
   * @default 'db'
   */
  stepType?: StepType;
  /** Minimum value */
  min?: number;
  /** Maximum value */
  max?: number;
  /** Text label */
  name?: string;
}
export type StaircaseSettings = Required<
  Omit<StaircaseOptions, 'step' | 'min' | 'max'>
> & { step: number[]; min?: number; max?: number };
/** Run of identical responses since the last intensity change */
export interface Streak {
  correct: boolean;
  length: number;
}
/** Everything needed to resume a {@link Staircase} */
export interface StaircaseState {
  options: StaircaseSettings;
  direction: Direction;
  streak: Streak;
  stepSizeCurrent: number;
  nextIntensity: number;
  thisTrialN: number;
  intensities: number[];
  responses: boolean[];
  reversalPoints: number[];
  reversalIntensities: number[];
  finished: boolean;
  psychometric?: PsychometricSummary;
}

function normalize(options: StaircaseOptions): StaircaseSettings {
  const step =
    typeof options.step === 'number'
      ? [options.step]
      : [...(options.step ?? [4])];
  if (!step.length || step.some((s) => !(s > 0 && Number.isFinite(s)))) {
    throw new RangeError(
      `Step sizes should be positive numbers, but got [${step.join(', ')}]`,
    );
  }
  const { up = 1, down = 2, min, max } = options;
  if (![up, down].every((e) => Number.isInteger(e) && e >= 1)) {
    throw new RangeError(
      `Up and down should be integers >= 1, but got ${up} and ${down}`,
    );
  }
  if (typeof min === 'number' && typeof max === 'number' && min > max) {
    throw new RangeError(`Minimum ${min} is greater than maximum ${max}`);
  }

  let reversal = options.reversal ?? step.length;
  if (reversal < step.length) {
    console.warn(
      `Increasing number of minimum required reversals to the number of step sizes, ${step.length}`,
    );
    reversal = step.length;
  }
  return {
    start: options.start,
    step,
    reversal,
    trials: options.trials ?? 0,
    up,
    down,
    stepType: options.stepType ?? 'db',
    min,
    max,
    name: options.name ?? '',
  };
}

/**
 * Adaptive up-down staircase. It will use 1-down-1-up before the first
 * reversal, and `up`/`down` after that.
 *
 * The staircase finishes once both the minimum number of reversals and the
 * minimum number of trials are reached.
 *
 * @example
 *
 * ```ts
 * const staircase = new Staircase({
 *   start: 50,
 *   step: [4, 2],
 *   stepType: 'lin',
 *   reversal: 10,
 *   trials: 10,
 *   up: 1,
 *   down: 1,
 *   min: 10,
 *   max: 60,
 * });
 * for (const intensity of staircase) {
 *   present(intensity);
 *   // set current trial response to calculate next value
 *   staircase.response(staircase.simulateResponse(30));
 * }
 * staircase.threshold(); // geometric mean of the last 6 reversals
 * ```
 */
export class Staircase extends ResponsiveTrialIterator<number, boolean> {
  readonly options: StaircaseSettings;
  direction: Direction = 'down';
  streak: Streak = { correct: false, length: 0 };
  stepSizeCurrent: number;
  /** Intensity to present on the next trial */
  nextIntensity: number;
  thisTrialN = -1;
  /** Presented intensity of every trial */
  intensities: number[] = [];
  responses: boolean[] = [];
  /** Trial numbers of reversals */
  reversalPoints: number[] = [];
  reversalIntensities: number[] = [];
  finished = false;
  /** Set when the finished staircase is polled for the first time */
  psychometric: PsychometricSummary | undefined;

  static fromState(state: StaircaseState) {
    const staircase = new Staircase(state.options);
    staircase.direction = state.direction;
    staircase.streak = { ...state.streak };
    staircase.stepSizeCurrent = state.stepSizeCurrent;
    staircase.nextIntensity = state.nextIntensity;
    staircase.thisTrialN = state.thisTrialN;
    staircase.intensities = [...state.intensities];
    staircase.responses = [...state.responses];
    staircase.reversalPoints = [...state.reversalPoints];
    staircase.reversalIntensities = [...state.reversalIntensities];
    staircase.finished = state.finished;
    staircase.psychometric = state.psychometric;
    return staircase;
  }

  constructor(options: StaircaseOptions) {
    super();
    this.options = normalize(options);
    this.stepSizeCurrent = this.options.step[0];
    this.nextIntensity = this.options.start;
  }

  advance() {
    if (this.finished) {
      // tally responses to create a psychometric function
      this.psychometric ??= psychometricSummary(
        this.intensities,
        this.responses,
      );
      return;
    }
    if (this.responses.length < this.intensities.length) {
      console.warn('Please set the response of the current trial first');
      return this.intensities[this.thisTrialN];
    }
    this.thisTrialN++;
    this.intensities.push(this.nextIntensity);
    return this.nextIntensity;
  }
  hasNext() {
    return !this.finished;
  }
  /**
   * `n <= 0` looks back at presented intensities, `n === 1` gives the
   * intensity of the next trial once the current one has a response
   */
  peek(n = 1) {
    if (n <= 0) {
      const i = this.thisTrialN + n;
      return i >= 0 ? this.intensities[i] : undefined;
    }
    if (
      n === 1 &&
      !this.finished &&
      this.responses.length === this.intensities.length
    ) {
      return this.nextIntensity;
    }
    return;
  }
  /**
   * Set response for current trial
   *
   * @param result Correct (detected) or incorrect (missed)
   * @param intensity Intensity actually presented, when it differs from the
   *   recommended one
   */
  response(result: boolean, intensity?: number) {
    if (this.finished) {
      console.warn('The staircase is finished, the response is ignored');
      return;
    }
    if (this.responses.length === this.intensities.length) {
      console.warn(
        this.intensities.length
          ? 'The current trial already has a response'
          : 'Please advance first to get an intensity',
      );
      return;
    }

    const prev = this.responses.at(-1);
    this.responses.push(result);
    if (typeof intensity === 'number') {
      this.intensities[this.thisTrialN] = intensity;
    }
    this.streak =
      prev === result
        ? { correct: result, length: this.streak.length + 1 }
        : { correct: result, length: 1 };
    this.#calculateNextIntensity(result);
  }
  #reached(correct: boolean) {
    const { up, down } = this.options;
    return (
      this.streak.correct === correct &&
      this.streak.length >= (correct ? down : up)
    );
  }
  #calculateNextIntensity(last: boolean) {
    const { step, reversal, trials } = this.options;

    let isReversal = false;
    if (!this.reversalIntensities.length) {
      isReversal = this.direction === (last ? 'up' : 'down');
      this.direction = last ? 'down' : 'up';
    } else if (this.#reached(true)) {
      isReversal = this.direction !== 'down';
      this.direction = 'down';
    } else if (this.#reached(false)) {
      isReversal = this.direction !== 'up';
      this.direction = 'up';
    }

    if (isReversal) {
      this.reversalPoints.push(this.thisTrialN);
      this.reversalIntensities.push(this.intensities[this.thisTrialN]);
    }
    const nReversals = this.reversalIntensities.length;
    if (nReversals >= reversal && this.intensities.length >= trials) {
      this.finished = true;
    }
    if (isReversal && step.length > 1) {
      this.stepSizeCurrent = step[Math.min(nReversals, step.length - 1)];
    }

    if (!nReversals) {
      this.#move(last ? -1 : 1);
    } else if (this.#reached(true)) {
      this.#move(-1);
    } else if (this.#reached(false)) {
      this.#move(1);
    }
  }
  #move(sign: 1 | -1) {
    const { stepType, min = -Infinity, max = Infinity } = this.options;
    const size = this.stepSizeCurrent;
    let value = this.nextIntensity;
    if (stepType === 'lin') {
      value += size * sign;
    } else {
      const factor = stepType === 'db' ? 10 ** (size / 20) : 10 ** size;
      value = sign > 0 ? value * factor : value / factor;
    }
    this.nextIntensity = clamp(value, min, max);
    this.streak = { ...this.streak, length: 0 };
  }

  /** Deterministic observer, only for tests and demos */
  simulateResponse(threshold: number) {
    return this.nextIntensity >= threshold;
  }
  /**
   * Average of the last reversal intensities
   *
   * @param n Number of reversals, all of them when there are fewer or when
   *   `n <= 0`
   * @returns `undefined` until the staircase is finished
   */
  threshold(n = 6, method: ThresholdMethod = 'geometric') {
    const nReversals = this.reversalIntensities.length;
    const last = Math.trunc(n);
    const count = last > 0 ? Math.min(last, nReversals) : nReversals;
    if (!this.finished || count === 0) return;
    const values = this.reversalIntensities.slice(-count);
    return method === 'geometric'
      ? Math.exp(mean(values.map(Math.log)))
      : mean(values);
  }

  getState(): StaircaseState {
    return {
      options: { ...this.options, step: [...this.options.step] },
      direction: this.direction,
      streak: { ...this.streak },
      stepSizeCurrent: this.stepSizeCurrent,
      nextIntensity: this.nextIntensity,
      thisTrialN: this.thisTrialN,
      intensities: [...this.intensities],
      responses: [...this.responses],
      reversalPoints: [...this.reversalPoints],
      reversalIntensities: [...this.reversalIntensities],
      finished: this.finished,
      psychometric: this.psychometric,
    };
  }
  toString() {
    const { up, down, reversal } = this.options;
    return `Staircase ${up}up${down}down, trial ${this.thisTrialN}, ${this.reversalIntensities.length} reversals of ${reversal}`;
  }
}
