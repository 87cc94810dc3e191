import type { Data } from '../types';
import type { DataCollector } from './data-collector';
import type { ResponseSource } from './response-source';
import type { Staircase } from './staircase';
import type { TrialSequence } from './trial-sequence';

export type StaircaseRow = {
  trial: number;
  intensity: number;
  response: boolean;
};

/**
 * Run a staircase to the end, asking `source` for the response of each trial
 *
 * @returns The threshold of the finished staircase
 */
export async function runStaircase(
  staircase: Staircase,
  source: ResponseSource,
  collector?: DataCollector<StaircaseRow>,
) {
  for (const intensity of staircase) {
    const response = await source.get(intensity);
    staircase.response(response);
    collector?.add({ trial: staircase.thisTrialN, intensity, response });
  }
  return staircase.threshold();
}

/**
 * Present every trial of a sequence in order
 *
 * @param present Shows one condition and returns the data row of the trial
 */
export async function runSequence<T, R extends Data>(
  sequence: TrialSequence<T>,
  present: (condition: T, trial: number) => R | Promise<R>,
  collector?: DataCollector<R>,
) {
  const rows: R[] = [];
  for (const condition of sequence) {
    const row = await present(condition, sequence.thisN);
    rows.push(row);
    collector?.add(row);
  }
  return rows;
}
