import { mean, round } from '@adaptrial/shared/utils';

/** Non-parametric psychometric function, one entry per distinct intensity */
export interface PsychometricSummary {
  /** Distinct intensities, ascending */
  intensities: number[];
  /** Mean response rate at each intensity */
  percentCorrect: number[];
  /** Number of responses contributing to each mean */
  responsesPerIntensity: number[];
}

/**
 * Bin responses by intensity. Intensities are rounded first so that values
 * reached through different float paths fall in the same bin.
 *
 * Trials without a response are left out.
 */
export function psychometricSummary(
  intensities: readonly number[],
  responses: readonly boolean[],
  decimals = 8,
): PsychometricSummary {
  const bins = new Map<number, number[]>();
  const n = Math.min(intensities.length, responses.length);
  for (let i = 0; i < n; i++) {
    const key = round(intensities[i], decimals);
    let bin = bins.get(key);
    if (!bin) bins.set(key, (bin = []));
    bin.push(responses[i] ? 1 : 0);
  }

  const summary: PsychometricSummary = {
    intensities: [],
    percentCorrect: [],
    responsesPerIntensity: [],
  };
  for (const key of [...bins.keys()].sort((a, b) => a - b)) {
    const bin = bins.get(key) ?? [];
    summary.intensities.push(key);
    summary.percentCorrect.push(mean(bin));
    summary.responsesPerIntensity.push(bin.length);
  }
  return summary;
}
