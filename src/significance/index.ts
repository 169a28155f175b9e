/**
 * Significance engine: Z-tests, sample sizes and winner selection
 */

export { compareProportions, compareTwoProportions, isSignificant } from './ProportionTest';
export { requiredSampleSize } from './SampleSize';
export { pickWinner } from './WinnerSelection';
export type { SignificanceResult, SampleSizePlan } from './types';
