/**
 * Required sample size for a two-arm proportion test (power analysis)
 */

import { AdliftError, ErrorCode } from '../core/errors';
import { STANDARD_NORMAL } from '../core/distributions';
import { STATISTICAL_DEFAULTS } from '../core/config/defaults';
import { ObservationValidator } from '../domain/validation';

/**
 * Observations needed per variant to detect a relative change of
 * `minimumDetectableEffect` over `baselineRate` with the given two-sided
 * significance level and power. A two-arm test needs twice this in total.
 */
export function requiredSampleSize(
  baselineRate: number,
  minimumDetectableEffect: number,
  alpha: number = STATISTICAL_DEFAULTS.alpha,
  power: number = STATISTICAL_DEFAULTS.power
): number {
  ObservationValidator.validateOpenUnitInterval('baselineRate', baselineRate);
  ObservationValidator.validateOpenUnitInterval('alpha', alpha);
  ObservationValidator.validateOpenUnitInterval('power', power);

  if (!Number.isFinite(minimumDetectableEffect) || minimumDetectableEffect <= 0) {
    throw new AdliftError(ErrorCode.INVALID_INPUT, 'minimumDetectableEffect must be positive', {
      minimumDetectableEffect,
    });
  }

  const p1 = baselineRate;
  const p2 = baselineRate * (1 + minimumDetectableEffect);

  if (p2 >= 1) {
    throw new AdliftError(
      ErrorCode.INVALID_INPUT,
      'baselineRate * (1 + minimumDetectableEffect) must stay below 1',
      { baselineRate, minimumDetectableEffect, expectedVariantRate: p2 }
    );
  }

  const zAlpha = STANDARD_NORMAL.quantile(1 - alpha / 2);
  const zBeta = STANDARD_NORMAL.quantile(power);

  const numerator =
    zAlpha * Math.sqrt(2 * p1 * (1 - p1)) + zBeta * Math.sqrt(p1 * (1 - p1) + p2 * (1 - p2));
  const n = (numerator / (p2 - p1)) ** 2;

  const required = Math.ceil(n);

  if (!Number.isSafeInteger(required)) {
    throw new AdliftError(
      ErrorCode.INVALID_INPUT,
      'Required sample size exceeds the largest exact integer; minimumDetectableEffect is too small',
      { baselineRate, minimumDetectableEffect, alpha, power, required }
    );
  }

  return required;
}
