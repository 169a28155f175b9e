// src/power/TestPlanner.ts
import type { SampleSizePlan } from '../significance/types';
import { requiredSampleSize } from '../significance/SampleSize';
import { AdliftError, ErrorCode } from '../core/errors';
import { STATISTICAL_DEFAULTS } from '../core/config/defaults';

/**
 * Planning inputs: the sample-size parameters plus the test's shape
 */
export interface TestPlanInput extends SampleSizePlan {
  variantCount?: number;   // arms including control, default 2
  dailyTraffic?: number;   // observations per day across all arms
}

export interface TestPlan {
  requiredPerVariant: number;
  totalRequired: number;
  variantCount: number;
  estimatedDays: number | null;  // null when no daily traffic was given
}

/**
 * Size a test and estimate how long it has to run
 */
export function planTest(input: TestPlanInput): TestPlan {
  const variantCount = input.variantCount ?? STATISTICAL_DEFAULTS.variantCount;

  if (!Number.isInteger(variantCount) || variantCount < 2) {
    throw new AdliftError(ErrorCode.INVALID_INPUT, 'variantCount must be an integer of at least 2', {
      variantCount,
    });
  }

  if (
    input.dailyTraffic !== undefined &&
    (!Number.isFinite(input.dailyTraffic) || input.dailyTraffic <= 0)
  ) {
    throw new AdliftError(ErrorCode.INVALID_INPUT, 'dailyTraffic must be positive', {
      dailyTraffic: input.dailyTraffic,
    });
  }

  const requiredPerVariant = requiredSampleSize(
    input.baselineRate,
    input.minimumDetectableEffect,
    input.alpha ?? STATISTICAL_DEFAULTS.alpha,
    input.power ?? STATISTICAL_DEFAULTS.power
  );
  const totalRequired = requiredPerVariant * variantCount;

  return {
    requiredPerVariant,
    totalRequired,
    variantCount,
    estimatedDays:
      input.dailyTraffic === undefined ? null : Math.ceil(totalRequired / input.dailyTraffic),
  };
}
