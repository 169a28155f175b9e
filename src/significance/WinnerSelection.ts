/**
 * Winner selection across variants
 */

import type { LabeledObservation, WinnerMetric } from '../domain/types';
import { AdliftError, ErrorCode } from '../core/errors';
import { ObservationValidator } from '../domain/validation';
import { metricValue } from '../domain/metrics';

/**
 * Label of the variant with the strictly greatest metric value.
 *
 * On an exact tie the earliest-listed variant wins. Variants whose metric is
 * undefined (zero impressions, clicks or spend) are not eligible.
 */
export function pickWinner(variants: readonly LabeledObservation[], metric: WinnerMetric): string {
  ObservationValidator.validateVariants(variants);

  let winner: string | null = null;
  let best = -Infinity;

  for (const { label, observation } of variants) {
    const value = metricValue(observation, metric);
    if (value === null) continue;

    // Strict comparison keeps the first of equal values
    if (winner === null || value > best) {
      winner = label;
      best = value;
    }
  }

  if (winner === null) {
    throw new AdliftError(
      ErrorCode.INSUFFICIENT_DATA,
      `No variant has a defined ${metric}`,
      { metric, variants: variants.map((v) => v.label) }
    );
  }

  return winner;
}
