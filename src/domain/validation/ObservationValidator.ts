/**
 * Observation Validator
 *
 * Checks variant counts and test parameters before any statistic is computed.
 * Every violation is reported as an AdliftError; nothing is clamped or defaulted.
 */

import type { LabeledObservation, ProportionCounts, VariantObservation } from '../types';
import { AdliftError, ErrorCode } from '../../core/errors';

const COUNT_FIELDS = ['impressions', 'clicks', 'conversions'] as const;
const AMOUNT_FIELDS = ['cost', 'revenue'] as const;

export class ObservationValidator {
  /**
   * Validate one variant's aggregated counts
   */
  static validateObservation(observation: VariantObservation, label?: string): void {
    for (const field of COUNT_FIELDS) {
      const value = observation[field];
      if (!Number.isInteger(value) || value < 0) {
        throw new AdliftError(
          ErrorCode.INVALID_INPUT,
          `${field} must be a non-negative integer`,
          { variant: label, field, value }
        );
      }
    }

    for (const field of AMOUNT_FIELDS) {
      const value = observation[field];
      if (!Number.isFinite(value) || value < 0) {
        throw new AdliftError(ErrorCode.INVALID_INPUT, `${field} must be a non-negative number`, {
          variant: label,
          field,
          value,
        });
      }
    }

    if (observation.clicks > observation.impressions) {
      throw new AdliftError(ErrorCode.INVALID_INPUT, 'clicks cannot exceed impressions', {
        variant: label,
        clicks: observation.clicks,
        impressions: observation.impressions,
      });
    }

    if (observation.conversions > observation.clicks) {
      throw new AdliftError(ErrorCode.INVALID_INPUT, 'conversions cannot exceed clicks', {
        variant: label,
        conversions: observation.conversions,
        clicks: observation.clicks,
      });
    }
  }

  /**
   * Validate a numerator/denominator pair for a proportion test.
   * The denominator must be positive.
   */
  static validateCounts(counts: ProportionCounts, role: string): void {
    const { successes, trials } = counts;

    if (!Number.isInteger(successes) || successes < 0) {
      throw new AdliftError(
        ErrorCode.INVALID_INPUT,
        `${role} successes must be a non-negative integer`,
        { role, successes }
      );
    }

    if (!Number.isInteger(trials) || trials <= 0) {
      throw new AdliftError(ErrorCode.INVALID_INPUT, `${role} denominator must be a positive integer`, {
        role,
        trials,
      });
    }

    if (successes > trials) {
      throw new AdliftError(ErrorCode.INVALID_INPUT, `${role} successes cannot exceed trials`, {
        role,
        successes,
        trials,
      });
    }
  }

  /**
   * Validate a labeled variant list: non-empty, unique labels, valid counts
   */
  static validateVariants(variants: readonly LabeledObservation[], minimum = 1): void {
    if (variants.length < minimum) {
      throw new AdliftError(
        ErrorCode.INVALID_INPUT,
        `At least ${minimum} variant${minimum === 1 ? '' : 's'} required`,
        { actualCount: variants.length, minimumRequired: minimum }
      );
    }

    const seen = new Set<string>();
    for (const { label, observation } of variants) {
      if (seen.has(label)) {
        throw new AdliftError(ErrorCode.INVALID_DATA, `Duplicate variant label: ${label}`, {
          variant: label,
        });
      }
      seen.add(label);
      this.validateObservation(observation, label);
    }
  }

  /**
   * Check that a value lies strictly between 0 and 1
   */
  static validateOpenUnitInterval(name: string, value: number): void {
    if (!Number.isFinite(value) || value <= 0 || value >= 1) {
      throw new AdliftError(ErrorCode.INVALID_INPUT, `${name} must be in (0, 1)`, {
        [name]: value,
      });
    }
  }
}
