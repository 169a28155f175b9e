// src/power/PowerSimulator.ts
import { RNG } from '../core/math/random';
import { AdliftError, ErrorCode } from '../core/errors';
import { ObservationValidator } from '../domain/validation';
import { STATISTICAL_DEFAULTS } from '../core/config/defaults';
import { compareProportions, isSignificant } from '../significance/ProportionTest';

/**
 * A planned two-arm proportion test with known true rates
 */
export interface SimulationScenario {
  controlRate: number;
  variantRate: number;
  sampleSizePerVariant: number;
  alpha?: number;              // default 0.05
}

/**
 * Aggregated results from repeated simulated tests
 */
export interface PowerAnalysisResult {
  rejectionRate: number;       // power when rates differ, false-positive rate when equal
  rejections: number;
  iterations: number;
  averageLiftPct: number | null;  // mean of finite lifts; null when there were none
  scenario: SimulationScenario;
}

/**
 * Monte-Carlo check of the Z-test: draw binomial outcomes for both arms at
 * the true rates and count how often the test rejects.
 */
export class PowerSimulator {
  private rng: RNG;

  constructor(seed?: number) {
    this.rng = new RNG(seed);
    if (seed !== undefined) {
      console.log(`PowerSimulator initialized with seed: ${seed}`);
    }
  }

  simulate(
    scenario: SimulationScenario,
    iterations: number = STATISTICAL_DEFAULTS.simulationIterations
  ): PowerAnalysisResult {
    const alpha = scenario.alpha ?? STATISTICAL_DEFAULTS.alpha;
    this.validateScenario(scenario, alpha, iterations);

    const n = scenario.sampleSizePerVariant;
    let rejections = 0;
    let liftSum = 0;
    let liftCount = 0;

    for (let i = 0; i < iterations; i++) {
      const result = compareProportions(
        { successes: this.rng.binomial(n, scenario.controlRate), trials: n },
        { successes: this.rng.binomial(n, scenario.variantRate), trials: n }
      );

      if (isSignificant(result, alpha)) rejections++;
      if (Number.isFinite(result.liftPct)) {
        liftSum += result.liftPct;
        liftCount++;
      }
    }

    return {
      rejectionRate: rejections / iterations,
      rejections,
      iterations,
      averageLiftPct: liftCount === 0 ? null : liftSum / liftCount,
      scenario,
    };
  }

  private validateScenario(scenario: SimulationScenario, alpha: number, iterations: number): void {
    for (const [name, rate] of [
      ['controlRate', scenario.controlRate],
      ['variantRate', scenario.variantRate],
    ] as const) {
      if (!Number.isFinite(rate) || rate < 0 || rate > 1) {
        throw new AdliftError(ErrorCode.INVALID_CONFIG, `${name} must be in [0, 1]`, {
          [name]: rate,
        });
      }
    }

    if (!Number.isInteger(scenario.sampleSizePerVariant) || scenario.sampleSizePerVariant <= 0) {
      throw new AdliftError(ErrorCode.INVALID_CONFIG, 'sampleSizePerVariant must be a positive integer', {
        sampleSizePerVariant: scenario.sampleSizePerVariant,
      });
    }

    if (!Number.isInteger(iterations) || iterations <= 0) {
      throw new AdliftError(ErrorCode.INVALID_CONFIG, 'iterations must be a positive integer', {
        iterations,
      });
    }

    ObservationValidator.validateOpenUnitInterval('alpha', alpha);
  }
}
