import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PowerSimulator, SimulationScenario } from '../../power/PowerSimulator';
import { AdliftError, ErrorCode } from '../../core/errors';

describe('PowerSimulator', () => {
  let simulator: PowerSimulator;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    simulator = new PowerSimulator(12345); // Fixed seed for reproducibility
  });

  it('should log the seed it was created with', () => {
    expect(console.log).toHaveBeenCalledWith('PowerSimulator initialized with seed: 12345');
  });

  it('should keep false positives near alpha in an A/A test', () => {
    const scenario: SimulationScenario = {
      controlRate: 0.1,
      variantRate: 0.1,
      sampleSizePerVariant: 400,
    };

    const result = simulator.simulate(scenario, 200);

    expect(result.iterations).toBe(200);
    expect(result.rejectionRate).toBe(result.rejections / 200);
    expect(result.rejectionRate).toBeLessThan(0.15);
    expect(result.scenario).toBe(scenario);
  });

  it('should detect a large true effect with high power', () => {
    const result = simulator.simulate(
      { controlRate: 0.1, variantRate: 0.2, sampleSizePerVariant: 500 },
      100
    );

    // Analytic power for this design is above 0.99
    expect(result.rejectionRate).toBeGreaterThan(0.9);
    expect(result.averageLiftPct).not.toBeNull();
    expect(result.averageLiftPct ?? 0).toBeGreaterThan(70);
    expect(result.averageLiftPct ?? 0).toBeLessThan(130);
  });

  it('should give identical results for the same seed', () => {
    const scenario: SimulationScenario = {
      controlRate: 0.05,
      variantRate: 0.07,
      sampleSizePerVariant: 300,
    };

    const first = new PowerSimulator(7).simulate(scenario, 50);
    const second = new PowerSimulator(7).simulate(scenario, 50);

    expect(second).toEqual(first);
  });

  it('should never reject when both rates are zero', () => {
    const result = simulator.simulate(
      { controlRate: 0, variantRate: 0, sampleSizePerVariant: 50 },
      20
    );

    expect(result.rejections).toBe(0);
    expect(result.averageLiftPct).toBe(0);
  });

  it('should reject invalid scenarios', () => {
    try {
      simulator.simulate({ controlRate: 1.5, variantRate: 0.1, sampleSizePerVariant: 10 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(AdliftError);
      expect((error as AdliftError).code).toBe(ErrorCode.INVALID_CONFIG);
    }

    expect(() =>
      simulator.simulate({ controlRate: 0.1, variantRate: 0.1, sampleSizePerVariant: 0 })
    ).toThrow('sampleSizePerVariant must be a positive integer');
    expect(() =>
      simulator.simulate({ controlRate: 0.1, variantRate: 0.1, sampleSizePerVariant: 10 }, 0)
    ).toThrow('iterations must be a positive integer');
    expect(() =>
      simulator.simulate({
        controlRate: 0.1,
        variantRate: 0.1,
        sampleSizePerVariant: 10,
        alpha: 1,
      })
    ).toThrow('alpha must be in (0, 1)');
  });
});
