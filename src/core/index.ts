/**
 * Core adlift module exports
 */

// Error handling system
export { AdliftError, ErrorCode, isAdliftError, wrapError } from './errors';

// Defaults
export { STATISTICAL_DEFAULTS, ANALYSIS_DEFAULTS } from './config/defaults';

// Distributions
export * from './distributions';

// Random number generation
export { RNG } from './math/random';
