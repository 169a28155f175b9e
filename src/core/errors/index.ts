export { AdliftError, ErrorCode, isAdliftError, wrapError } from './AdliftError';
