export { ObservationValidator } from './ObservationValidator';
