/**
 * Distribution module
 */

export { NormalDistribution, STANDARD_NORMAL, createStandardNormal } from './NormalDistribution';
