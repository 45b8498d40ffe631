/**
 * Utility exports.
 */

export { drawUniqueIndices, type RandomSource } from './random.js';
