/**
 * Random draw helpers.
 */

import { ConfigurationOverrunError } from '../core/session-errors.js';

/**
 * Source of uniform random numbers in [0, 1).
 */
export type RandomSource = () => number;

/**
 * Draw `count` distinct integers uniformly from [min, max).
 * Uses a partial Fisher-Yates shuffle, so every ordered draw is equally likely.
 *
 * @throws ConfigurationOverrunError when more values are requested than the range holds
 */
export function drawUniqueIndices(
  count: number,
  min: number,
  max: number,
  random: RandomSource = Math.random
): number[] {
  const available = Math.max(0, max - min);
  if (count > available) {
    throw new ConfigurationOverrunError(count, available);
  }

  const pool = Array.from({ length: available }, (_, i) => min + i);
  const drawn: number[] = [];

  for (let i = 0; i < count; i++) {
    const span = available - i;
    const j = i + Math.min(span - 1, Math.floor(random() * span));
    const picked = pool[j];
    const current = pool[i];
    if (picked === undefined || current === undefined) {
      break;
    }
    pool[j] = current;
    pool[i] = picked;
    drawn.push(picked);
  }

  return drawn;
}
