import { DelayRange } from '../schemas/config';

export type Random = () => number;

/** Inclusive on both ends. */
export function randomInt(min: number, max: number, random: Random = Math.random) {
  return min + Math.floor(random() * (max - min + 1));
}

export function randomBetween([min, max]: DelayRange, random: Random = Math.random) {
  return min + random() * (max - min);
}
