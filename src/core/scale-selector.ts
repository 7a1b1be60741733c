import { ErrInvalidArgument } from './errors/errors.js';

export const DIRECTIONS = ['forwards', 'backwards'] as const;

export type Direction = (typeof DIRECTIONS)[number];

/** Ascending copy of the given scales. Duplicates are kept. */
export function sortScales(scales: readonly number[]): number[] {
  return [...scales].sort((a, b) => a - b);
}

/**
 * Pick the scale that follows `current` in `targets`, wrapping at either end.
 *
 * `targets` must already be sorted ascending. A target equal to `current` is
 * never picked, so repeated calls walk the whole list. Returns null when there
 * is nothing to pick from.
 */
export function selectNextScale(current: number, targets: readonly number[], direction: Direction): number | null {
  if (targets.length === 0) {
    return null;
  }

  switch (direction) {
    case 'forwards':
      return targets.find((s) => s > current) ?? targets[0];
    case 'backwards':
      return [...targets].reverse().find((s) => s < current) ?? targets[targets.length - 1];
    default:
      throw ErrInvalidArgument.create({ argument: 'direction', value: String(direction) });
  }
}
