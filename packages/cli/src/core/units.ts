import type { AngleUnit, FrequencyUnit, ResolutionUnit, TimeUnit, Value } from './ast.js';

export const ANGLE_UNITS: readonly AngleUnit[] = ['deg', 'grad', 'rad', 'turn'];
export const TIME_UNITS: readonly TimeUnit[] = ['s', 'ms'];
export const FREQUENCY_UNITS: readonly FrequencyUnit[] = ['Hz', 'kHz'];
export const RESOLUTION_UNITS: readonly ResolutionUnit[] = ['dpi', 'dpcm', 'dppx'];

function findUnit<T extends string>(units: readonly T[], unit: string): T | undefined {
  const lower = unit.toLowerCase();
  return units.find((candidate) => candidate.toLowerCase() === lower);
}

/**
 * Build the value for a number with a unit. Angle, time, frequency and
 * resolution units get their own variant; everything else stays a dimension.
 * Units are matched case-insensitively and normalized to their canonical spelling.
 */
export function classifyDimension(value: number, unit: string): Value {
  const angle = findUnit(ANGLE_UNITS, unit);
  if (angle) return { type: 'angle', value, unit: angle };

  const time = findUnit(TIME_UNITS, unit);
  if (time) return { type: 'time', value, unit: time };

  const frequency = findUnit(FREQUENCY_UNITS, unit);
  if (frequency) return { type: 'frequency', value, unit: frequency };

  const resolution = findUnit(RESOLUTION_UNITS, unit);
  if (resolution) return { type: 'resolution', value, unit: resolution };

  return { type: 'dimension', value, unit };
}

/**
 * Split dimension text such as `-2.25rem` at its first letter
 */
export function splitDimension(text: string): { number: string; unit: string } {
  const index = text.search(/[a-zA-Z]/);
  if (index === -1) {
    return { number: text, unit: '' };
  }
  return { number: text.slice(0, index), unit: text.slice(index) };
}
