import type { Distance, Weight } from './types.js';

const KG_PER_LB = 0.453592;

const METERS_PER_UNIT = {
  m: 1,
  km: 1000,
  mi: 1609.34,
  yd: 0.9144,
} as const;

export function weightToKg(weight: Weight): number {
  return weight.unit === 'lb' ? weight.value * KG_PER_LB : weight.value;
}

export function weightToLb(weight: Weight): number {
  return weight.unit === 'kg' ? weight.value / KG_PER_LB : weight.value;
}

export function distanceToMeters(distance: Distance): number {
  return distance.value * METERS_PER_UNIT[distance.unit];
}

export interface TimeComponents {
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
}

/** Split whole seconds into h/m/s. Negative input counts as zero. */
export function secondsToComponents(totalSeconds: number): TimeComponents {
  const secs = Math.max(0, Math.floor(totalSeconds));
  return {
    hours: Math.floor(secs / 3600),
    minutes: Math.floor((secs % 3600) / 60),
    seconds: secs % 60,
  };
}

/** Inverse of {@link secondsToComponents}. Minutes and seconds are clamped to 0-59. */
export function componentsToSeconds(components: TimeComponents): number {
  const clamp = (value: number): number => Math.max(0, Math.min(59, value));
  return Math.max(0, components.hours) * 3600 + clamp(components.minutes) * 60 + clamp(components.seconds);
}

/**
 * Short display form: `1:02:03`, `2:03` or `3s`
 */
export function formatDuration(totalSeconds: number): string {
  const { hours, minutes, seconds } = secondsToComponents(totalSeconds);
  const pad = (value: number): string => value.toString().padStart(2, '0');

  if (hours > 0) return `${hours}:${pad(minutes)}:${pad(seconds)}`;
  if (minutes > 0) return `${minutes}:${pad(seconds)}`;
  return `${seconds}s`;
}
