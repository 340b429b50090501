import { describe, expect, it } from 'vitest';
import {
  componentsToSeconds,
  distanceToMeters,
  formatDuration,
  secondsToComponents,
  weightToKg,
  weightToLb,
} from '../units.js';

describe('units', () => {
  describe('weight', () => {
    it('should convert pounds to kilograms', () => {
      expect(weightToKg({ value: 100, unit: 'lb' })).toBeCloseTo(45.3592, 4);
      expect(weightToKg({ value: 60, unit: 'kg' })).toBe(60);
    });

    it('should convert kilograms to pounds', () => {
      expect(weightToLb({ value: 45.3592, unit: 'kg' })).toBeCloseTo(100, 4);
      expect(weightToLb({ value: 135, unit: 'lb' })).toBe(135);
    });
  });

  describe('distance', () => {
    it('should convert every unit to meters', () => {
      expect(distanceToMeters({ value: 400, unit: 'm' })).toBe(400);
      expect(distanceToMeters({ value: 5, unit: 'km' })).toBe(5000);
      expect(distanceToMeters({ value: 1, unit: 'mi' })).toBeCloseTo(1609.34, 2);
      expect(distanceToMeters({ value: 100, unit: 'yd' })).toBeCloseTo(91.44, 2);
    });
  });

  describe('durations', () => {
    it('should split seconds into components', () => {
      expect(secondsToComponents(3723)).toEqual({ hours: 1, minutes: 2, seconds: 3 });
      expect(secondsToComponents(59)).toEqual({ hours: 0, minutes: 0, seconds: 59 });
    });

    it('should treat negative durations as zero', () => {
      expect(secondsToComponents(-5)).toEqual({ hours: 0, minutes: 0, seconds: 0 });
    });

    it('should clamp minutes and seconds when joining components', () => {
      expect(componentsToSeconds({ hours: 1, minutes: 2, seconds: 3 })).toBe(3723);
      expect(componentsToSeconds({ hours: 1, minutes: 75, seconds: -4 })).toBe(7140);
      expect(componentsToSeconds({ hours: -1, minutes: 2, seconds: 3 })).toBe(123);
    });

    it('should format durations for display', () => {
      expect(formatDuration(3723)).toBe('1:02:03');
      expect(formatDuration(125)).toBe('2:05');
      expect(formatDuration(42)).toBe('42s');
      expect(formatDuration(0)).toBe('0s');
    });
  });
});
