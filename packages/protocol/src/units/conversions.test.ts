// Tests for unit conversions

import { describe, it, expect } from 'vitest';
import {
  metersToFeet,
  feetToMeters,
  metersPerSecondToMph,
  celsiusToFahrenheit,
  fahrenheitToCelsius,
} from './conversions.js';

describe('unit conversions', () => {
  it('converts wave heights between meters and feet', () => {
    expect(metersToFeet(1.2)).toBe(3.9);
    expect(metersToFeet(2)).toBe(6.6);
    expect(feetToMeters(10)).toBe(3);
    expect(feetToMeters(3.9)).toBe(1.2);
  });

  it('converts wind speed from m/s to mph', () => {
    expect(metersPerSecondToMph(10.2)).toBe(22.8);
    expect(metersPerSecondToMph(0)).toBe(0);
    expect(metersPerSecondToMph(4)).toBe(8.9);
  });

  it('converts temperatures both ways', () => {
    expect(celsiusToFahrenheit(0)).toBe(32);
    expect(celsiusToFahrenheit(12.5)).toBe(54.5);
    expect(celsiusToFahrenheit(-40)).toBe(-40);
    expect(fahrenheitToCelsius(50)).toBe(10);
    expect(fahrenheitToCelsius(54.5)).toBe(12.5);
  });
});
