// Metric buoy units to the units sessions are logged in
//
// Every conversion rounds to one decimal place.

const FEET_PER_METER = 3.280839895;
const MPH_PER_METER_PER_SECOND = 2.236936292;

function roundTenths(value: number): number {
  return Math.round(value * 10) / 10;
}

export function metersToFeet(meters: number): number {
  return roundTenths(meters * FEET_PER_METER);
}

export function feetToMeters(feet: number): number {
  return roundTenths(feet / FEET_PER_METER);
}

/**
 * @example
 * metersPerSecondToMph(10.2); // 22.8
 */
export function metersPerSecondToMph(metersPerSecond: number): number {
  return roundTenths(metersPerSecond * MPH_PER_METER_PER_SECOND);
}

export function celsiusToFahrenheit(celsius: number): number {
  return roundTenths((celsius * 9) / 5 + 32);
}

export function fahrenheitToCelsius(fahrenheit: number): number {
  return roundTenths(((fahrenheit - 32) * 5) / 9);
}
