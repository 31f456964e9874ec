// Compass bearings to cardinal strings

/**
 * Eight-point compass rose, clockwise from north
 */
export const CARDINAL_DIRECTIONS = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW'] as const;

export type CardinalDirection = (typeof CARDINAL_DIRECTIONS)[number];

/**
 * Convert a bearing in degrees to an eight-point cardinal direction.
 *
 * Each direction covers the 45 degree sector that starts at its bearing
 * (N is 0-44, NE is 45-89, ...). Bearings outside 0-359 wrap around.
 *
 * @example
 * degreesToCardinal(270); // 'W'
 * degreesToCardinal(358); // 'NW'
 * degreesToCardinal(-90); // 'W'
 */
export function degreesToCardinal(degrees: number): CardinalDirection {
  if (!Number.isFinite(degrees)) {
    throw new RangeError(`bearing must be a finite number, got ${degrees}`);
  }

  const normalized = ((degrees % 360) + 360) % 360;
  return CARDINAL_DIRECTIONS[Math.floor(normalized / 45) % 8];
}
