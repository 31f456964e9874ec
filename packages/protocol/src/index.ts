// @surflog/protocol
// Domain types and validation shared by storage, ingestion and the API.

export * from './types/index.js';

export {
  SessionObservationSchema,
  SessionDateSchema,
  SessionTimeSchema,
  validateSessionObservation,
  isCalendarDate,
  normalizeTime,
  MAX_CARDINAL_LENGTH,
  MAX_NOTES_LENGTH,
  INT4_MIN,
  INT4_MAX,
  type SessionObservation,
  type ObservationValidationError,
  type ObservationValidationErrorCode,
  type ObservationValidationResult,
} from './validation/observation.js';

export {
  degreesToCardinal,
  CARDINAL_DIRECTIONS,
  type CardinalDirection,
} from './units/cardinal.js';

export {
  metersToFeet,
  feetToMeters,
  metersPerSecondToMph,
  celsiusToFahrenheit,
  fahrenheitToCelsius,
} from './units/conversions.js';
