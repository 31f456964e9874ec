// Ingestion module - the write path for surf session observations

export {
  ingestSession,
  type IngestSessionOptions,
  type IngestSessionResult,
} from './session.js';

export {
  createCancellationGuard,
  type CancellationGuard,
  type CancellationOptions,
} from './cancellation.js';
