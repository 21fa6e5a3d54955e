// Export types (LedState, transport interfaces, config, etc.)
export * from './types';

// Export main class and session helpers
export { LedStripSession, withLedStrip, openTransport, closeTransport } from './device/LedStripSession';

// Export payload catalog
export {
  FRAME_LENGTH,
  onFrame,
  offFrame,
  queryTriggerFrame,
  powerFrame,
  buildFrame,
  hasValidChecksum,
  encodeStatusNotification,
  classifyNotification,
  decodeNotification
} from './core/LedPayloads';

// Export low-level correlation primitive (for advanced users)
export { awaitState, CorrelationRequest } from './core/NotificationCorrelator';

// Export configuration
export { resolveConfig, DEFAULT_CONFIG, QUERY_TIMEOUT_MS, CONNECT_TIMEOUT_MS, ConfigInput } from './config';

// Export transport and discovery
export { NobleConnector, NobleTransport } from './transport/NobleTransport';
export { formatServiceListing } from './device/discovery';

// Export command dispatcher
export { dispatch, parseVerb, Verb, Reporter, USAGE } from './cli/dispatcher';

// Export error types
export {
  TransportError,
  ConnectionFailureError,
  WriteFailureError,
  SessionBusyError,
  ConfigurationError
} from './utils/errors';
