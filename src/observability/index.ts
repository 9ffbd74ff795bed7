/**
 * Observability Module
 *
 * OpenTelemetry events and metrics for the bridge.
 */

export {
  initTelemetry,
  shutdownTelemetry,
  isTelemetryEnabled,
  emitEvent,
  getLogger,
} from './telemetry';

export {
  emitMessageRejected,
  emitAuthenticationResult,
  emitBranchCreated,
  emitFileWritten,
  emitTagResult,
  emitMessageFailed,
  emitCycleComplete,
} from './events';

export {
  initMetrics,
  recordMessageOutcome,
  recordCommit,
  recordCycleDuration,
} from './metrics';
