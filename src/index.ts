// Core AQM components
export { PolicyTable, type BoundPolicyTable } from './aqm/policy-table.js';
export { AverageEstimator, type AverageEstimatorOptions } from './aqm/average-estimator.js';
export {
  decide,
  createDropState,
  baseDropProbability,
  correctedDropProbability,
  assertMaxProbability,
  assertThresholdPair,
} from './aqm/drop-decision.js';
export { CongestionController, type CongestionControllerConfig } from './aqm/congestion-controller.js';
export {
  WredLayer,
  type ArrivalDecision,
  type WredLayerConfig,
  type PriorityAssignmentInput,
} from './aqm/wred-layer.js';
export {
  WredPort,
  createWredPort,
  type WredPortConfig,
  type WredPortEvents,
  type PortArrival,
} from './aqm/wred-port.js';

// Errors
export {
  AqmError,
  ConfigurationError,
  UnknownPriorityClassError,
  UnassignedFlowError,
  InvariantViolationError,
  fromZodError,
  type AqmErrorCode,
  type AqmErrorShape,
} from './api/errors.js';

// Configuration
export {
  loadConfig,
  readConfigFile,
  validateConfig,
  initializeConfig,
  getConfig,
  resetConfig,
  toWredPortOptions,
  parseFlowId,
  type Config,
  type Environment,
  type PortDependencies,
  type WredPortOptions,
} from './config/loader.js';
export { WRED, PORT, WEIGHT_FACTOR, defaultWeightFactor } from './config/defaults.js';

// Utilities
export { createLogger, lazyLog, type CreateLoggerOptions } from './utils/logger-helpers.js';
export { createRandomSource, defaultRandomSource, sequenceRandomSource } from './utils/random.js';

export * from './types/index.js';
export * from './types/schemas/index.js';
