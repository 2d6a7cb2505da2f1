/**
 * Binary Locator/Dispatcher module exports.
 */

export {
  BinaryLocator,
  candidateLocations,
  type CandidateLocationOptions,
} from "./binary-locator.js";
export {
  Dispatcher,
  FORWARDED_SIGNALS,
  processSignalHost,
  type DispatchOutcome,
  type SignalHost,
} from "./dispatcher.js";
