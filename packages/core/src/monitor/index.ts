export {
  classifySample,
  createHysteresisClassifier,
  DEFAULT_HYSTERESIS,
  type HysteresisOptions,
} from "./classifier.js";
export {
  ActivityMonitor,
  agentNameMatcher,
  type ActivityMonitorOptions,
  type SessionCheck,
} from "./activity-monitor.js";
export { killSession, type KillSessionResult } from "./kill.js";
