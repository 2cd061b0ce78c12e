export * from "./catalog/index.js";
export * from "./matcher/index.js";
export * from "./scoring/index.js";
export * from "./assessment/index.js";
export * from "./report/index.js";
export * from "./input/index.js";
export {
  getLogLevel,
  logDebug,
  logError,
  logInfo,
  logWarning,
  setLogLevel,
  type LogLevel,
} from "./telemetry/logger.js";
