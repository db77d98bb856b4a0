/**
 * converge: public API
 */

export * from "./src/types.js";
export * from "./src/errors.js";
export * from "./src/graph/index.js";
export * from "./src/state/index.js";
export * from "./src/diff/index.js";
export * from "./src/plan/index.js";
export * from "./src/executor/index.js";
export * from "./src/providers/index.js";
export {
  type ApplyOptions,
  type ApplyResult,
  type PlanResult,
  type ReconcilerOptions,
  Reconciler,
  createReconciler,
  createStateStorage,
} from "./src/reconciler.js";
export {
  type ConvergeConfig,
  type ConvergeConfigFile,
  type LoadConfigOptions,
  CONFIG_FILE_NAME,
  configSchema,
  getDefaultConfig,
  loadConfig,
  lockWaitStrategy,
  mergeConfig,
} from "./src/config.js";
export {
  type Logger,
  type LogLevel,
  type LoggingOptions,
  configureLogging,
  getLogger,
  setRootLogger,
} from "./src/logging/index.js";
export { VERSION } from "./src/version.js";
