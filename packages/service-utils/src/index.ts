export {
  identityFromEnv,
  loadConfigFromEnv,
  validateRequiredEnv,
  warnMissingEnv
} from "./env.js";
export { registerMetrics } from "./metrics.js";
export { bootstrapService, type BootLogger, type BootOptions, type ShutdownFn } from "./boot.js";
