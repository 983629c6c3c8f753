/**
 * @file Utils index
 * @description Re-exports all utility modules
 */

export {
  createLogger,
  defaultLogger,
  isLogLevel,
  silentLogger,
  type Logger,
  type LogLevel,
} from "./logger";

export { deriveIpId } from "./ipId";
