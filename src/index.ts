export * from "./editDistance/index.js";
export { EditDistanceService, DistanceRequestSchema, InputTooLongError, RequestValidationError } from "./service/editDistanceService.js";
export type { BatchReport, DistanceOutcome, DistanceRequest, EditDistanceServiceOptions } from "./service/editDistanceService.js";
export { StructuredLogger } from "./logger.js";
export type { LogEntry, LogLevel, LoggerOptions } from "./logger.js";
export { loadRuntimeSettings } from "./config/settings.js";
export type { RuntimeSettings } from "./config/settings.js";
export { normaliseDistanceError } from "./errors.js";
