/**
 * smellscan public API.
 */

export * from "./analysis/ast";
export * from "./analysis/metrics";
export * from "./analysis/rules";
export * from "./analysis/detectors";
export * from "./analysis/orchestration";
export * from "./config/schema";
export * from "./config/loader";
export * from "./core/suppression";
export * from "./errors";
export * from "./report";
export { logger } from "./logger";
