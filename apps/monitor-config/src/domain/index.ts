/**
 * @fileoverview Domain barrel exports
 *
 * Entity types for the monitoring server's configuration API.
 *
 * @module domain
 */

export * from "./entities/index.js";
export * from "./utils/index.js";
