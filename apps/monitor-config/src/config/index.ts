/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadClientConfig,
    type ClientConfig,
} from "./loadClientConfig.js";
