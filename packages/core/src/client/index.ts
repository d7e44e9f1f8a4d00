/**
 * @fileoverview Client barrel exports
 *
 * @module @confrest/core/client
 */

export {
    ConfigClient,
    pathFromRef,
    type ConfigClientOptions,
} from "./ConfigClient.js";
export {
    fetchAllPages,
    pageParams,
    type FetchAllOptions,
} from "./pagination.js";
