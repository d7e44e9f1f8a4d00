/**
 * @fileoverview Instance barrel exports
 *
 * @module instance
 */

export {
    ConfigInstance,
    type ConfigInstanceCollections,
    type ConfigInstanceCounts,
} from "./ConfigInstance.js";
