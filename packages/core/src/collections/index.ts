/**
 * @fileoverview Collection barrel exports
 *
 * @module @confrest/core/collections
 */

export { KeyedCollection, decodeInto } from "./KeyedCollection.js";
export { ConfigObjectMap, refMapFrom } from "./ConfigObjectMap.js";
export { ConfigRefMap } from "./ConfigRefMap.js";
export { compareCollections, type CollectionComparison } from "./compare.js";
