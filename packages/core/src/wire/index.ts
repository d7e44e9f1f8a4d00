/**
 * @fileoverview Wire codec barrel exports
 *
 * @module @confrest/core/wire
 */

export {
    wireUint,
    wireBool,
    wireOptionalBool,
    wireOptionalUint,
    wireOptionalString,
    encodeBool,
    omitUndefined,
    parseWire,
    type WireObject,
} from "./codec.js";
export {
    parseSummary,
    parseExists,
    requireField as requireResponseField,
    requireList,
    type PageSummary,
} from "./envelopes.js";
