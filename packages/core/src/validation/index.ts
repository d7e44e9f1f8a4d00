/**
 * @fileoverview Validation barrel exports
 *
 * @module @confrest/core/validation
 */

export {
    validateTrimmedString,
    validateUntrimmedString,
    validateOptional,
    requireField,
    percentEncodedLengthAtMost,
    isValidUtf8mb3,
    type StringRule,
} from "./validators.js";
