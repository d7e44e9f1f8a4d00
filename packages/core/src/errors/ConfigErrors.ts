/**
 * @fileoverview Config errors
 *
 * Raised by builders and field validators. The framework propagates them
 * unchanged; entity packages decide which rules apply to which field.
 *
 * @module @confrest/core/errors/ConfigErrors
 */

import { ERROR_CODES } from "./codes.js";
import { ConfigError } from "./ConfRestError.js";

export class RequiredFieldEmptyError extends ConfigError {
    constructor(public readonly field: string) {
        super(ERROR_CODES.REQUIRED_FIELD_EMPTY, `Required field is empty: ${field}`, { field });
    }
}

export class DoesNotMatchRegexError extends ConfigError {
    constructor(value: string, pattern: string) {
        super(
            ERROR_CODES.DOES_NOT_MATCH_REGEX,
            `'${value}' does not match ${pattern}`,
            { value, pattern }
        );
    }
}

export class StringTooShortError extends ConfigError {
    constructor(min: number, length: number) {
        super(
            ERROR_CODES.STRING_TOO_SHORT,
            `String too short: minimum ${min}, got ${length}`,
            { min, length }
        );
    }
}

export class StringTooLongError extends ConfigError {
    constructor(max: number, length: number) {
        super(
            ERROR_CODES.STRING_TOO_LONG,
            `String too long: maximum ${max}, got ${length}`,
            { max, length }
        );
    }
}

export class StringTooLongWhenPercentEncodedError extends ConfigError {
    constructor(max: number, length: number) {
        super(
            ERROR_CODES.STRING_TOO_LONG_WHEN_PERCENT_ENCODED,
            `String too long when percent-encoded: maximum ${max}, got ${length}`,
            { max, length }
        );
    }
}

/** The value contains characters outside the Basic Multilingual Plane. */
export class InvalidUtf8Error extends ConfigError {
    constructor(value: string) {
        super(ERROR_CODES.INVALID_UTF8, `Characters outside the 3-byte UTF-8 range in '${value}'`, { value });
    }
}

/** The quorum is not a ratio achievable with the given number of members. */
export class InvalidQuorumError extends ConfigError {
    constructor(value: string, members: number) {
        super(
            ERROR_CODES.INVALID_QUORUM,
            `Invalid quorum ${value} for ${members} member(s)`,
            { value, members }
        );
    }
}

export class InvalidIpError extends ConfigError {
    constructor(value: string) {
        super(ERROR_CODES.INVALID_IP, `Invalid IP address or hostname: ${value}`, { value });
    }
}
