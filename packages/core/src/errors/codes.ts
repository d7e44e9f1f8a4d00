/**
 * @fileoverview Error code registry
 *
 * Stable, machine-readable codes for every failure the framework can
 * surface. Codes are SNAKE_CASE and never reused.
 *
 * @module @confrest/core/errors/codes
 */

export const ERROR_CODES = {
    // Identifier and path resolution
    MISSING_IDENTIFIERS: "MISSING_IDENTIFIERS",
    NO_CONFIG_PATH     : "NO_CONFIG_PATH",
    INVALID_REF        : "INVALID_REF",
    MISSING_ARGUMENT   : "MISSING_ARGUMENT",

    // Response shape
    OBJECT_NOT_FOUND: "OBJECT_NOT_FOUND",
    FIELD_NOT_FOUND : "FIELD_NOT_FOUND",
    ID_NOT_FOUND    : "ID_NOT_FOUND",
    ID_PARSE_ERROR  : "ID_PARSE_ERROR",
    NOT_AN_ARRAY    : "NOT_AN_ARRAY",
    TYPE_PARSE_ERROR: "TYPE_PARSE_ERROR",

    // Consistency
    ROW_COUNT_MISMATCH: "ROW_COUNT_MISMATCH",
    DUPLICATE_KEY     : "DUPLICATE_KEY",

    // HTTP status mapping
    UNAUTHORIZED         : "UNAUTHORIZED",
    RESOURCE_NOT_FOUND   : "RESOURCE_NOT_FOUND",
    BAD_REQUEST          : "BAD_REQUEST",
    INTERNAL_SERVER_ERROR: "INTERNAL_SERVER_ERROR",
    UNDEFINED_HTTP_ERROR : "UNDEFINED_HTTP_ERROR",
    HTTP_ERROR           : "HTTP_ERROR",

    // Field validation
    REQUIRED_FIELD_EMPTY                : "REQUIRED_FIELD_EMPTY",
    DOES_NOT_MATCH_REGEX                : "DOES_NOT_MATCH_REGEX",
    STRING_TOO_SHORT                    : "STRING_TOO_SHORT",
    STRING_TOO_LONG                     : "STRING_TOO_LONG",
    STRING_TOO_LONG_WHEN_PERCENT_ENCODED: "STRING_TOO_LONG_WHEN_PERCENT_ENCODED",
    INVALID_UTF8                        : "INVALID_UTF8",
    INVALID_QUORUM                      : "INVALID_QUORUM",
    INVALID_IP                          : "INVALID_IP",
} as const;

/** Union of every known error code literal. */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
