/**
 * @fileoverview Field validators for monitoring configuration entities
 *
 * Name and field rules enforced by the monitoring server's configuration
 * API. Every validator trims (unless noted), checks byte length, then the
 * pattern, and throws the first violation.
 *
 * @module domain/utils/validators
 */

import { isIP } from "net";
import { domainToASCII } from "url";
import {
    InvalidIpError,
    InvalidQuorumError,
    isValidUtf8mb3,
    percentEncodedLengthAtMost,
    validateTrimmedString,
    validateUntrimmedString,
    type StringRule,
} from "@confrest/core";

// ============================================================================
// Patterns
// ============================================================================

export const HASHTAG_NAME_REGEX = /^[\p{L}\p{N}][\p{L}\p{N}_-]*$/u;
export const HOST_NAME_REGEX = /^[\p{L}\p{N}.\-_]+$/u;
export const HOSTGROUP_NAME_REGEX = /^[\p{L}\p{N}][\p{L}\p{N} ./+\-_]*$/u;
export const HOSTTEMPLATE_NAME_REGEX = /^[\p{L}\p{N}][\p{L}\p{N} .\-_]*$/u;
export const BSM_COMPONENT_NAME_REGEX = /^[\p{L}\p{N}][\p{L}\p{N}\p{S}\p{P} ]*$/u;
export const INLINE_FREE_TEXT_REGEX = /^[\P{Z}\p{N}\p{S}\p{P} ]*$/u;
export const URL_REGEX = /^[a-zA-Z][a-zA-Z0-9-+.]*:\/\/[\p{L}\p{N}\p{S}\p{P} ]*$/u;

const QUORUM_PCT_REGEX = /^\d{1,3}\.\d{2}$/;

// WHATWG forbidden host code points, plus whitespace
const FORBIDDEN_HOST_CHARACTERS = /[\s#%/:<>?@[\\\]^|]/u;

const rule = (min: number, max: number, pattern: RegExp): StringRule => ({ min, max, pattern });

// ============================================================================
// Names
// ============================================================================

export function validateHashtagName(name: string): string {
    return validateTrimmedString(name, rule(1, 128, HASHTAG_NAME_REGEX));
}

/**
 * Host names are also used in URLs, so the percent-encoded form is
 * limited too.
 */
export function validateHostName(name: string): string {
    percentEncodedLengthAtMost(name, 255);
    return validateTrimmedString(name, rule(1, 64, HOST_NAME_REGEX));
}

export function validateHostGroupName(name: string): string {
    return validateTrimmedString(name, rule(1, 128, HOSTGROUP_NAME_REGEX));
}

export function validateHostTemplateName(name: string): string {
    return validateTrimmedString(name, rule(1, 128, HOSTTEMPLATE_NAME_REGEX));
}

export function validateBsmComponentName(name: string): string {
    return validateTrimmedString(name, rule(1, 255, BSM_COMPONENT_NAME_REGEX));
}

export function validateManagementUrlName(name: string): string {
    return validateTrimmedString(name, rule(1, 191, INLINE_FREE_TEXT_REGEX));
}

// ============================================================================
// Fields
// ============================================================================

/** Descriptions and aliases; empty is allowed. */
export function validateDescription(description: string): string {
    return validateTrimmedString(description, rule(0, 255, INLINE_FREE_TEXT_REGEX));
}

/**
 * URLs are not trimmed.
 *
 * @throws InvalidUtf8Error for characters outside the 3-byte UTF-8 range
 */
export function validateUrl(url: string): string {
    isValidUtf8mb3(url);
    return validateUntrimmedString(url, rule(1, 16000, URL_REGEX));
}

/**
 * Accept an IPv4 address, an IPv6 address or a hostname. Trailing
 * whitespace is removed. Anything that is not an IP must survive the
 * WHATWG host parser, which also refuses malformed dotted quads such as
 * `300.1.1.1`.
 *
 * @throws InvalidIpError otherwise
 *
 * @example
 * ```typescript
 * validateIpOrHostname("10.0.0.1 ");     // "10.0.0.1"
 * validateIpOrHostname("db.example.org"); // "db.example.org"
 * validateIpOrHostname("not a host");     // throws InvalidIpError
 * ```
 */
export function validateIpOrHostname(value: string): string {
    const trimmed = value.trimEnd();
    if (isIP(trimmed) !== 0) {
        return trimmed;
    }
    if (trimmed.length === 0 || FORBIDDEN_HOST_CHARACTERS.test(trimmed)) {
        throw new InvalidIpError(trimmed);
    }
    // domainToASCII returns "" for anything the host parser rejects
    if (domainToASCII(trimmed) === "") {
        throw new InvalidIpError(trimmed);
    }
    return trimmed;
}

/**
 * A business component's quorum must be a percentage that some number of
 * its hosts can reach: `100 * k / members` for `k` in `0..members`,
 * written with exactly two decimals. `"0.00"` and `"100.00"` are always
 * accepted.
 *
 * @throws InvalidQuorumError otherwise
 *
 * @example
 * ```typescript
 * validateQuorum("66.67", 3); // "66.67"
 * validateQuorum("50.00", 3); // throws InvalidQuorumError
 * ```
 */
export function validateQuorum(percentage: string, members: number): string {
    if (percentage === "0.00" || percentage === "100.00") {
        return percentage;
    }
    if (members === 0 || !QUORUM_PCT_REGEX.test(percentage)) {
        throw new InvalidQuorumError(percentage, members);
    }

    for (let reachable = 0; reachable <= members; reachable++) {
        if ((100 * reachable / members).toFixed(2) === percentage) {
            return percentage;
        }
    }
    throw new InvalidQuorumError(percentage, members);
}
