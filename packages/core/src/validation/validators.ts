/**
 * @fileoverview Field validation helpers
 *
 * Building blocks for entity name and field validators. Lengths are
 * measured in UTF-8 bytes, which is what the service's database limits.
 *
 * @module @confrest/core/validation/validators
 */

import {
    DoesNotMatchRegexError,
    InvalidUtf8Error,
    RequiredFieldEmptyError,
    StringTooLongError,
    StringTooLongWhenPercentEncodedError,
    StringTooShortError,
} from "../errors/ConfigErrors.js";

/**
 * Bounds and pattern for a string field.
 */
export interface StringRule {
    readonly min: number;
    readonly max: number;
    readonly pattern: RegExp;
}

function byteLength(value: string): number {
    return Buffer.byteLength(value, "utf8");
}

function validateString(value: string, rule: StringRule, trim: boolean): string {
    const candidate = trim ? value.trim() : value;
    const length = byteLength(candidate);

    if (length < rule.min) {
        throw new StringTooShortError(rule.min, length);
    }
    if (length > rule.max) {
        throw new StringTooLongError(rule.max, length);
    }
    if (!rule.pattern.test(candidate)) {
        throw new DoesNotMatchRegexError(candidate, rule.pattern.source);
    }
    return candidate;
}

/**
 * Trim, then check length and pattern.
 *
 * @returns The trimmed value
 *
 * @example
 * ```typescript
 * validateTrimmedString("  web ", { min: 1, max: 128, pattern: /^\w+$/u }); // "web"
 * ```
 */
export function validateTrimmedString(value: string, rule: StringRule): string {
    return validateString(value, rule, true);
}

/**
 * Check length and pattern without trimming.
 */
export function validateUntrimmedString(value: string, rule: StringRule): string {
    return validateString(value, rule, false);
}

/**
 * Apply a validator to an optional value; unset stays unset.
 */
export function validateOptional<T, U>(
    value: T | undefined,
    validator: (value: T) => U
): U | undefined {
    return value === undefined ? undefined : validator(value);
}

/**
 * Return a required builder field or fail naming it.
 *
 * @throws RequiredFieldEmptyError if the value is unset
 */
export function requireField<T>(value: T | undefined, field: string): T {
    if (value === undefined) {
        throw new RequiredFieldEmptyError(field);
    }
    return value;
}

/**
 * Fail if the value, with trailing whitespace removed and every
 * non-alphanumeric byte percent-encoded, is longer than `max`.
 */
export function percentEncodedLengthAtMost(value: string, max: number): void {
    const encoded = Array.from(Buffer.from(value.trimEnd(), "utf8"))
        .map((byte) => {
            const isAlphanumeric = (byte >= 0x30 && byte <= 0x39)
                || (byte >= 0x41 && byte <= 0x5a)
                || (byte >= 0x61 && byte <= 0x7a);
            return isAlphanumeric ? String.fromCharCode(byte) : `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
        })
        .join("");

    if (encoded.length > max) {
        throw new StringTooLongWhenPercentEncodedError(max, encoded.length);
    }
}

/**
 * Fail if any character needs four bytes in UTF-8. The service stores
 * text in 3-byte UTF-8 columns.
 */
export function isValidUtf8mb3(value: string): void {
    for (const character of value) {
        const codePoint = character.codePointAt(0);
        if (codePoint !== undefined && codePoint > 0xffff) {
            throw new InvalidUtf8Error(value);
        }
    }
}
