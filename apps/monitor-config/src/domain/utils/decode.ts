/**
 * @fileoverview Decoding helpers for nested fields
 *
 * @module domain/utils/decode
 */

/**
 * Decode a nested field that may be absent or `null`.
 *
 * @example
 * ```typescript
 * const hosts = decodeOptional(raw.hosts, (value) => ConfigRefMap.fromJSON(HostRef, value, "hosts"));
 * ```
 */
export function decodeOptional<T>(value: unknown, decode: (value: unknown) => T): T | undefined {
    if (value === undefined || value === null) {
        return undefined;
    }
    return decode(value);
}
