/**
 * @fileoverview Wire scalar codecs
 *
 * The remote service transmits numbers and booleans as strings
 * (`"totalrows": "25"`, `"enabled": "1"`). These zod schemas decode them
 * at the boundary so the in-memory model stays strictly typed.
 *
 * @module @confrest/core/wire/codec
 */

import * as z from "zod";
import { TypeParseError } from "../errors/ClientErrors.js";

/** A JSON object as sent to or received from the service. */
export type WireObject = Record<string, unknown>;

/** Unsigned integer sent either as a digit string or a JSON number. */
export const wireUint = z.union([
    z.number().int().nonnegative(),
    z.string().regex(/^\d+$/, "expected an unsigned integer").transform((value) => Number(value)),
]);

/**
 * Boolean sent as `"0"`, `"1"`, `"yes"`, `"no"`, `"true"`, `"false"`,
 * `0`, `1` or a JSON boolean.
 */
export const wireBool = z.union([
    z.boolean(),
    z.literal(0).transform(() => false),
    z.literal(1).transform(() => true),
    z.enum(["0", "no", "false"]).transform(() => false),
    z.enum(["1", "yes", "true"]).transform(() => true),
]);

/** Optional boolean; a JSON `null` decodes to unset. */
export const wireOptionalBool = wireBool.nullish().transform((value) => value ?? undefined);

/** Optional unsigned integer; a JSON `null` decodes to unset. */
export const wireOptionalUint = wireUint.nullish().transform((value) => value ?? undefined);

/** Optional string; a JSON `null` decodes to unset. */
export const wireOptionalString = z.string().nullish().transform((value) => value ?? undefined);

/**
 * Encode a boolean the way the service stores it.
 *
 * @example
 * ```typescript
 * encodeBool(true);      // "1"
 * encodeBool(undefined); // undefined
 * ```
 */
export function encodeBool(value: boolean): "0" | "1";
export function encodeBool(value: boolean | undefined): "0" | "1" | undefined;
export function encodeBool(value: boolean | undefined): "0" | "1" | undefined {
    if (value === undefined) {
        return undefined;
    }
    return value ? "1" : "0";
}

/**
 * Drop keys whose value is `undefined` so unset optional fields are not
 * sent at all.
 */
export function omitUndefined(object: Record<string, unknown>): WireObject {
    const result: WireObject = {};
    for (const [key, value] of Object.entries(object)) {
        if (value !== undefined) {
            result[key] = value;
        }
    }
    return result;
}

/**
 * Parse a wire value with a zod schema, converting validation failures to
 * {@link TypeParseError}.
 *
 * @param schema - Schema describing the expected shape
 * @param value - Raw JSON value
 * @param expected - Type name used in the error message
 */
export function parseWire<TSchema extends z.ZodTypeAny>(
    schema: TSchema,
    value: unknown,
    expected: string
): z.output<TSchema> {
    const result = schema.safeParse(value);
    if (!result.success) {
        const reason = result.error.issues
            .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
            .join("; ");
        throw new TypeParseError(expected, reason, result.error);
    }
    return result.data;
}
