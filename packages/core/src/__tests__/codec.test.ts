/**
 * @fileoverview Unit tests for wire codecs and envelopes
 *
 * @module @confrest/core/__tests__/codec
 */

import { describe, it, expect } from "vitest";
import * as z from "zod";
import {
    encodeBool,
    omitUndefined,
    parseWire,
    wireBool,
    wireOptionalBool,
    wireUint,
} from "../wire/codec.js";
import {
    parseExists,
    parseSummary,
    requireField,
    requireList,
} from "../wire/envelopes.js";
import {
    FieldNotFoundError,
    NotAnArrayError,
    TypeParseError,
} from "../errors/ClientErrors.js";
import { isConfRestError } from "../errors/ConfRestError.js";
import { ERROR_CODES } from "../errors/codes.js";
import { captureError } from "./fixtures.js";

describe("wire codecs", () => {
    describe("wireUint", () => {
        it("should accept digit strings and non-negative integers", () => {
            expect(wireUint.parse("42")).toBe(42);
            expect(wireUint.parse(7)).toBe(7);
        });

        it("should reject signs, fractions and words", () => {
            expect(wireUint.safeParse("-1").success).toBe(false);
            expect(wireUint.safeParse(1.5).success).toBe(false);
            expect(wireUint.safeParse("seven").success).toBe(false);
        });
    });

    describe("wireBool", () => {
        it("should decode the service's boolean spellings", () => {
            expect(wireBool.parse("1")).toBe(true);
            expect(wireBool.parse("yes")).toBe(true);
            expect(wireBool.parse(1)).toBe(true);
            expect(wireBool.parse("0")).toBe(false);
            expect(wireBool.parse("false")).toBe(false);
            expect(wireBool.parse(false)).toBe(false);
        });

        it("should reject anything else", () => {
            expect(wireBool.safeParse("maybe").success).toBe(false);
            expect(wireBool.safeParse(2).success).toBe(false);
        });

        // Scenario: explicit JSON null for an optional boolean
        it("should treat null as unset for optional booleans", () => {
            expect(wireOptionalBool.parse(null)).toBeUndefined();
            expect(wireOptionalBool.parse(undefined)).toBeUndefined();
            expect(wireOptionalBool.parse("1")).toBe(true);
        });
    });

    describe("encodeBool", () => {
        it("should encode to digit strings and keep unset unset", () => {
            expect(encodeBool(true)).toBe("1");
            expect(encodeBool(false)).toBe("0");
            expect(encodeBool(undefined)).toBeUndefined();
        });
    });

    describe("omitUndefined", () => {
        it("should drop undefined but keep null and falsy values", () => {
            expect(omitUndefined({ a: undefined, b: null, c: 0, d: "" })).toEqual({ b: null, c: 0, d: "" });
        });
    });

    describe("parseWire", () => {
        it("should wrap schema failures in TypeParseError naming the field", () => {
            const error = captureError(() => parseWire(z.object({ name: z.string() }), { name: 3 }, "Host"));

            expect(error).toBeInstanceOf(TypeParseError);
            expect(isConfRestError(error, ERROR_CODES.TYPE_PARSE_ERROR)).toBe(true);
            expect(error).toMatchObject({ message: expect.stringContaining("name:") });
        });
    });
});

describe("envelopes", () => {
    it("should read present fields and reject missing ones", () => {
        expect(requireField({ exists: "1" }, "exists")).toBe("1");
        expect(() => requireField({}, "exists")).toThrow(FieldNotFoundError);
        expect(() => requireField(null, "exists")).toThrow(FieldNotFoundError);
        expect(() => requireField([], "exists")).toThrow(FieldNotFoundError);
    });

    it("should require list to be an array", () => {
        expect(requireList({ list: [1, 2] })).toEqual([1, 2]);
        expect(() => requireList({ list: "nope" })).toThrow(NotAnArrayError);
        expect(() => requireList({})).toThrow(FieldNotFoundError);
    });

    it("should parse summary totals from digit strings", () => {
        expect(parseSummary({ summary: { rows: "10", totalrows: "25", totalpages: "3" } }))
            .toEqual({ totalRows: 25, totalPages: 3 });
    });

    it("should reject a summary lacking totalpages", () => {
        expect(() => parseSummary({ summary: { totalrows: "25" } })).toThrow(FieldNotFoundError);
    });

    it("should map exists to a boolean", () => {
        expect(parseExists({ exists: "1" })).toBe(true);
        expect(parseExists({ exists: "0" })).toBe(false);
        expect(() => parseExists({ exists: 1 })).toThrow(TypeParseError);
    });
});
